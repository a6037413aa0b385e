/**
 * Vitest Global Setup
 *
 * Plain, uncolored output so assertions can compare rendered text.
 */
import chalk from "chalk";

process.env.NO_COLOR = "1";
chalk.level = 0;

process.stdout.setMaxListeners(0);
process.setMaxListeners(0);
