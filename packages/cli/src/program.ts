/**
 * The tierlink command tree.
 *
 * @module cli/program
 */

import chalk from "chalk";
import { Command, CommanderError, type OptionValues } from "commander";
import { restartCommand, reloadCommand, startCommand, stopCommand } from "./commands/lifecycle.js";
import { monitorCommand } from "./commands/monitor.js";
import { saveCommand } from "./commands/save.js";
import { selfTestCommand } from "./commands/self-test.js";
import { statusCommand } from "./commands/status.js";
import { type CliContext, type CliDeps, createContext, defaultDeps, type GlobalOptions } from "./context.js";
import { EXIT_CODES, type ExitCode, exitCodeForError } from "./exit-codes.js";
import { version } from "./version.js";

type Handler = (ctx: CliContext) => Promise<ExitCode>;

function flag(values: OptionValues, name: string): boolean | undefined {
  const value: unknown = values[name];
  return typeof value === "boolean" ? value : undefined;
}

export function readGlobalOptions(values: OptionValues): GlobalOptions {
  const config: unknown = values.config;
  return {
    config: typeof config === "string" ? config : undefined,
    debug: flag(values, "debug"),
    verbose: flag(values, "verbose"),
    quiet: flag(values, "quiet"),
    dryRun: flag(values, "dryRun"),
  };
}

/**
 * @param setExitCode - Receives the outcome of the command that ran
 */
export function createProgram(deps: CliDeps, setExitCode: (code: ExitCode) => void): Command {
  const program = new Command();

  // Inherited by every subcommand, so set before adding them
  program
    .exitOverride()
    .allowExcessArguments(false)
    .configureOutput({
      writeOut: (text) => deps.out.log(text.trimEnd()),
      writeErr: (text) => deps.out.error(text.trimEnd()),
    });

  program
    .name("tierlink")
    .description("Hierarchical bandwidth shaping and traffic classification for an egress link")
    .version(version)
    .option("-c, --config <path>", "Configuration file")
    .option("-d, --debug", "Debug output, also written to the log file")
    .option("-v, --verbose", "Informational output")
    .option("-q, --quiet", "Errors only")
    .option("--dry-run", "Print the backend commands instead of running them");

  const execute = async (command: Command, handler: Handler): Promise<void> => {
    let ctx: CliContext | undefined;
    try {
      ctx = createContext(readGlobalOptions(command.optsWithGlobals()), deps);
      setExitCode(await handler(ctx));
    } catch (error) {
      deps.out.error(chalk.red(`✗ ${error instanceof Error ? error.message : String(error)}`));
      ctx?.logger.debug("Command failed", { error });
      setExitCode(exitCodeForError(error));
    } finally {
      await ctx?.logger.flush();
      ctx?.logger.dispose();
    }
  };

  const simple = (name: string, description: string, handler: Handler, isDefault = false) => {
    program
      .command(name, { isDefault })
      .description(description)
      .action(async (_options: OptionValues, command: Command) => execute(command, handler));
  };

  simple("start", "Apply shaping and marking to the configured interface", startCommand);
  simple("stop", "Remove all shaping and marking", stopCommand);
  simple("restart", "Remove, then apply again", restartCommand);
  simple("reload", "Apply the current configuration over the live one", reloadCommand);
  // Runs when no command is given
  simple("status", "Show configuration, class statistics, filters and mark rules", statusCommand, true);

  program
    .command("monitor [seconds]")
    .description("Redraw class statistics every few seconds until interrupted")
    .action(async (seconds: string | undefined, _options: OptionValues, command: Command) =>
      execute(command, (ctx) => monitorCommand(ctx, seconds))
    );

  simple("test", "Check that the live backends hold what was applied", selfTestCommand);
  simple("save", "Write a compressed dump of the live state to the backup directory", saveCommand);

  return program;
}

/**
 * Parse `argv` (node-style, program path first) and run the command.
 */
export async function run(argv: readonly string[], deps: CliDeps = defaultDeps()): Promise<ExitCode> {
  let exitCode: ExitCode = EXIT_CODES.SUCCESS;
  const program = createProgram(deps, (code) => {
    exitCode = code;
  });

  try {
    await program.parseAsync([...argv]);
  } catch (error) {
    if (error instanceof CommanderError) {
      // Help and version output end here with exit code 0
      return error.exitCode === 0 ? EXIT_CODES.SUCCESS : EXIT_CODES.USAGE_ERROR;
    }
    throw error;
  }
  return exitCode;
}
