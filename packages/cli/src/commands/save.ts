/**
 * save: gzip a dump of the live shaping state into the backup directory.
 *
 * @module cli/commands/save
 */

import { join } from "node:path";
import { collectStateDump, formatStateDump } from "@tierlink/backend";
import chalk from "chalk";
import { backupFileName, writeBackup } from "../backups.js";
import type { CliContext } from "../context.js";
import { EXIT_CODES, type ExitCode } from "../exit-codes.js";
import { requireRoot } from "../privilege.js";

export async function saveCommand(ctx: CliContext): Promise<ExitCode> {
  requireRoot("save", ctx.deps.getuid(), ctx.dryRun);
  const { backupDir, backupsKept } = ctx.config.state;
  const at = ctx.deps.now();

  if (ctx.dryRun) {
    ctx.deps.out.log(`Would write ${join(backupDir, backupFileName(at))}`);
    return EXIT_CODES.SUCCESS;
  }

  const dump = formatStateDump(await collectStateDump(ctx.backends.inspector), at);
  const { path, removed } = await writeBackup(backupDir, dump, at, backupsKept);
  ctx.deps.out.log(chalk.green(`✓ Saved ${path}`));
  if (removed.length > 0) {
    ctx.logger.info(`Removed ${removed.length} old backups`, { removed });
  }
  return EXIT_CODES.SUCCESS;
}
