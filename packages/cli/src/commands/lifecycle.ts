/**
 * start, stop, restart and reload.
 *
 * @module cli/commands/lifecycle
 */

import { RecordingRunner, collectStateDump, formatStateDump } from "@tierlink/backend";
import {
  BackendCommandError,
  BackendUnavailableError,
  type Orchestrator,
  runSelfTest,
} from "@tierlink/core";
import chalk from "chalk";
import { writeBackup } from "../backups.js";
import { type CliContext, createOrchestrator } from "../context.js";
import { EXIT_CODES, type ExitCode } from "../exit-codes.js";
import { requireRoot } from "../privilege.js";
import { renderSelfTest, renderStatsTable } from "../render.js";

function printDryRun(ctx: CliContext): void {
  const { runner } = ctx.backends;
  if (!(runner instanceof RecordingRunner)) {
    return;
  }
  ctx.deps.out.log(chalk.bold("# Commands that would run:"));
  for (const line of runner.lines) {
    ctx.deps.out.log(line);
  }
}

/**
 * The interface must exist and tc must run before anything is cleared.
 */
async function checkInterface(ctx: CliContext): Promise<void> {
  const device = ctx.config.link.interface;
  try {
    await ctx.backends.inspector.describeQdiscs();
  } catch (error) {
    if (error instanceof BackendCommandError) {
      const reason = error.stderr.trim() || error.message;
      throw new BackendUnavailableError(`Interface ${device} is not available: ${reason}`, {
        cause: error,
        context: { interface: device },
      });
    }
    throw error;
  }
}

/**
 * Keep a dump of whatever is live before it is cleared. A failed backup
 * does not stop the apply.
 */
async function backupLiveState(ctx: CliContext): Promise<void> {
  try {
    const at = ctx.deps.now();
    const dump = formatStateDump(await collectStateDump(ctx.backends.inspector), at);
    const { path } = await writeBackup(ctx.config.state.backupDir, dump, at, ctx.config.state.backupsKept);
    ctx.logger.info(`Saved the previous state to ${path}`);
  } catch (error) {
    ctx.logger.warn("Could not back up the previous state", { error });
  }
}

async function prepare(ctx: CliContext): Promise<void> {
  if (ctx.dryRun) {
    return;
  }
  await checkInterface(ctx);
  await backupLiveState(ctx);
}

async function printStatistics(ctx: CliContext, orchestrator: Orchestrator): Promise<void> {
  try {
    const snapshot = await orchestrator.snapshot();
    ctx.deps.out.log(chalk.bold("Class statistics"));
    ctx.deps.out.log(renderStatsTable(snapshot));
  } catch (error) {
    if (!(error instanceof BackendUnavailableError)) {
      throw error;
    }
    ctx.logger.warn(error.message);
  }
}

/**
 * Applies the configuration, then checks the live backends against it.
 * A failed check fails the command, but the session stays recorded since
 * the state is live.
 */
async function apply(ctx: CliContext, orchestrator: Orchestrator, verb: string): Promise<ExitCode> {
  const { out } = ctx.deps;
  const device = ctx.config.link.interface;
  const session = await orchestrator.reconfigure(ctx.config);

  if (ctx.dryRun) {
    printDryRun(ctx);
    return EXIT_CODES.SUCCESS;
  }

  await ctx.store.save(session, ctx.config);

  const report = await runSelfTest(session.tree, session.filters, session.ruleSet, ctx.backends.inspector);
  if (!report.passed) {
    for (const line of renderSelfTest(report)) {
      out.log(line);
    }
    out.error(chalk.red(`✗ Shaping ${verb} on ${device} but the live state does not match`));
    return EXIT_CODES.ERROR;
  }

  await printStatistics(ctx, orchestrator);
  out.log(
    chalk.green(
      `✓ Shaping ${verb} on ${device}: ${session.tree.tiers.length} tiers, ` +
        `${session.filters.length} filters, ${session.ruleSet.rules.length} mark rules`
    )
  );
  return EXIT_CODES.SUCCESS;
}

export async function startCommand(ctx: CliContext): Promise<ExitCode> {
  requireRoot("start", ctx.deps.getuid(), ctx.dryRun);
  const orchestrator = createOrchestrator(ctx);
  await prepare(ctx);
  return apply(ctx, orchestrator, "started");
}

/**
 * Applies the current configuration over whatever is live.
 */
export async function reloadCommand(ctx: CliContext): Promise<ExitCode> {
  requireRoot("reload", ctx.deps.getuid(), ctx.dryRun);
  const orchestrator = createOrchestrator(ctx);
  await prepare(ctx);
  return apply(ctx, orchestrator, "reloaded");
}

async function teardown(ctx: CliContext, orchestrator: Orchestrator): Promise<void> {
  await orchestrator.teardown();
  if (!ctx.dryRun) {
    await ctx.store.remove();
  }
}

export async function stopCommand(ctx: CliContext): Promise<ExitCode> {
  requireRoot("stop", ctx.deps.getuid(), ctx.dryRun);
  await teardown(ctx, createOrchestrator(ctx));
  if (ctx.dryRun) {
    printDryRun(ctx);
  } else {
    ctx.deps.out.log(chalk.green(`✓ Shaping removed from ${ctx.config.link.interface}`));
  }
  return EXIT_CODES.SUCCESS;
}

export async function restartCommand(ctx: CliContext): Promise<ExitCode> {
  requireRoot("restart", ctx.deps.getuid(), ctx.dryRun);
  const orchestrator = createOrchestrator(ctx);
  await prepare(ctx);
  await teardown(ctx, orchestrator);
  return apply(ctx, orchestrator, "restarted");
}
