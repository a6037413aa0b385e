/**
 * monitor [seconds]: redraw class statistics until interrupted.
 *
 * @module cli/commands/monitor
 */

import { CONFIG_DEFAULTS } from "@tierlink/core";
import chalk from "chalk";
import { type CliContext, createOrchestrator, resolveActiveShaping } from "../context.js";
import { EXIT_CODES, type ExitCode } from "../exit-codes.js";
import { renderStatsTable } from "../render.js";

/**
 * @returns undefined for anything but a positive number
 */
export function parseInterval(value: string | undefined): number | undefined {
  if (value === undefined) {
    return CONFIG_DEFAULTS.monitorIntervalSeconds;
  }
  const seconds = Number(value.trim());
  return value.trim() !== "" && Number.isFinite(seconds) && seconds > 0 ? seconds : undefined;
}

export async function monitorCommand(ctx: CliContext, interval: string | undefined): Promise<ExitCode> {
  const { out } = ctx.deps;
  const seconds = parseInterval(interval);
  if (seconds === undefined) {
    out.error(chalk.red(`✗ Interval must be a positive number of seconds, got "${interval ?? ""}"`));
    return EXIT_CODES.USAGE_ERROR;
  }

  const { compiled } = await resolveActiveShaping(ctx);
  const orchestrator = createOrchestrator(ctx);

  for await (const result of orchestrator.watch(seconds, ctx.deps.signal, compiled.tree)) {
    out.clear?.();
    if (result.ok) {
      out.log(chalk.bold(`${ctx.config.link.interface} at ${result.value.capturedAt.toISOString()} (every ${seconds}s)`));
      out.log(renderStatsTable(result.value));
    } else {
      out.error(chalk.red(`✗ ${result.error.message}`));
    }
  }

  return EXIT_CODES.SUCCESS;
}
