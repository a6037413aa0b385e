/**
 * status: configuration summary, per-class statistics, active filters and
 * mark rules.
 *
 * @module cli/commands/status
 */

import chalk from "chalk";
import { type CliContext, createOrchestrator, resolveActiveShaping } from "../context.js";
import { EXIT_CODES, type ExitCode } from "../exit-codes.js";
import { renderStatsTable, renderTierTable, renderWarnings } from "../render.js";

export async function statusCommand(ctx: CliContext): Promise<ExitCode> {
  const { out } = ctx.deps;
  const { compiled, appliedAt } = await resolveActiveShaping(ctx);
  const { capacity } = compiled.tree;

  out.log(chalk.bold(`Interface ${ctx.config.link.interface}, ${capacity.direction} ${capacity.rateKbps} kbit/s`));
  out.log(
    appliedAt
      ? `Applied ${appliedAt.toISOString()}`
      : chalk.yellow("Not applied; showing the configured profile")
  );
  out.log(renderTierTable(compiled.tree));
  for (const line of renderWarnings(compiled.tree)) {
    out.log(line);
  }

  const snapshot = await createOrchestrator(ctx).snapshot(compiled.tree);
  out.log(chalk.bold("Class statistics"));
  out.log(renderStatsTable(snapshot));

  out.log(chalk.bold("Filters"));
  out.log((await ctx.backends.inspector.describeFilters()).trimEnd());
  out.log(chalk.bold("Mark rules"));
  out.log((await ctx.backends.inspector.describeMarkCounters()).trimEnd());

  return EXIT_CODES.SUCCESS;
}
