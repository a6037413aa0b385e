/**
 * test: compare the live backends against the applied session.
 *
 * @module cli/commands/self-test
 */

import { runSelfTest } from "@tierlink/core";
import { type CliContext, resolveActiveShaping } from "../context.js";
import { EXIT_CODES, type ExitCode } from "../exit-codes.js";
import { renderSelfTest } from "../render.js";

export async function selfTestCommand(ctx: CliContext): Promise<ExitCode> {
  const { compiled } = await resolveActiveShaping(ctx);
  const report = await runSelfTest(compiled.tree, compiled.filters, compiled.ruleSet, ctx.backends.inspector);

  for (const line of renderSelfTest(report)) {
    ctx.deps.out.log(line);
  }
  return report.passed ? EXIT_CODES.SUCCESS : EXIT_CODES.ERROR;
}
