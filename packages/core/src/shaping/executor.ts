/**
 * Runs a shaping plan against the backends, one step at a time.
 *
 * @module shaping/executor
 */

import { BackendApplyError } from "../errors/shaping.js";
import type { Logger } from "../logger/logger.js";
import type { MarkingBackend, ShaperBackend } from "./backend.js";
import type { PlanStep, ShapingPlan } from "./plan.js";

export interface PlanBackends {
  readonly shaper: ShaperBackend;
  readonly marking: MarkingBackend;
}

async function runStep(step: PlanStep, backends: PlanBackends): Promise<void> {
  switch (step.op) {
    case "clear-marks":
      return backends.marking.clearMarkRules();
    case "clear-shaper":
      return backends.shaper.clearAll();
    case "root":
      return backends.shaper.applyRoot(step.capacity, step.defaultTierId);
    case "class":
      return backends.shaper.applyClass(step.tierId, step.parentId, step.curve, step.queueLimitBytes);
    case "filter":
      return backends.shaper.applyFilter(step.filter);
    case "mark":
      return backends.marking.applyMarkRule(step.rule);
  }
}

/**
 * Executes every step in order and stops at the first failure.
 *
 * @returns the number of steps applied
 * @throws BackendApplyError naming the failed step
 */
export async function executePlan(plan: ShapingPlan, backends: PlanBackends, logger?: Logger): Promise<number> {
  for (const [index, step] of plan.steps.entries()) {
    logger?.trace(`Plan step ${index}: ${step.op}`);
    try {
      await runStep(step, backends);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new BackendApplyError(`Step ${index} (${step.op}) failed: ${reason}`, index, step.op, {
        cause: error instanceof Error ? error : undefined,
      });
    }
  }
  logger?.debug(`Applied ${plan.steps.length} plan steps`);
  return plan.steps.length;
}
