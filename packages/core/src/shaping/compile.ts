/**
 * Configuration → everything needed to apply it, with no side effects.
 *
 * @module shaping/compile
 */

import type { ShapingConfig } from "../config/schema.js";
import { toAllocationInput, toMatchSpecs } from "../config/shaping-input.js";
import { compileAllocation } from "./allocation.js";
import { buildPlan, type ShapingPlan } from "./plan.js";
import { compileFilters, compileRuleSet } from "./rules.js";
import type { ClassTree, FilterRule, RuleSet } from "./types.js";

export interface CompiledShaping {
  readonly tree: ClassTree;
  readonly filters: readonly FilterRule[];
  readonly ruleSet: RuleSet;
  readonly plan: ShapingPlan;
}

/**
 * @throws AllocationError, InvalidCurveError or ClassificationError
 */
export function compileShaping(config: ShapingConfig): CompiledShaping {
  const tree = compileAllocation(toAllocationInput(config));
  const ruleSet = compileRuleSet(tree, toMatchSpecs(config));
  const filters = compileFilters(tree);
  const plan = buildPlan(tree, filters, ruleSet, { leafQueue: config.leafQueue });
  return { tree, filters, ruleSet, plan };
}
