/**
 * Shaping plan: the ordered backend operations that realize a compiled
 * tree and rule set, independent of how they are executed.
 *
 * @module shaping/plan
 */

import { deepFreeze } from "../utils/freeze.js";
import type { ClassificationRule, ClassTree, FilterRule, LinkCapacity, RuleSet, ServiceCurve } from "./types.js";

export type LeafQueueKind = "bfifo" | "none";

export type PlanStep =
  | { readonly op: "clear-marks" }
  | { readonly op: "clear-shaper" }
  | { readonly op: "root"; readonly capacity: LinkCapacity; readonly defaultTierId: number }
  | {
      readonly op: "class";
      readonly tierId: number;
      readonly parentId: number;
      readonly curve: ServiceCurve;
      /** Present when the class gets a byte-limited leaf queue */
      readonly queueLimitBytes?: number;
    }
  | { readonly op: "filter"; readonly filter: FilterRule }
  | { readonly op: "mark"; readonly rule: ClassificationRule };

export type PlanOperation = PlanStep["op"];

export interface ShapingPlan {
  readonly steps: readonly PlanStep[];
}

export interface PlanOptions {
  /** Default: "bfifo" */
  leafQueue?: LeafQueueKind;
}

/**
 * Clears both backends, then builds root → classes (parent first) →
 * filters → mark rules. Starting from a clean slate makes re-applying the
 * same plan converge to the same state.
 */
export function buildPlan(
  tree: ClassTree,
  filters: readonly FilterRule[],
  ruleSet: RuleSet,
  options: PlanOptions = {}
): ShapingPlan {
  const leafQueue = options.leafQueue ?? "bfifo";
  const parents = new Set(tree.tiers.map((tier) => tier.parentId));

  const steps: PlanStep[] = [
    { op: "clear-marks" },
    { op: "clear-shaper" },
    { op: "root", capacity: tree.capacity, defaultTierId: tree.defaultTierId },
  ];

  for (const tier of tree.tiers) {
    const isLeaf = !parents.has(tier.id);
    steps.push({
      op: "class",
      tierId: tier.id,
      parentId: tier.parentId,
      curve: tier.curve,
      ...(isLeaf && leafQueue === "bfifo" ? { queueLimitBytes: tier.queueLimitBytes } : {}),
    });
  }

  for (const filter of filters) {
    steps.push({ op: "filter", filter });
  }
  for (const rule of ruleSet.rules) {
    steps.push({ op: "mark", rule });
  }

  return deepFreeze({ steps });
}

export function countSteps(plan: ShapingPlan, op: PlanOperation): number {
  return plan.steps.filter((step) => step.op === op).length;
}
