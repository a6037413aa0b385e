export { compileAllocation } from "./allocation.js";
export type { MarkingBackend, ShaperBackend, ShapingInspector } from "./backend.js";
export { DEFAULT_RTT_MS, MAX_BUFFER_BYTES, MIN_BUFFER_BYTES, sizeBuffer } from "./buffer.js";
export { type CompiledShaping, compileShaping } from "./compile.js";
export {
  BURSTABLE_BURST_MS,
  BURSTABLE_BURST_MULTIPLIER,
  parameterizeCurve,
  STRICT_BURST_MS,
  STRICT_BURST_MULTIPLIER,
} from "./curve.js";
export { executePlan, type PlanBackends } from "./executor.js";
export { type SessionGuard, SessionLock } from "./lock.js";
export { Orchestrator, type OrchestratorOptions, type ShapingSession } from "./orchestrator.js";
export {
  buildPlan,
  countSteps,
  type LeafQueueKind,
  type PlanOperation,
  type PlanOptions,
  type PlanStep,
  type ShapingPlan,
} from "./plan.js";
export {
  compileFilters,
  compileRuleSet,
  expandMatchSpec,
  isValidAddress,
  orderTiersByPriority,
  parseAddressSet,
} from "./rules.js";
export { runSelfTest, type SelfTestCheck, type SelfTestReport } from "./self-test.js";
export {
  type AllocationInput,
  type AllocationWarning,
  type AllocationWarningCode,
  type ClassificationRule,
  type ClassTree,
  classIdFor,
  type DefaultTierRequest,
  type Direction,
  type FilterRule,
  type LinkCapacity,
  type LinkShareCurve,
  type MatchSide,
  type MatchSpec,
  MAX_TIER_ID,
  type PercentageTierRequest,
  type PortProtocol,
  type PortRange,
  PRIORITY_ORDER,
  type PriorityClass,
  type Protocol,
  QDISC_MAJOR,
  type RealtimeCurve,
  type ReservedRate,
  type ReservedTierRequest,
  ROOT_TIER_ID,
  type RuleMatch,
  type RuleSet,
  type ServiceCurve,
  type Tier,
  type TierKind,
  type TierMatchSpecs,
} from "./types.js";
