/**
 * Shaping domain types.
 *
 * A configuration compiles into a {@link ClassTree} (HFSC classes with
 * concrete service curves), a {@link RuleSet} (traffic → mark) and a list
 * of {@link FilterRule}s (mark → class). All compiled values are frozen.
 *
 * @module shaping/types
 */

export type Direction = "upload" | "download";

export interface LinkCapacity {
  readonly direction: Direction;
  readonly rateKbps: number;
}

/**
 * Scheduling treatment of a tier, most latency-sensitive first.
 */
export type PriorityClass = "realtime-strict" | "realtime-burstable" | "shared" | "bulk";

export const PRIORITY_ORDER: readonly PriorityClass[] = [
  "realtime-strict",
  "realtime-burstable",
  "shared",
  "bulk",
];

export type TierKind = "reserved" | "percentage";

/** Class id of the link-capacity node every tier descends from. */
export const ROOT_TIER_ID = 1;

/**
 * Largest tier id. Class handles carry the id's decimal digits, which the
 * shaper reads as a 16-bit hex minor.
 */
export const MAX_TIER_ID = 9999;

/** Handle of the root qdisc; classes are `<major>:<tier id>`. */
export const QDISC_MAJOR = 1;

export function classIdFor(tierId: number): string {
  return `${QDISC_MAJOR}:${tierId}`;
}

// ============================================
// Allocation input
// ============================================

export type ReservedRate = { readonly kbps: number } | { readonly percentOfCapacity: number };

export interface ReservedTierRequest {
  readonly id: number;
  readonly label: string;
  readonly priorityClass: PriorityClass;
  readonly rate: ReservedRate;
  /** Defaults to the root */
  readonly parentId?: number;
}

export interface PercentageTierRequest {
  readonly id: number;
  readonly label: string;
  readonly priorityClass: PriorityClass;
  /** Share of the parent's rate, 0–100 */
  readonly sharePercent: number;
  readonly parentId?: number;
}

/**
 * The tier that absorbs unmatched traffic. Always a child of the root.
 * Without an explicit share it takes whatever the root's other
 * percentage tiers leave unclaimed.
 */
export interface DefaultTierRequest {
  readonly id: number;
  readonly label: string;
  readonly priorityClass: PriorityClass;
  readonly sharePercent?: number;
}

export interface AllocationInput {
  readonly capacity: LinkCapacity;
  readonly reserved: readonly ReservedTierRequest[];
  readonly percentage: readonly PercentageTierRequest[];
  readonly defaultTier: DefaultTierRequest;
  /** Round-trip time used to size leaf queues (default 50ms) */
  readonly rttMs?: number;
}

// ============================================
// Compiled tree
// ============================================

/**
 * Two-segment curve: burstRateKbps for burstDurationMs, then sustainedRateKbps.
 */
export interface RealtimeCurve {
  readonly kind: "realtime";
  readonly burstRateKbps: number;
  readonly burstDurationMs: number;
  readonly sustainedRateKbps: number;
}

/**
 * Pure proportional sharing, no latency guarantee.
 */
export interface LinkShareCurve {
  readonly kind: "link-share";
  readonly sustainedRateKbps: number;
}

export type ServiceCurve = RealtimeCurve | LinkShareCurve;

export interface Tier {
  readonly id: number;
  readonly label: string;
  readonly parentId: number;
  readonly kind: TierKind;
  readonly priorityClass: PriorityClass;
  /** Only for percentage tiers */
  readonly sharePercent?: number;
  readonly isDefault: boolean;
  readonly curve: ServiceCurve;
  /** Bandwidth-delay buffer bound for the tier's leaf queue */
  readonly queueLimitBytes: number;
}

export type AllocationWarningCode = "UNCLAIMED_SHARE" | "OVERSUBSCRIBED";

export interface AllocationWarning {
  readonly code: AllocationWarningCode;
  readonly message: string;
  readonly parentId: number;
  readonly value: number;
}

export interface ClassTree {
  readonly capacity: LinkCapacity;
  readonly rootId: number;
  readonly defaultTierId: number;
  /** Parent-before-child order */
  readonly tiers: readonly Tier[];
  readonly warnings: readonly AllocationWarning[];
}

// ============================================
// Classification
// ============================================

export type Protocol = "tcp" | "udp" | "icmp";

export type PortProtocol = "tcp" | "udp";

export type MatchSide = "source" | "destination";

export interface PortRange {
  readonly from: number;
  readonly to: number;
}

/**
 * What a tier matches, as declared in configuration.
 * An address set holds comma-separated hosts or subnets.
 */
export type MatchSpec =
  | {
      readonly type: "port";
      readonly protocol: PortProtocol;
      readonly ports: PortRange;
      readonly side: MatchSide;
    }
  | { readonly type: "protocol"; readonly protocol: Protocol }
  | { readonly type: "address"; readonly addresses: string };

/**
 * A single concrete match. Address sets are expanded into one source and
 * one destination match per host or subnet.
 */
export type RuleMatch =
  | {
      readonly type: "port";
      readonly protocol: PortProtocol;
      readonly ports: PortRange;
      readonly side: MatchSide;
    }
  | { readonly type: "protocol"; readonly protocol: Protocol }
  | { readonly type: "address"; readonly address: string; readonly side: MatchSide };

export interface ClassificationRule {
  readonly match: RuleMatch;
  readonly mark: number;
  /** Lower is evaluated first; first match wins */
  readonly precedence: number;
}

export interface RuleSet {
  readonly rules: readonly ClassificationRule[];
}

/**
 * Routes a marked packet to the tier's class.
 */
export interface FilterRule {
  readonly mark: number;
  readonly tierId: number;
  readonly precedence: number;
}

export type TierMatchSpecs = ReadonlyMap<number, readonly MatchSpec[]>;
