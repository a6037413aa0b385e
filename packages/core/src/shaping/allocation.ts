/**
 * AllocationCompiler: turns link capacity and tier requests into a
 * validated class tree with concrete curves and queue limits.
 *
 * Reserved tiers are sized against total capacity. Percentage tiers take
 * their share of the parent's rate, and root-level percentages are not
 * reduced by reserved allocations, so nominal totals may exceed capacity.
 * Link sharing arbitrates at runtime; the compiler only reports it.
 *
 * @module shaping/allocation
 */

import { AllocationError } from "../errors/shaping.js";
import { deepFreeze } from "../utils/freeze.js";
import { DEFAULT_RTT_MS, sizeBuffer } from "./buffer.js";
import { parameterizeCurve } from "./curve.js";
import {
  type AllocationInput,
  type AllocationWarning,
  type ClassTree,
  MAX_TIER_ID,
  type PriorityClass,
  type ReservedRate,
  ROOT_TIER_ID,
  type Tier,
} from "./types.js";

interface TierNode {
  readonly id: number;
  readonly label: string;
  readonly priorityClass: PriorityClass;
  readonly parentId: number;
  readonly isDefault: boolean;
  readonly request:
    | { readonly kind: "reserved"; readonly rate: ReservedRate }
    | { readonly kind: "percentage"; readonly sharePercent: number };
}

/** Share sums are compared after rounding away float noise */
function roundShare(value: number): number {
  return Math.round(value * 1e6) / 1e6;
}

function collectNodes(input: AllocationInput): TierNode[] {
  const nodes: TierNode[] = [];

  for (const tier of input.reserved) {
    nodes.push({
      id: tier.id,
      label: tier.label,
      priorityClass: tier.priorityClass,
      parentId: tier.parentId ?? ROOT_TIER_ID,
      isDefault: false,
      request: { kind: "reserved", rate: tier.rate },
    });
  }

  for (const tier of input.percentage) {
    nodes.push({
      id: tier.id,
      label: tier.label,
      priorityClass: tier.priorityClass,
      parentId: tier.parentId ?? ROOT_TIER_ID,
      isDefault: false,
      request: { kind: "percentage", sharePercent: tier.sharePercent },
    });
  }

  const fallback = input.defaultTier;
  const rootShares = nodes.reduce(
    (sum, node) =>
      node.parentId === ROOT_TIER_ID && node.request.kind === "percentage" ? sum + node.request.sharePercent : sum,
    0
  );
  const defaultShare = fallback.sharePercent ?? roundShare(100 - rootShares);
  if (fallback.sharePercent === undefined && defaultShare <= 0) {
    throw new AllocationError(`No share left for default tier ${fallback.id}: root tiers claim ${rootShares}%`, {
      tierId: fallback.id,
      claimedPercent: rootShares,
    });
  }

  nodes.push({
    id: fallback.id,
    label: fallback.label,
    priorityClass: fallback.priorityClass,
    parentId: ROOT_TIER_ID,
    isDefault: true,
    request: { kind: "percentage", sharePercent: defaultShare },
  });

  return nodes;
}

function validateIds(nodes: readonly TierNode[]): void {
  const seen = new Set<number>();
  for (const node of nodes) {
    if (node.id === ROOT_TIER_ID) {
      throw new AllocationError(`Tier "${node.label}" uses id ${ROOT_TIER_ID}, which is reserved for the link root`, {
        tierId: node.id,
      });
    }
    if (!Number.isInteger(node.id) || node.id < 1 || node.id > MAX_TIER_ID) {
      throw new AllocationError(`Tier "${node.label}" has invalid id ${node.id}`, { tierId: node.id });
    }
    if (seen.has(node.id)) {
      throw new AllocationError(`Duplicate tier id ${node.id}`, { tierId: node.id });
    }
    seen.add(node.id);
  }
}

function validateTopology(nodes: readonly TierNode[]): void {
  const byId = new Map(nodes.map((node) => [node.id, node]));

  for (const node of nodes) {
    if (node.parentId !== ROOT_TIER_ID && !byId.has(node.parentId)) {
      throw new AllocationError(`Tier ${node.id} references unknown parent ${node.parentId}`, {
        tierId: node.id,
        parentId: node.parentId,
      });
    }
  }

  for (const node of nodes) {
    const visited = new Set<number>([node.id]);
    let parentId = node.parentId;
    while (parentId !== ROOT_TIER_ID) {
      const parent = byId.get(parentId);
      if (!parent || visited.has(parentId)) {
        throw new AllocationError(`Tier ${node.id} has no reachable path to the root`, {
          tierId: node.id,
          parentId: node.parentId,
        });
      }
      visited.add(parentId);
      parentId = parent.parentId;
    }
  }
}

function childrenByParent(nodes: readonly TierNode[]): Map<number, TierNode[]> {
  const children = new Map<number, TierNode[]>();
  for (const node of nodes) {
    const siblings = children.get(node.parentId) ?? [];
    siblings.push(node);
    children.set(node.parentId, siblings);
  }
  return children;
}

/** Breadth-first from the root, siblings in declaration order */
function orderParentFirst(children: ReadonlyMap<number, readonly TierNode[]>): TierNode[] {
  const ordered: TierNode[] = [];
  const queue: number[] = [ROOT_TIER_ID];
  while (queue.length > 0) {
    const parentId = queue.shift() ?? ROOT_TIER_ID;
    for (const child of children.get(parentId) ?? []) {
      ordered.push(child);
      queue.push(child.id);
    }
  }
  return ordered;
}

function siblingShare(siblings: readonly TierNode[]): number {
  return roundShare(
    siblings.reduce((sum, node) => (node.request.kind === "percentage" ? sum + node.request.sharePercent : sum), 0)
  );
}

function computeRate(node: TierNode, capacityKbps: number, parentRateKbps: number): number {
  const request = node.request;
  if (request.kind === "percentage") {
    return Math.floor((parentRateKbps * request.sharePercent) / 100);
  }
  if ("kbps" in request.rate) {
    return request.rate.kbps;
  }
  return Math.floor((capacityKbps * request.rate.percentOfCapacity) / 100);
}

/**
 * Compiles tier requests into a frozen {@link ClassTree}.
 *
 * @throws AllocationError on non-positive or over-capacity rates, sibling
 *   shares above 100%, duplicate or reserved ids, unknown parents, cycles
 * @throws InvalidCurveError when a curve cannot be built
 */
export function compileAllocation(input: AllocationInput): ClassTree {
  const capacityKbps = input.capacity.rateKbps;
  if (!Number.isFinite(capacityKbps) || capacityKbps <= 0) {
    throw new AllocationError(`Link capacity must be positive, got ${capacityKbps}`, { capacityKbps });
  }
  const rttMs = input.rttMs ?? DEFAULT_RTT_MS;

  const nodes = collectNodes(input);
  validateIds(nodes);
  validateTopology(nodes);

  const children = childrenByParent(nodes);
  const warnings: AllocationWarning[] = [];

  for (const [parentId, siblings] of children) {
    if (!siblings.some((node) => node.request.kind === "percentage")) {
      continue;
    }
    const total = siblingShare(siblings);
    if (total > 100) {
      throw new AllocationError(`Shares under parent ${parentId} sum to ${total}%, above 100%`, {
        parentId,
        totalPercent: total,
        tierIds: siblings.map((node) => node.id),
      });
    }
    if (total < 100) {
      warnings.push({
        code: "UNCLAIMED_SHARE",
        message: `Shares under parent ${parentId} sum to ${total}%; ${roundShare(100 - total)}% stays unclaimed`,
        parentId,
        value: roundShare(100 - total),
      });
    }
  }

  const rates = new Map<number, number>([[ROOT_TIER_ID, capacityKbps]]);
  const tiers: Tier[] = [];

  for (const node of orderParentFirst(children)) {
    const parentRate = rates.get(node.parentId) ?? capacityKbps;
    const rateKbps = computeRate(node, capacityKbps, parentRate);

    if (!Number.isFinite(rateKbps) || rateKbps <= 0) {
      throw new AllocationError(`Tier ${node.id} ("${node.label}") computes to ${rateKbps} kbit/s`, {
        tierId: node.id,
        rateKbps,
      });
    }
    if (rateKbps > capacityKbps) {
      throw new AllocationError(
        `Tier ${node.id} ("${node.label}") needs ${rateKbps} kbit/s, above link capacity ${capacityKbps} kbit/s`,
        { tierId: node.id, rateKbps, capacityKbps }
      );
    }

    rates.set(node.id, rateKbps);
    tiers.push({
      id: node.id,
      label: node.label,
      parentId: node.parentId,
      kind: node.request.kind,
      priorityClass: node.priorityClass,
      ...(node.request.kind === "percentage" ? { sharePercent: node.request.sharePercent } : {}),
      isDefault: node.isDefault,
      curve: parameterizeCurve(node.priorityClass, rateKbps),
      queueLimitBytes: sizeBuffer(rateKbps, rttMs),
    });
  }

  for (const [parentId, siblings] of children) {
    const parentRate = rates.get(parentId) ?? capacityKbps;
    const nominal = siblings.reduce((sum, node) => sum + (rates.get(node.id) ?? 0), 0);
    if (nominal > parentRate) {
      warnings.push({
        code: "OVERSUBSCRIBED",
        message: `Guaranteed rates under parent ${parentId} total ${nominal} kbit/s, above its ${parentRate} kbit/s`,
        parentId,
        value: nominal,
      });
    }
  }

  return deepFreeze({
    capacity: { ...input.capacity },
    rootId: ROOT_TIER_ID,
    defaultTierId: input.defaultTier.id,
    tiers,
    warnings,
  });
}
