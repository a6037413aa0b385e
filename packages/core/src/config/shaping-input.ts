/**
 * Translates a loaded configuration into compiler inputs.
 *
 * @module config/shaping-input
 */

import type { AllocationInput, MatchSide, MatchSpec, TierMatchSpecs } from "../shaping/types.js";
import type { MatchEntry, ShapingConfig } from "./schema.js";

export function toAllocationInput(config: ShapingConfig): AllocationInput {
  const reserved: AllocationInput["reserved"][number][] = [];
  const percentage: AllocationInput["percentage"][number][] = [];

  for (const tier of config.tiers) {
    const common = {
      id: tier.id,
      label: tier.label,
      priorityClass: tier.priority,
      ...(tier.parentId === undefined ? {} : { parentId: tier.parentId }),
    };
    if (tier.kind === "reserved") {
      reserved.push({
        ...common,
        rate: tier.rateKbps === undefined ? { percentOfCapacity: tier.ratePercent ?? 0 } : { kbps: tier.rateKbps },
      });
    } else {
      percentage.push({ ...common, sharePercent: tier.sharePercent });
    }
  }

  const fallback = config.defaultTier;
  return {
    capacity: { direction: config.link.direction, rateKbps: config.link.rateKbps },
    reserved,
    percentage,
    defaultTier: {
      id: fallback.id,
      label: fallback.label,
      priorityClass: fallback.priority,
      ...(fallback.sharePercent === undefined ? {} : { sharePercent: fallback.sharePercent }),
    },
    rttMs: config.rttMs,
  };
}

function entryToSpecs(entry: MatchEntry): MatchSpec[] {
  if (!("port" in entry)) {
    return [{ type: "protocol", protocol: entry.protocol }];
  }
  const sides: readonly MatchSide[] = entry.side === "both" ? ["destination", "source"] : [entry.side];
  return sides.map((side): MatchSpec => ({ type: "port", protocol: entry.protocol, ports: entry.port, side }));
}

/**
 * Port and protocol entries in declaration order, then the address set.
 */
export function toMatchSpecs(config: ShapingConfig): TierMatchSpecs {
  const specs = new Map<number, MatchSpec[]>();
  const tiers = [...config.tiers, config.defaultTier];

  for (const tier of tiers) {
    const tierSpecs = tier.match.flatMap(entryToSpecs);
    if (tier.addresses !== undefined) {
      tierSpecs.push({ type: "address", addresses: tier.addresses });
    }
    if (tierSpecs.length > 0) {
      specs.set(tier.id, tierSpecs);
    }
  }

  return specs;
}
