import { describe, expect, it } from "vitest";
import { AllocationError } from "../../errors/shaping.js";
import { compileAllocation } from "../allocation.js";
import type { AllocationInput, PercentageTierRequest } from "../types.js";
import { sampleInput } from "./fixtures.js";

function rates(input: AllocationInput): Record<string, number> {
  const tree = compileAllocation(input);
  return Object.fromEntries(tree.tiers.map((tier) => [tier.label, tier.curve.sustainedRateKbps]));
}

function withPercentage(
  percentage: PercentageTierRequest[],
  defaultShare?: number,
  rateKbps = 1000
): AllocationInput {
  return {
    capacity: { direction: "upload", rateKbps },
    reserved: [],
    percentage,
    defaultTier: { id: 999, label: "Default", priorityClass: "bulk", sharePercent: defaultShare },
  };
}

describe("compileAllocation", () => {
  describe("rates", () => {
    it("computes the reference profile", () => {
      expect(rates(sampleInput())).toEqual({
        Interactive: 100,
        VoIP: 200,
        High: 500,
        Medium: 250,
        Low: 120,
        Default: 130,
      });
    });

    it("gives a burstable High tier a 750 kbit/s burst", () => {
      const tree = compileAllocation(sampleInput("realtime-burstable"));
      const high = tree.tiers.find((tier) => tier.id === 100);

      expect(high?.curve).toEqual({ kind: "realtime", burstRateKbps: 750, burstDurationMs: 20, sustainedRateKbps: 500 });
    });

    it("gives a shared High tier no burst segment", () => {
      const tree = compileAllocation(sampleInput("shared"));
      const high = tree.tiers.find((tier) => tier.id === 100);

      expect(high?.curve).toEqual({ kind: "link-share", sustainedRateKbps: 500 });
    });

    it("sizes reserved percent-of-capacity tiers against the whole link", () => {
      const input: AllocationInput = {
        ...withPercentage([], undefined, 2000),
        reserved: [{ id: 20, label: "VoIP", priorityClass: "realtime-strict", rate: { percentOfCapacity: 20 } }],
      };

      expect(rates(input)).toEqual({ VoIP: 400, Default: 2000 });
    });

    it("takes nested shares from the parent's rate", () => {
      const input: AllocationInput = {
        capacity: { direction: "upload", rateKbps: 1000 },
        reserved: [{ id: 5, label: "Office", priorityClass: "shared", rate: { kbps: 600 } }],
        percentage: [
          { id: 51, label: "Desks", priorityClass: "shared", sharePercent: 50, parentId: 5 },
          { id: 52, label: "Printers", priorityClass: "bulk", sharePercent: 25, parentId: 5 },
        ],
        defaultTier: { id: 999, label: "Default", priorityClass: "bulk" },
      };

      const tree = compileAllocation(input);

      expect(tree.tiers.map((tier) => [tier.id, tier.parentId, tier.curve.sustainedRateKbps])).toEqual([
        [5, 1, 600],
        [999, 1, 1000],
        [51, 5, 300],
        [52, 5, 150],
      ]);
    });

    it("keeps percentage totals within capacity", () => {
      const shareSets = [[33, 33, 33], [12.5, 12.5, 25, 40], [1, 2, 3, 4, 80], [99], [7, 11, 13, 17, 19, 23]];

      for (const shares of shareSets) {
        const defaultShare = 100 - shares.reduce((sum, share) => sum + share, 0);
        for (const capacity of [1, 97, 1000, 12_345]) {
          const percentage = shares.map((sharePercent, index) => ({
            id: 100 + index,
            label: `T${index}`,
            priorityClass: "shared" as const,
            sharePercent,
          }));
          const input = withPercentage(percentage, defaultShare, capacity);
          if ([...shares, defaultShare].some((share) => Math.floor((capacity * share) / 100) <= 0)) {
            expect(() => compileAllocation(input)).toThrow(AllocationError);
            continue;
          }

          const tree = compileAllocation(input);
          const total = tree.tiers
            .filter((tier) => tier.kind === "percentage")
            .reduce((sum, tier) => sum + tier.curve.sustainedRateKbps, 0);
          expect(total).toBeLessThanOrEqual(capacity);
        }
      }
    });
  });

  describe("default tier", () => {
    it("takes the unclaimed remainder when no share is configured", () => {
      const tree = compileAllocation(
        withPercentage([{ id: 100, label: "High", priorityClass: "shared", sharePercent: 60 }])
      );
      const fallback = tree.tiers.find((tier) => tier.isDefault);

      expect(fallback).toMatchObject({ id: 999, sharePercent: 40, parentId: 1 });
      expect(fallback?.curve.sustainedRateKbps).toBe(400);
      expect(tree.defaultTierId).toBe(999);
      expect(tree.warnings).toEqual([]);
    });

    it("fails when the root shares leave nothing for it", () => {
      expect(() =>
        compileAllocation(withPercentage([{ id: 100, label: "All", priorityClass: "shared", sharePercent: 100 }]))
      ).toThrow("No share left for default tier 999: root tiers claim 100%");
    });
  });

  describe("validation", () => {
    it("rejects sibling shares of 60 and 50", () => {
      const input: AllocationInput = {
        capacity: { direction: "upload", rateKbps: 1000 },
        reserved: [{ id: 5, label: "Office", priorityClass: "shared", rate: { kbps: 500 } }],
        percentage: [
          { id: 51, label: "A", priorityClass: "shared", sharePercent: 60, parentId: 5 },
          { id: 52, label: "B", priorityClass: "shared", sharePercent: 50, parentId: 5 },
        ],
        defaultTier: { id: 999, label: "Default", priorityClass: "bulk" },
      };

      expect(() => compileAllocation(input)).toThrow(AllocationError);
      expect(() => compileAllocation(input)).toThrow("Shares under parent 5 sum to 110%, above 100%");
    });

    it("rejects root shares above 100 including the default share", () => {
      const input = withPercentage(
        [
          { id: 100, label: "A", priorityClass: "shared", sharePercent: 60 },
          { id: 200, label: "B", priorityClass: "shared", sharePercent: 30 },
        ],
        20
      );

      expect(() => compileAllocation(input)).toThrow("Shares under parent 1 sum to 110%, above 100%");
    });

    it("rejects a tier that computes to zero", () => {
      const input = withPercentage([{ id: 100, label: "Tiny", priorityClass: "bulk", sharePercent: 0.05 }], 50);

      expect(() => compileAllocation(input)).toThrow('Tier 100 ("Tiny") computes to 0 kbit/s');
    });

    it("rejects a single tier above link capacity", () => {
      const input: AllocationInput = {
        ...withPercentage([], 100),
        reserved: [{ id: 10, label: "Huge", priorityClass: "realtime-strict", rate: { kbps: 1500 } }],
      };

      expect(() => compileAllocation(input)).toThrow(
        'Tier 10 ("Huge") needs 1500 kbit/s, above link capacity 1000 kbit/s'
      );
    });

    it("rejects non-positive capacity", () => {
      expect(() => compileAllocation(withPercentage([], 100, 0))).toThrow("Link capacity must be positive, got 0");
    });

    it("rejects duplicate ids and the root id", () => {
      const duplicate = withPercentage(
        [
          { id: 100, label: "A", priorityClass: "shared", sharePercent: 10 },
          { id: 100, label: "B", priorityClass: "shared", sharePercent: 10 },
        ],
        10
      );
      const root = withPercentage([{ id: 1, label: "Root", priorityClass: "shared", sharePercent: 10 }], 10);

      expect(() => compileAllocation(duplicate)).toThrow("Duplicate tier id 100");
      expect(() => compileAllocation(root)).toThrow('Tier "Root" uses id 1, which is reserved for the link root');
    });

    it("rejects an unknown parent", () => {
      const input = withPercentage(
        [{ id: 100, label: "Orphan", priorityClass: "shared", sharePercent: 10, parentId: 42 }],
        100
      );

      expect(() => compileAllocation(input)).toThrow("Tier 100 references unknown parent 42");
    });

    it("rejects tiers with no path to the root", () => {
      const input: AllocationInput = {
        ...withPercentage([], 100),
        reserved: [
          { id: 5, label: "A", priorityClass: "shared", rate: { kbps: 100 }, parentId: 6 },
          { id: 6, label: "B", priorityClass: "shared", rate: { kbps: 100 }, parentId: 5 },
        ],
      };

      expect(() => compileAllocation(input)).toThrow("Tier 5 has no reachable path to the root");
    });

    it("carries the offending values in the error context", () => {
      try {
        compileAllocation(withPercentage([{ id: 100, label: "Tiny", priorityClass: "bulk", sharePercent: 0.05 }], 50));
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(AllocationError);
        if (error instanceof AllocationError) {
          expect(error.context).toEqual({ tierId: 100, rateKbps: 0 });
        }
      }
    });
  });

  describe("warnings", () => {
    it("warns about unclaimed share", () => {
      const tree = compileAllocation(withPercentage([{ id: 100, label: "A", priorityClass: "shared", sharePercent: 40 }], 30));

      expect(tree.warnings).toEqual([
        {
          code: "UNCLAIMED_SHARE",
          message: "Shares under parent 1 sum to 70%; 30% stays unclaimed",
          parentId: 1,
          value: 30,
        },
      ]);
    });

    it("warns when reserved and percentage tiers oversubscribe the link", () => {
      const tree = compileAllocation(sampleInput());

      expect(tree.warnings).toEqual([
        {
          code: "OVERSUBSCRIBED",
          message: "Guaranteed rates under parent 1 total 1300 kbit/s, above its 1000 kbit/s",
          parentId: 1,
          value: 1300,
        },
      ]);
    });
  });

  describe("tree shape", () => {
    it("orders tiers parent-before-child and marks the default tier", () => {
      const tree = compileAllocation(sampleInput());

      expect(tree.rootId).toBe(1);
      expect(tree.tiers.map((tier) => tier.id)).toEqual([10, 20, 100, 200, 300, 999]);
      expect(tree.tiers.filter((tier) => tier.isDefault).map((tier) => tier.id)).toEqual([999]);
    });

    it("sizes queue limits from each tier's rate", () => {
      const tree = compileAllocation({ ...sampleInput(), rttMs: 100 });

      // High: 500 × 100 / 8 = 6250 → 9375
      expect(tree.tiers.find((tier) => tier.id === 100)?.queueLimitBytes).toBe(9375);
      expect(tree.tiers.find((tier) => tier.id === 10)?.queueLimitBytes).toBe(4096);
    });

    it("is deterministic and frozen", () => {
      const first = compileAllocation(sampleInput());
      const second = compileAllocation(sampleInput());

      expect(second).toEqual(first);
      expect(Object.isFrozen(first.tiers)).toBe(true);
      expect(Object.isFrozen(first.tiers[0]?.curve)).toBe(true);
    });
  });
});
