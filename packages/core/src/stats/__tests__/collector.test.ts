import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { BackendUnavailableError } from "../../errors/shaping.js";
import { compileAllocation } from "../../shaping/allocation.js";
import { StatsCollector } from "../collector.js";
import { UNKNOWN } from "../types.js";

const capturedAt = new Date("2026-03-01T08:30:00Z");

const tree = compileAllocation({
  capacity: { direction: "upload", rateKbps: 1000 },
  reserved: [{ id: 10, label: "Interactive", priorityClass: "realtime-strict", rate: { kbps: 100 } }],
  percentage: [{ id: 100, label: "High", priorityClass: "shared", sharePercent: 60 }],
  defaultTier: { id: 999, label: "Default", priorityClass: "bulk" },
});

const LISTING = `class hfsc 1:100 parent 1:1 leaf 8002:
 Sent 5000 bytes 50 pkt (dropped 2, overlimits 0 requeues 0)
 rate 40Kbit 4pps backlog 0b 0p requeues 0
class hfsc 1:7 parent 1:1
 Sent 10 bytes 1 pkt (dropped 0, overlimits 0 requeues 0)
class hfsc 1:10 parent 1:1 leaf 8001:
 Sent 300 bytes 3 pkt (dropped 0, overlimits 0 requeues 0)
`;

describe("StatsCollector", () => {
  describe("snapshot", () => {
    it("returns tree classes in tree order, then extra classes", async () => {
      const collector = new StatsCollector({ readCounters: async () => LISTING }, { tree, now: () => capturedAt });

      const snapshot = await collector.snapshot();

      expect(snapshot.capturedAt).toBe(capturedAt);
      expect(snapshot.classes).toEqual([
        {
          classId: "1:1",
          label: "Link",
          packets: UNKNOWN,
          bytes: UNKNOWN,
          droppedPackets: UNKNOWN,
          currentRateKbps: UNKNOWN,
          capturedAt,
        },
        {
          classId: "1:10",
          label: "Interactive",
          packets: 3,
          bytes: 300,
          droppedPackets: 0,
          currentRateKbps: UNKNOWN,
          capturedAt,
        },
        {
          classId: "1:100",
          label: "High",
          packets: 50,
          bytes: 5000,
          droppedPackets: 2,
          currentRateKbps: 40,
          capturedAt,
        },
        {
          classId: "1:999",
          label: "Default",
          packets: UNKNOWN,
          bytes: UNKNOWN,
          droppedPackets: UNKNOWN,
          currentRateKbps: UNKNOWN,
          capturedAt,
        },
        {
          classId: "1:7",
          label: "1:7",
          packets: 1,
          bytes: 10,
          droppedPackets: 0,
          currentRateKbps: UNKNOWN,
          capturedAt,
        },
      ]);
    });

    it("keeps listing order without a tree", async () => {
      const collector = new StatsCollector({ readCounters: async () => LISTING });

      const snapshot = await collector.snapshot();

      expect(snapshot.classes.map((entry) => entry.classId)).toEqual(["1:100", "1:7", "1:10"]);
    });

    it("wraps read failures in BackendUnavailableError", async () => {
      const collector = new StatsCollector({
        readCounters: async () => {
          throw new Error("Cannot find device \"eth9\"");
        },
      });

      await expect(collector.snapshot()).rejects.toThrow(
        new BackendUnavailableError('Could not read class counters: Cannot find device "eth9"')
      );
      await expect(collector.snapshot()).rejects.toBeInstanceOf(BackendUnavailableError);
    });
  });

  describe("watch", () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it("keeps going after a failed read", async () => {
      const readCounters = vi
        .fn<() => Promise<string>>()
        .mockRejectedValueOnce(new Error("busy"))
        .mockResolvedValue(LISTING);
      const collector = new StatsCollector({ readCounters }, { tree });
      const controller = new AbortController();
      const watch = collector.watch(2, controller.signal);

      const first = await watch.next();
      const secondPending = watch.next();
      await vi.advanceTimersByTimeAsync(2000);
      const second = await secondPending;

      expect(first.value).toMatchObject({ ok: false });
      expect(second.value).toMatchObject({ ok: true });
      expect(readCounters).toHaveBeenCalledTimes(2);

      controller.abort();
      await expect(watch.next()).resolves.toEqual({ done: true, value: undefined });
    });

    it("ends while sleeping when aborted", async () => {
      const readCounters = vi.fn<() => Promise<string>>().mockResolvedValue("");
      const collector = new StatsCollector({ readCounters });
      const controller = new AbortController();
      const watch = collector.watch(10, controller.signal);

      await watch.next();
      const pending = watch.next();
      controller.abort();

      await expect(pending).resolves.toEqual({ done: true, value: undefined });
      expect(readCounters).toHaveBeenCalledTimes(1);
    });

    it("does not start when already aborted", async () => {
      const readCounters = vi.fn<() => Promise<string>>().mockResolvedValue("");
      const controller = new AbortController();
      controller.abort();

      const result = await new StatsCollector({ readCounters }).watch(1, controller.signal).next();

      expect(result.done).toBe(true);
      expect(readCounters).not.toHaveBeenCalled();
    });

    it("rejects a non-positive interval", async () => {
      const collector = new StatsCollector({ readCounters: async () => "" });

      await expect(collector.watch(0).next()).rejects.toThrow("Watch interval must be positive, got 0");
    });
  });
});
