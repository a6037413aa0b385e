import { BackendCommandError } from "@tierlink/core";
import { describe, expect, it } from "vitest";
import { RecordingRunner } from "../memory.js";
import { renderClass, renderCurve, renderFilter, renderRoot, renderShow, TcShaperBackend } from "../tc.js";

const strict = { kind: "realtime", burstRateKbps: 200, burstDurationMs: 10, sustainedRateKbps: 100 } as const;

function backend(runner: RecordingRunner): TcShaperBackend {
  return new TcShaperBackend(runner, { binary: "tc", device: "eth0" });
}

describe("tc rendering", () => {
  it("renders a realtime curve with a link-share part", () => {
    expect(renderCurve(strict).join(" ")).toBe("rt m1 200kbit d 10ms m2 100kbit ls rate 100kbit");
  });

  it("renders a link-share curve", () => {
    expect(renderCurve({ kind: "link-share", sustainedRateKbps: 250 })).toEqual(["ls", "rate", "250kbit"]);
  });

  it("renders the root qdisc and link class", () => {
    expect(renderRoot("eth0", { direction: "upload", rateKbps: 1000 }, 999).map((args) => args.join(" "))).toEqual([
      "qdisc add dev eth0 root handle 1: hfsc default 999",
      "class add dev eth0 parent 1: classid 1:1 hfsc sc rate 1000kbit",
    ]);
  });

  it("adds a leaf queue only when a limit is given", () => {
    expect(renderClass("eth0", 10, 1, strict, 4096).map((args) => args.join(" "))).toEqual([
      "class add dev eth0 parent 1:1 classid 1:10 hfsc rt m1 200kbit d 10ms m2 100kbit ls rate 100kbit",
      "qdisc add dev eth0 parent 1:10 bfifo limit 4096",
    ]);
    expect(renderClass("eth0", 110, 100, { kind: "link-share", sustainedRateKbps: 80 })).toHaveLength(1);
  });

  it("renders a mark filter", () => {
    expect(renderFilter("eth0", { mark: 200, tierId: 200, precedence: 4 }).join(" ")).toBe(
      "filter add dev eth0 parent 1: protocol ip prio 4 handle 200 fw classid 1:200"
    );
  });

  it("renders listings with and without statistics", () => {
    expect(renderShow("eth0", "class", true)).toEqual(["-s", "class", "show", "dev", "eth0"]);
    expect(renderShow("eth0", "filter")).toEqual(["filter", "show", "dev", "eth0"]);
  });
});

describe("TcShaperBackend", () => {
  it("runs the rendered commands in order", async () => {
    const runner = new RecordingRunner();
    const shaper = backend(runner);

    await shaper.applyRoot({ direction: "upload", rateKbps: 1000 }, 999);
    await shaper.applyClass(10, 1, strict, 4096);
    await shaper.applyFilter({ mark: 10, tierId: 10, precedence: 1 });

    expect(runner.lines).toEqual([
      "tc qdisc add dev eth0 root handle 1: hfsc default 999",
      "tc class add dev eth0 parent 1: classid 1:1 hfsc sc rate 1000kbit",
      "tc class add dev eth0 parent 1:1 classid 1:10 hfsc rt m1 200kbit d 10ms m2 100kbit ls rate 100kbit",
      "tc qdisc add dev eth0 parent 1:10 bfifo limit 4096",
      "tc filter add dev eth0 parent 1: protocol ip prio 1 handle 10 fw classid 1:10",
    ]);
  });

  it("treats clearing an unconfigured device as success", async () => {
    const runner = new RecordingRunner(() => ({
      exitCode: 2,
      stderr: "Error: Cannot delete qdisc with handle of zero.\n",
    }));

    await expect(backend(runner).clearAll()).resolves.toBeUndefined();
    expect(runner.lines).toEqual(["tc qdisc del dev eth0 root"]);
  });

  it("fails to clear when tc cannot run", async () => {
    const runner = new RecordingRunner(() => ({ exitCode: null, stderr: "spawn tc ENOENT" }));

    await expect(backend(runner).clearAll()).rejects.toBeInstanceOf(BackendCommandError);
  });

  it("throws with the command line when a step fails", async () => {
    const runner = new RecordingRunner(() => ({ exitCode: 2, stderr: "RTNETLINK answers: Invalid argument" }));

    await expect(backend(runner).applyFilter({ mark: 10, tierId: 10, precedence: 1 })).rejects.toThrow(
      "Command failed (2): tc filter add dev eth0 parent 1: protocol ip prio 1 handle 10 fw classid 1:10"
    );
  });

  it("stops at the first failing command of a step", async () => {
    const runner = new RecordingRunner((_command, args) => (args[0] === "class" ? { exitCode: 2 } : undefined));

    await expect(backend(runner).applyClass(10, 1, strict, 4096)).rejects.toBeInstanceOf(BackendCommandError);
    expect(runner.recorded).toHaveLength(1);
  });

  it("reads counters from the statistics listing", async () => {
    const runner = new RecordingRunner(() => ({ stdout: "class hfsc 1:10 parent 1:1\n Sent 0 bytes 0 pkt\n" }));

    await expect(backend(runner).readCounters()).resolves.toBe("class hfsc 1:10 parent 1:1\n Sent 0 bytes 0 pkt\n");
    expect(runner.lines).toEqual(["tc -s class show dev eth0"]);
  });
});
