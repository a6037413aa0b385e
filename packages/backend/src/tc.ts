/**
 * HFSC shaper backend on top of `tc`.
 *
 * The render functions are pure and return argument vectors (without the
 * binary); {@link TcShaperBackend} runs them in order.
 */

import {
  classIdFor,
  type FilterRule,
  type LinkCapacity,
  type Logger,
  QDISC_MAJOR,
  ROOT_TIER_ID,
  type ServiceCurve,
  type ShaperBackend,
} from "@tierlink/core";
import { runChecked, runTolerant } from "./executor.js";
import type { CommandRunner } from "./types.js";

export interface TcBackendOptions {
  /** Path of the tc binary */
  binary: string;
  device: string;
  timeoutMs?: number;
  logger?: Logger;
}

const QDISC_HANDLE = `${QDISC_MAJOR}:`;

export function formatKbit(kbps: number): string {
  return `${kbps}kbit`;
}

export function renderCurve(curve: ServiceCurve): string[] {
  const linkShare = ["ls", "rate", formatKbit(curve.sustainedRateKbps)];
  if (curve.kind === "link-share") {
    return linkShare;
  }
  return [
    "rt",
    "m1",
    formatKbit(curve.burstRateKbps),
    "d",
    `${curve.burstDurationMs}ms`,
    "m2",
    formatKbit(curve.sustainedRateKbps),
    ...linkShare,
  ];
}

/** Root qdisc plus the link-capacity class */
export function renderRoot(device: string, capacity: LinkCapacity, defaultTierId: number): string[][] {
  return [
    ["qdisc", "add", "dev", device, "root", "handle", QDISC_HANDLE, "hfsc", "default", String(defaultTierId)],
    [
      "class",
      "add",
      "dev",
      device,
      "parent",
      QDISC_HANDLE,
      "classid",
      classIdFor(ROOT_TIER_ID),
      "hfsc",
      "sc",
      "rate",
      formatKbit(capacity.rateKbps),
    ],
  ];
}

/** A class, followed by its byte-limited leaf queue when a limit is given */
export function renderClass(
  device: string,
  tierId: number,
  parentId: number,
  curve: ServiceCurve,
  queueLimitBytes?: number
): string[][] {
  const commands = [
    [
      "class",
      "add",
      "dev",
      device,
      "parent",
      classIdFor(parentId),
      "classid",
      classIdFor(tierId),
      "hfsc",
      ...renderCurve(curve),
    ],
  ];
  if (queueLimitBytes !== undefined) {
    commands.push(["qdisc", "add", "dev", device, "parent", classIdFor(tierId), "bfifo", "limit", String(queueLimitBytes)]);
  }
  return commands;
}

export function renderFilter(device: string, filter: FilterRule): string[] {
  return [
    "filter",
    "add",
    "dev",
    device,
    "parent",
    QDISC_HANDLE,
    "protocol",
    "ip",
    "prio",
    String(filter.precedence),
    "handle",
    String(filter.mark),
    "fw",
    "classid",
    classIdFor(filter.tierId),
  ];
}

export function renderClear(device: string): string[] {
  return ["qdisc", "del", "dev", device, "root"];
}

export type TcObject = "qdisc" | "class" | "filter";

export function renderShow(device: string, object: TcObject, withStats = false): string[] {
  return [...(withStats ? ["-s"] : []), object, "show", "dev", device];
}

export class TcShaperBackend implements ShaperBackend {
  private readonly runner: CommandRunner;
  private readonly options: TcBackendOptions;

  constructor(runner: CommandRunner, options: TcBackendOptions) {
    this.runner = runner;
    this.options = options;
  }

  async applyRoot(capacity: LinkCapacity, defaultTierId: number): Promise<void> {
    await this.runAll(renderRoot(this.options.device, capacity, defaultTierId));
  }

  async applyClass(tierId: number, parentId: number, curve: ServiceCurve, queueLimitBytes?: number): Promise<void> {
    await this.runAll(renderClass(this.options.device, tierId, parentId, curve, queueLimitBytes));
  }

  async applyFilter(filter: FilterRule): Promise<void> {
    await this.run(renderFilter(this.options.device, filter));
  }

  /** Deleting the root qdisc removes every class and filter under it */
  async clearAll(): Promise<void> {
    await runTolerant(
      this.runner,
      this.options.binary,
      renderClear(this.options.device),
      { timeoutMs: this.options.timeoutMs },
      this.options.logger
    );
  }

  async readCounters(): Promise<string> {
    return this.show("class", true);
  }

  /** Raw `tc ... show` listing */
  async show(object: TcObject, withStats = false): Promise<string> {
    return this.run(renderShow(this.options.device, object, withStats));
  }

  private async runAll(commands: readonly string[][]): Promise<void> {
    for (const args of commands) {
      await this.run(args);
    }
  }

  private run(args: readonly string[]): Promise<string> {
    return runChecked(this.runner, this.options.binary, args, { timeoutMs: this.options.timeoutMs });
  }
}
