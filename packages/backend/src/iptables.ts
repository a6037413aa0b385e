/**
 * Marking backend on top of the iptables mangle table.
 *
 * Rules live in a dedicated chain hooked from POSTROUTING on the shaped
 * device. Every rule only touches packets that still carry mark 0, so the
 * first matching rule decides the mark.
 */

import type { ClassificationRule, Logger, MarkingBackend, RuleMatch } from "@tierlink/core";
import { runChecked, runTolerant } from "./executor.js";
import type { CommandRunner } from "./types.js";

export interface IptablesBackendOptions {
  /** Path of the iptables binary */
  binary: string;
  device: string;
  chain: string;
  timeoutMs?: number;
  logger?: Logger;
}

const TABLE = ["-t", "mangle"];

export function renderMatch(match: RuleMatch): string[] {
  switch (match.type) {
    case "port": {
      const { from, to } = match.ports;
      const ports = from === to ? String(from) : `${from}:${to}`;
      return ["-p", match.protocol, match.side === "destination" ? "--dport" : "--sport", ports];
    }
    case "protocol":
      return ["-p", match.protocol];
    case "address":
      return [match.side === "source" ? "-s" : "-d", match.address];
  }
}

export function renderMarkRule(chain: string, rule: ClassificationRule): string[] {
  return [
    ...TABLE,
    "-A",
    chain,
    "-m",
    "mark",
    "--mark",
    "0",
    ...renderMatch(rule.match),
    "-j",
    "MARK",
    "--set-mark",
    String(rule.mark),
  ];
}

function hookArgs(action: "-A" | "-D", device: string, chain: string): string[] {
  return [...TABLE, action, "POSTROUTING", "-o", device, "-j", chain];
}

/** Create, flush, unhook (stale hook), hook */
export function renderChainSetup(device: string, chain: string): [string[], string[], string[], string[]] {
  return [[...TABLE, "-N", chain], [...TABLE, "-F", chain], hookArgs("-D", device, chain), hookArgs("-A", device, chain)];
}

export function renderChainTeardown(device: string, chain: string): string[][] {
  return [hookArgs("-D", device, chain), [...TABLE, "-F", chain], [...TABLE, "-X", chain]];
}

export function renderListRules(chain: string, withCounters = false): string[] {
  return [...TABLE, "-L", chain, "-n", ...(withCounters ? ["-v"] : [])];
}

export class IptablesMarkingBackend implements MarkingBackend {
  private readonly runner: CommandRunner;
  private readonly options: IptablesBackendOptions;
  private chainReady = false;

  constructor(runner: CommandRunner, options: IptablesBackendOptions) {
    this.runner = runner;
    this.options = options;
  }

  async applyMarkRule(rule: ClassificationRule): Promise<void> {
    if (!this.chainReady) {
      await this.setupChain();
    }
    await runChecked(this.runner, this.options.binary, renderMarkRule(this.options.chain, rule), {
      timeoutMs: this.options.timeoutMs,
    });
  }

  async clearMarkRules(): Promise<void> {
    for (const args of renderChainTeardown(this.options.device, this.options.chain)) {
      await this.runTolerant(args);
    }
    this.chainReady = false;
  }

  async listRules(withCounters = false): Promise<string> {
    return runChecked(this.runner, this.options.binary, renderListRules(this.options.chain, withCounters), {
      timeoutMs: this.options.timeoutMs,
    });
  }

  /**
   * Create (or empty) the chain and hook it exactly once. Creating an
   * existing chain and unhooking a missing hook are expected to fail.
   */
  private async setupChain(): Promise<void> {
    const [create, flush, unhook, hook] = renderChainSetup(this.options.device, this.options.chain);
    await this.runTolerant(create);
    await runChecked(this.runner, this.options.binary, flush, { timeoutMs: this.options.timeoutMs });
    await this.runTolerant(unhook);
    await runChecked(this.runner, this.options.binary, hook, { timeoutMs: this.options.timeoutMs });
    this.chainReady = true;
  }

  private runTolerant(args: readonly string[]): Promise<boolean> {
    return runTolerant(this.runner, this.options.binary, args, { timeoutMs: this.options.timeoutMs }, this.options.logger);
  }
}
