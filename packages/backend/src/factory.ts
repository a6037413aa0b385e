/**
 * Wire the tc and iptables backends from configuration.
 */

import type { Logger, ShapingConfig } from "@tierlink/core";
import { CommandExecutor } from "./executor.js";
import { SystemInspector } from "./inspector.js";
import { IptablesMarkingBackend } from "./iptables.js";
import { RecordingRunner } from "./memory.js";
import { TcShaperBackend } from "./tc.js";
import type { CommandRunner } from "./types.js";

export interface SystemBackends {
  readonly runner: CommandRunner;
  readonly shaper: TcShaperBackend;
  readonly marking: IptablesMarkingBackend;
  readonly inspector: SystemInspector;
}

export interface CreateBackendsOptions {
  /** Record commands instead of running them */
  dryRun?: boolean;
  logger?: Logger;
}

export function createBackendsWith(
  runner: CommandRunner,
  config: Pick<ShapingConfig, "link" | "backend">,
  logger?: Logger
): SystemBackends {
  const { link, backend } = config;
  const shaper = new TcShaperBackend(runner, {
    binary: backend.tc,
    device: link.interface,
    timeoutMs: backend.commandTimeoutMs,
    logger: logger?.child({ component: "tc" }),
  });
  const marking = new IptablesMarkingBackend(runner, {
    binary: backend.iptables,
    device: link.interface,
    chain: backend.chain,
    timeoutMs: backend.commandTimeoutMs,
    logger: logger?.child({ component: "iptables" }),
  });
  return { runner, shaper, marking, inspector: new SystemInspector(shaper, marking) };
}

export function createBackends(
  config: Pick<ShapingConfig, "link" | "backend">,
  options: CreateBackendsOptions = {}
): SystemBackends {
  const runner: CommandRunner = options.dryRun
    ? new RecordingRunner()
    : new CommandExecutor({ defaultTimeoutMs: config.backend.commandTimeoutMs, logger: options.logger });
  return createBackendsWith(runner, config, options.logger);
}
