/**
 * Per-invocation context: configuration, logger, backends and the session
 * record, built from the global command-line options.
 *
 * @module cli/context
 */

import { type CreateBackendsOptions, createBackends, FileSessionLock, type SystemBackends } from "@tierlink/backend";
import {
  compileShaping,
  createLogger,
  createLoggingConfig,
  type CompiledShaping,
  type Logger,
  loadConfig,
  Orchestrator,
  type ShapingConfig,
} from "@tierlink/core";
import { SessionStore } from "./session-store.js";

export interface GlobalOptions {
  config?: string;
  debug?: boolean;
  verbose?: boolean;
  quiet?: boolean;
  dryRun?: boolean;
}

export interface Output {
  log(text: string): void;
  error(text: string): void;
  /** Clear the screen before a redraw, where the terminal supports it */
  clear?(): void;
}

/**
 * Everything the commands take from the process, replaceable in tests.
 */
export interface CliDeps {
  out: Output;
  env: NodeJS.ProcessEnv;
  getuid: () => number | undefined;
  now: () => Date;
  createBackends: (config: ShapingConfig, options: CreateBackendsOptions) => SystemBackends;
  /** Aborted on SIGINT/SIGTERM */
  signal?: AbortSignal;
}

export interface CliContext {
  readonly config: ShapingConfig;
  readonly logger: Logger;
  readonly backends: SystemBackends;
  readonly store: SessionStore;
  readonly dryRun: boolean;
  readonly deps: CliDeps;
}

export function defaultDeps(signal?: AbortSignal): CliDeps {
  return {
    out: {
      log: (text) => console.log(text),
      error: (text) => console.error(text),
      clear: process.stdout.isTTY ? () => console.clear() : undefined,
    },
    env: process.env,
    getuid: () => process.getuid?.(),
    now: () => new Date(),
    createBackends,
    signal,
  };
}

/**
 * @throws ConfigError when the configuration cannot be loaded
 */
export function createContext(options: GlobalOptions, deps: CliDeps): CliContext {
  const loaded = loadConfig({ path: options.config, env: deps.env });
  if (!loaded.ok) {
    throw loaded.error;
  }
  const config = loaded.value;

  const logging = createLoggingConfig(config, options);
  const logger = createLogger({
    level: logging.level,
    json: logging.json,
    colors: logging.colors,
    timestamps: logging.timestamps,
    file: logging.file,
  });

  const dryRun = options.dryRun ?? false;
  return {
    config,
    logger,
    backends: deps.createBackends(config, { dryRun, logger }),
    store: new SessionStore(config.state.sessionFile),
    dryRun,
    deps,
  };
}

/**
 * Outside a dry run the orchestrator takes the host-wide lock file, so
 * concurrent invocations apply one at a time and read counters between
 * applies.
 */
export function createOrchestrator(ctx: CliContext): Orchestrator {
  const { reconfigure, state } = ctx.config;
  const guard = ctx.dryRun
    ? undefined
    : new FileSessionLock(state.lockFile, {
        timeoutMs: reconfigure.lockTimeoutMs,
        logger: ctx.logger.child({ component: "lock" }),
      });
  return new Orchestrator({
    shaper: ctx.backends.shaper,
    marking: ctx.backends.marking,
    logger: ctx.logger,
    guard,
    lockTimeoutMs: reconfigure.lockTimeoutMs,
    maxAttempts: reconfigure.maxAttempts,
    retryDelayMs: reconfigure.retryDelayMs,
    now: ctx.deps.now,
  });
}

export interface ActiveShaping {
  readonly compiled: CompiledShaping;
  /** Unset when nothing has been applied and the configured profile is shown */
  readonly appliedAt?: Date;
}

/**
 * The applied session when one is recorded, else the current configuration
 * compiled but not applied.
 */
export async function resolveActiveShaping(ctx: CliContext): Promise<ActiveShaping> {
  const stored = await ctx.store.load();
  if (stored) {
    return { compiled: compileShaping(stored.config), appliedAt: stored.appliedAt };
  }
  return { compiled: compileShaping(ctx.config) };
}
