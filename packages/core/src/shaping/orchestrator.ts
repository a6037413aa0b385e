/**
 * Orchestrator
 *
 * Owns the live shaping session. Reconfiguration compiles first, then
 * applies the whole plan under the session lock; a failed apply is torn
 * down and retried as a unit, and if it keeps failing the backends are
 * left fully cleared. Statistics reads are fenced out while a plan is
 * being applied.
 *
 * @module shaping/orchestrator
 */

import type { Result } from "@tierlink/shared";
import type { ShapingConfig } from "../config/schema.js";
import { withRetry } from "../errors/retry.js";
import { BackendApplyError, type BackendUnavailableError } from "../errors/shaping.js";
import type { Logger } from "../logger/logger.js";
import { StatsCollector } from "../stats/collector.js";
import type { CounterSource, StatsSnapshot } from "../stats/types.js";
import { deepFreeze } from "../utils/freeze.js";
import type { MarkingBackend, ShaperBackend } from "./backend.js";
import { type CompiledShaping, compileShaping } from "./compile.js";
import { executePlan } from "./executor.js";
import { type SessionGuard, SessionLock } from "./lock.js";
import type { ClassTree } from "./types.js";

export interface ShapingSession extends CompiledShaping {
  readonly appliedAt: Date;
}

export interface OrchestratorOptions {
  shaper: ShaperBackend;
  marking: MarkingBackend;
  logger?: Logger;
  /**
   * Serializes reconfiguration and fences counter reads. Default: an
   * in-process {@link SessionLock}; pass a shared guard to extend the
   * exclusion across processes.
   */
  guard?: SessionGuard;
  /** Writer wait for the default guard, default 30000 */
  lockTimeoutMs?: number;
  /** Whole-plan attempts, default 2 */
  maxAttempts?: number;
  /** Pause before a retry, default 1000 */
  retryDelayMs?: number;
  now?: () => Date;
}

export class Orchestrator {
  private readonly shaper: ShaperBackend;
  private readonly marking: MarkingBackend;
  private readonly logger?: Logger;
  private readonly lock: SessionGuard;
  private readonly maxAttempts: number;
  private readonly retryDelayMs: number;
  private readonly now: () => Date;
  private session?: ShapingSession;

  /** Counter reads wait for any reconfiguration in progress */
  private readonly counters: CounterSource = {
    readCounters: () => this.lock.withRead(() => this.shaper.readCounters()),
  };

  constructor(options: OrchestratorOptions) {
    this.shaper = options.shaper;
    this.marking = options.marking;
    this.logger = options.logger;
    this.lock = options.guard ?? new SessionLock(options.lockTimeoutMs ?? 30000);
    this.maxAttempts = Math.max(1, options.maxAttempts ?? 2);
    this.retryDelayMs = options.retryDelayMs ?? 1000;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Compiles and applies `config`, replacing the current session.
   *
   * @throws AllocationError, InvalidCurveError, ClassificationError before
   *   anything is touched
   * @throws BackendApplyError after the last attempt; backends are cleared
   * @throws LockTimeoutError when another reconfiguration holds the lock
   */
  async reconfigure(config: ShapingConfig): Promise<ShapingSession> {
    const compiled = compileShaping(config);
    for (const warning of compiled.tree.warnings) {
      this.logger?.warn(warning.message, { code: warning.code, parentId: warning.parentId });
    }

    const result = await this.lock.withWrite(() => this.apply(compiled));
    if (!result.ok) {
      throw result.error;
    }
    return result.value;
  }

  private async apply(compiled: CompiledShaping): Promise<ShapingSession> {
    const backends = { shaper: this.shaper, marking: this.marking };
    const done = this.logger?.time("reconfigure");

    try {
      await withRetry(() => executePlan(compiled.plan, backends, this.logger), {
        maxRetries: this.maxAttempts - 1,
        baseDelay: this.retryDelayMs,
        shouldRetry: (error) => error instanceof BackendApplyError,
        onRetry: async (error, attempt) => {
          this.logger?.warn(`Apply attempt ${attempt} failed, tearing down before retry`, { error });
          await this.clearBackends();
        },
      });
    } catch (error) {
      this.session = undefined;
      this.logger?.error("Reconfiguration failed, clearing all shaping state", { error });
      try {
        await this.clearBackends();
      } catch (teardownError) {
        this.logger?.error("Teardown after failed reconfiguration also failed", { error: teardownError });
      }
      throw error;
    }

    const session: ShapingSession = deepFreeze({ ...compiled, appliedAt: this.now() });
    this.session = session;
    done?.end(`Applied ${compiled.tree.tiers.length} tiers and ${compiled.ruleSet.rules.length} rules`);
    return session;
  }

  private async clearBackends(): Promise<void> {
    await this.marking.clearMarkRules();
    await this.shaper.clearAll();
  }

  /**
   * Removes all shaping and marking state.
   *
   * @throws LockTimeoutError when a reconfiguration holds the lock
   */
  async teardown(): Promise<void> {
    const result = await this.lock.withWrite(async () => {
      await this.clearBackends();
      this.session = undefined;
    });
    if (!result.ok) {
      throw result.error;
    }
    this.logger?.info("Shaping cleared");
  }

  current(): ShapingSession | undefined {
    return this.session;
  }

  private collector(tree: ClassTree | undefined): StatsCollector {
    return new StatsCollector(this.counters, { tree, logger: this.logger, now: this.now });
  }

  /**
   * Records are labelled from `tree`, or from the current session.
   *
   * @throws BackendUnavailableError when the counters cannot be read
   */
  async snapshot(tree: ClassTree | undefined = this.session?.tree): Promise<StatsSnapshot> {
    return this.collector(tree).snapshot();
  }

  /**
   * Periodic snapshots labelled from `tree`, or from the session current
   * at the start.
   */
  watch(
    intervalSeconds: number,
    signal?: AbortSignal,
    tree: ClassTree | undefined = this.session?.tree
  ): AsyncGenerator<Result<StatsSnapshot, BackendUnavailableError>, void, undefined> {
    return this.collector(tree).watch(intervalSeconds, signal);
  }
}
