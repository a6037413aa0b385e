/**
 * StatsCollector: reads raw class counters and reconciles them with the
 * class tree into per-class statistics.
 *
 * @module stats/collector
 */

import { Err, Ok, type Result } from "@tierlink/shared";
import { AbortError, abortableSleep } from "../errors/retry.js";
import { BackendUnavailableError } from "../errors/shaping.js";
import type { Logger } from "../logger/logger.js";
import { type ClassTree, classIdFor } from "../shaping/types.js";
import { parseCounterRecords } from "./grammar.js";
import { type ClassStats, type CounterRecord, type CounterSource, type StatsSnapshot, UNKNOWN } from "./types.js";

export const ROOT_CLASS_LABEL = "Link";

export interface StatsCollectorOptions {
  /** Orders records and supplies labels; without it records keep listing order */
  tree?: ClassTree;
  logger?: Logger;
  /** Clock for capture timestamps */
  now?: () => Date;
}

export class StatsCollector {
  private readonly source: CounterSource;
  private readonly tree?: ClassTree;
  private readonly logger?: Logger;
  private readonly now: () => Date;

  constructor(source: CounterSource, options: StatsCollectorOptions = {}) {
    this.source = source;
    this.tree = options.tree;
    this.logger = options.logger;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * One read of the counters.
   *
   * @throws BackendUnavailableError when the counters cannot be read
   */
  async snapshot(): Promise<StatsSnapshot> {
    let raw: string;
    try {
      raw = await this.source.readCounters();
    } catch (error) {
      if (error instanceof BackendUnavailableError) {
        throw error;
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new BackendUnavailableError(`Could not read class counters: ${reason}`, {
        cause: error instanceof Error ? error : undefined,
      });
    }

    const capturedAt = this.now();
    const records = parseCounterRecords(raw);
    this.logger?.trace(`Parsed ${records.length} class records`);

    return { capturedAt, classes: this.reconcile(records, capturedAt) };
  }

  /**
   * Tree classes first, in tree order, with all-unknown values for classes
   * missing from the listing; then unexpected classes in listing order.
   */
  private reconcile(records: readonly CounterRecord[], capturedAt: Date): ClassStats[] {
    const byId = new Map(records.map((record) => [record.classId, record]));
    const expected: Array<[string, string]> = this.tree
      ? [
          [classIdFor(this.tree.rootId), ROOT_CLASS_LABEL],
          ...this.tree.tiers.map((tier): [string, string] => [classIdFor(tier.id), tier.label]),
        ]
      : [];
    const expectedIds = new Set(expected.map(([classId]) => classId));

    const classes: ClassStats[] = expected.map(([classId, label]) => {
      const record = byId.get(classId);
      return {
        classId,
        label,
        packets: record?.packets ?? UNKNOWN,
        bytes: record?.bytes ?? UNKNOWN,
        droppedPackets: record?.droppedPackets ?? UNKNOWN,
        currentRateKbps: record?.currentRateKbps ?? UNKNOWN,
        capturedAt,
      };
    });

    for (const record of records) {
      if (expectedIds.has(record.classId)) {
        continue;
      }
      classes.push({
        classId: record.classId,
        label: record.classId,
        packets: record.packets,
        bytes: record.bytes,
        droppedPackets: record.droppedPackets,
        currentRateKbps: record.currentRateKbps,
        capturedAt,
      });
    }

    return classes;
  }

  /**
   * Snapshots every `intervalSeconds` until `signal` aborts. A failed read
   * yields an error result and the watch carries on. Aborting ends the
   * sequence without yielding a snapshot read after the abort.
   */
  async *watch(
    intervalSeconds: number,
    signal?: AbortSignal
  ): AsyncGenerator<Result<StatsSnapshot, BackendUnavailableError>, void, undefined> {
    if (!Number.isFinite(intervalSeconds) || intervalSeconds <= 0) {
      throw new RangeError(`Watch interval must be positive, got ${intervalSeconds}`);
    }

    while (!signal?.aborted) {
      let result: Result<StatsSnapshot, BackendUnavailableError>;
      try {
        result = Ok(await this.snapshot());
      } catch (error) {
        if (!(error instanceof BackendUnavailableError)) {
          throw error;
        }
        this.logger?.warn(error.message);
        result = Err(error);
      }

      if (signal?.aborted) {
        return;
      }
      yield result;

      try {
        await abortableSleep(intervalSeconds * 1000, signal);
      } catch (error) {
        if (error instanceof AbortError) {
          return;
        }
        throw error;
      }
    }
  }
}
