/**
 * Contracts the core expects from the shaping and marking backends.
 *
 * @module shaping/backend
 */

import type { ClassificationRule, FilterRule, LinkCapacity, ServiceCurve } from "./types.js";

export interface ShaperBackend {
  /** Install the root qdisc and link class; unmatched traffic goes to defaultTierId */
  applyRoot(capacity: LinkCapacity, defaultTierId: number): Promise<void>;
  /**
   * Attach a class under an existing parent. When queueLimitBytes is given
   * the class also gets a byte-limited leaf queue.
   */
  applyClass(tierId: number, parentId: number, curve: ServiceCurve, queueLimitBytes?: number): Promise<void>;
  applyFilter(filter: FilterRule): Promise<void>;
  /** Remove everything; safe when nothing is configured */
  clearAll(): Promise<void>;
  /** Raw per-class counters (statistics listing of the class table) */
  readCounters(): Promise<string>;
}

export interface MarkingBackend {
  /** Append a rule; rules apply in call order */
  applyMarkRule(rule: ClassificationRule): Promise<void>;
  /** Remove the whole rule group; safe when nothing is configured */
  clearMarkRules(): Promise<void>;
}

/**
 * Read-only views of the live backend state, used by the self-test and
 * configuration backups.
 */
export interface ShapingInspector {
  describeQdiscs(): Promise<string>;
  describeClasses(): Promise<string>;
  describeFilters(): Promise<string>;
  describeMarkRules(): Promise<string>;
}
