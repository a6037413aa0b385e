/**
 * Statistics types.
 *
 * @module stats/types
 */

/** Marks a field that was missing or could not be parsed. Never zero. */
export const UNKNOWN = "unknown" as const;

export type Unknown = typeof UNKNOWN;

export type Counter = number | Unknown;

export function isKnown(value: Counter): value is number {
  return value !== UNKNOWN;
}

/**
 * One class record from the raw counter listing.
 */
export interface CounterRecord {
  readonly kind: string;
  readonly classId: string;
  readonly parentId?: string;
  readonly packets: Counter;
  readonly bytes: Counter;
  readonly droppedPackets: Counter;
  readonly currentRateKbps: Counter;
}

export interface ClassStats {
  readonly classId: string;
  readonly label: string;
  readonly packets: Counter;
  readonly bytes: Counter;
  readonly droppedPackets: Counter;
  readonly currentRateKbps: Counter;
  readonly capturedAt: Date;
}

export interface StatsSnapshot {
  readonly capturedAt: Date;
  readonly classes: readonly ClassStats[];
}

/**
 * Anything that can produce the raw per-class counter listing.
 */
export interface CounterSource {
  readCounters(): Promise<string>;
}
