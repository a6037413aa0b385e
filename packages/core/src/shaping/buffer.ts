/**
 * Queue buffer sizing from the bandwidth-delay product.
 *
 * @module shaping/buffer
 */

export const DEFAULT_RTT_MS = 50;
export const MIN_BUFFER_BYTES = 4096;
export const MAX_BUFFER_BYTES = 131072;

/**
 * Bytes of queue for a class sending at `rateKbps`: 1.5 × BDP clamped to
 * [{@link MIN_BUFFER_BYTES}, {@link MAX_BUFFER_BYTES}].
 */
export function sizeBuffer(rateKbps: number, rttMs: number = DEFAULT_RTT_MS): number {
  // kbit/s × ms = bits
  const bdpBytes = Math.floor((rateKbps * rttMs) / 8);
  const buffer = Math.floor((bdpBytes * 3) / 2);
  return Math.min(MAX_BUFFER_BYTES, Math.max(MIN_BUFFER_BYTES, buffer));
}
