/**
 * Service curve parameters per priority class.
 *
 * @module shaping/curve
 */

import { InvalidCurveError } from "../errors/shaping.js";
import type { PriorityClass, ServiceCurve } from "./types.js";

export const STRICT_BURST_MULTIPLIER = 2;
export const STRICT_BURST_MS = 10;
export const BURSTABLE_BURST_MULTIPLIER = 1.5;
export const BURSTABLE_BURST_MS = 20;

/**
 * Builds the curve for a tier.
 *
 * Realtime classes get an initial burst above the sustained rate; shared
 * and bulk classes only take part in link sharing.
 *
 * @throws InvalidCurveError when the sustained rate is not a positive number
 */
export function parameterizeCurve(priorityClass: PriorityClass, sustainedRateKbps: number): ServiceCurve {
  if (!Number.isFinite(sustainedRateKbps) || sustainedRateKbps <= 0) {
    throw new InvalidCurveError(`Sustained rate must be positive, got ${sustainedRateKbps}`, {
      priorityClass,
      sustainedRateKbps,
    });
  }

  switch (priorityClass) {
    case "realtime-strict":
      return {
        kind: "realtime",
        burstRateKbps: sustainedRateKbps * STRICT_BURST_MULTIPLIER,
        burstDurationMs: STRICT_BURST_MS,
        sustainedRateKbps,
      };
    case "realtime-burstable":
      return {
        kind: "realtime",
        burstRateKbps: sustainedRateKbps * BURSTABLE_BURST_MULTIPLIER,
        burstDurationMs: BURSTABLE_BURST_MS,
        sustainedRateKbps,
      };
    case "shared":
    case "bulk":
      return { kind: "link-share", sustainedRateKbps };
  }
}
