import type { AllocationInput } from "../types.js";

/**
 * 1000 kbit/s uplink with two reserved realtime tiers, three percentage
 * tiers and a default tier taking 13%.
 */
export function sampleInput(highPriority: "realtime-burstable" | "shared" = "realtime-burstable"): AllocationInput {
  return {
    capacity: { direction: "upload", rateKbps: 1000 },
    reserved: [
      { id: 10, label: "Interactive", priorityClass: "realtime-strict", rate: { kbps: 100 } },
      { id: 20, label: "VoIP", priorityClass: "realtime-strict", rate: { kbps: 200 } },
    ],
    percentage: [
      { id: 100, label: "High", priorityClass: highPriority, sharePercent: 50 },
      { id: 200, label: "Medium", priorityClass: "shared", sharePercent: 25 },
      { id: 300, label: "Low", priorityClass: "bulk", sharePercent: 12 },
    ],
    defaultTier: { id: 999, label: "Default", priorityClass: "bulk", sharePercent: 13 },
  };
}
