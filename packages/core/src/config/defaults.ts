/**
 * Built-in configuration defaults for tierlink.
 * All hardcoded paths and the stock tier profile live here.
 */

import type { PartialConfig } from "./schema.js";

export const CONFIG_DEFAULTS = {
  /** Path defaults */
  paths: {
    configFile: "/etc/tierlink/tierlink.toml",
    logFile: "/var/log/tierlink.log",
  },

  /** Statistics refresh for `monitor` (seconds) */
  monitorIntervalSeconds: 2,
} as const;

export type ConfigDefaults = typeof CONFIG_DEFAULTS;

/**
 * Stock profile for a 1 Mbit/s uplink: interactive control traffic and
 * voice get reserved realtime capacity, three hosts get graded shares and
 * everything else falls into the default tier.
 */
export const DEFAULT_PROFILE: PartialConfig = {
  link: { interface: "eth0", direction: "upload", rateKbps: 1000 },
  tiers: [
    {
      kind: "reserved",
      id: 10,
      label: "Interactive",
      priority: "realtime-strict",
      ratePercent: 10,
      match: [
        { protocol: "tcp", port: 22, side: "both" },
        { protocol: "udp", port: 53 },
        { protocol: "tcp", port: 53 },
        { protocol: "icmp" },
        { protocol: "udp", port: 123 },
      ],
    },
    {
      kind: "reserved",
      id: 20,
      label: "VoIP",
      priority: "realtime-strict",
      ratePercent: 20,
      match: [
        { protocol: "udp", port: "5060:5061" },
        { protocol: "udp", port: "10000:20000" },
        { protocol: "udp", port: "3478:3481" },
      ],
    },
    {
      kind: "percentage",
      id: 100,
      label: "High",
      priority: "realtime-burstable",
      sharePercent: 50,
      addresses: "192.168.99.3/32",
    },
    {
      kind: "percentage",
      id: 200,
      label: "Medium",
      priority: "shared",
      sharePercent: 25,
      addresses: "192.168.99.4/32",
    },
    {
      kind: "percentage",
      id: 300,
      label: "Low",
      priority: "bulk",
      sharePercent: 12,
      addresses: "192.168.99.5/32",
    },
  ],
  defaultTier: { id: 999, label: "Default", priority: "bulk", sharePercent: 13 },
};
