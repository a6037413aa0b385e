import { z } from "zod";
import { MAX_TIER_ID } from "../shaping/types.js";

// ============================================
// Tier Schemas
// ============================================

export const PriorityClassSchema = z.enum(["realtime-strict", "realtime-burstable", "shared", "bulk"]);

export const TierIdSchema = z.number().int().min(2).max(MAX_TIER_ID);

const PortNumberSchema = z.number().int().min(1).max(65535);

/**
 * A single port, an inclusive `from:to` range ("10000:20000"), or the
 * `{ from, to }` form parsing produces.
 */
export const PortSchema = z.union([
  PortNumberSchema.transform((port) => ({ from: port, to: port })),
  z
    .string()
    .regex(/^\d{1,5}[:-]\d{1,5}$/, "expected a port range like 5060:5061")
    .transform((range) => {
      const [from = "", to = ""] = range.split(/[:-]/);
      return { from: Number.parseInt(from, 10), to: Number.parseInt(to, 10) };
    }),
  z.object({ from: PortNumberSchema, to: PortNumberSchema }).strict(),
]);

/**
 * `{ protocol, port, side }` matches a port; `{ protocol }` alone matches
 * the whole protocol.
 */
export const MatchEntrySchema = z.union([
  z
    .object({
      protocol: z.enum(["tcp", "udp"]),
      port: PortSchema,
      side: z.enum(["source", "destination", "both"]).optional().default("destination"),
    })
    .strict(),
  z
    .object({
      protocol: z.enum(["tcp", "udp", "icmp"]),
    })
    .strict(),
]);

export type MatchEntry = z.infer<typeof MatchEntrySchema>;

const tierFields = {
  id: TierIdSchema,
  label: z.string().min(1),
  priority: PriorityClassSchema,
  /** Parent tier id; the link root when omitted */
  parentId: z.number().int().optional(),
  match: z.array(MatchEntrySchema).optional().default([]),
  /** Comma-separated hosts or subnets */
  addresses: z.string().optional(),
};

export const ReservedTierSchema = z.object({
  kind: z.literal("reserved"),
  ...tierFields,
  rateKbps: z.number().positive().optional(),
  ratePercent: z.number().positive().max(100).optional(),
});

export const PercentageTierSchema = z.object({
  kind: z.literal("percentage"),
  ...tierFields,
  sharePercent: z.number().max(100),
});

export const TierSchema = z.discriminatedUnion("kind", [ReservedTierSchema, PercentageTierSchema]);

export type TierConfig = z.infer<typeof TierSchema>;

export const DefaultTierSchema = z.object({
  id: TierIdSchema.optional().default(999),
  label: z.string().min(1).optional().default("Default"),
  priority: PriorityClassSchema.optional().default("bulk"),
  /** Remainder of the root's percentage shares when omitted */
  sharePercent: z.number().max(100).optional(),
  match: z.array(MatchEntrySchema).optional().default([]),
  addresses: z.string().optional(),
});

// ============================================
// Link and Backend Schemas
// ============================================

export const LinkSchema = z.object({
  interface: z.string().min(1).optional().default("eth0"),
  direction: z.enum(["upload", "download"]).optional().default("upload"),
  rateKbps: z.number().int().positive().optional().default(1000),
});

export const BackendSchema = z.object({
  tc: z.string().min(1).optional().default("tc"),
  iptables: z.string().min(1).optional().default("iptables"),
  /** Mangle-table chain holding the mark rules */
  chain: z
    .string()
    .regex(/^[A-Za-z0-9_-]{1,28}$/, "chain names are 1-28 letters, digits, '_' or '-'")
    .optional()
    .default("TIERLINK_MARK"),
  commandTimeoutMs: z.number().int().positive().optional().default(10000),
});

export const ReconfigureSchema = z.object({
  lockTimeoutMs: z.number().int().positive().optional().default(30000),
  /** Whole-plan attempts before giving up and clearing everything */
  maxAttempts: z.number().int().min(1).max(10).optional().default(2),
  retryDelayMs: z.number().int().min(0).optional().default(1000),
});

// ============================================
// Log Level Schema
// ============================================

export const LogLevelSchema = z.enum(["trace", "debug", "info", "warn", "error", "fatal"]);

export const LoggingSchema = z.object({
  level: LogLevelSchema.optional().default("warn"),
  json: z.boolean().optional().default(false),
  /** Also append to this file when set */
  file: z.string().min(1).optional(),
});

export const StateSchema = z.object({
  sessionFile: z.string().min(1).optional().default("/var/lib/tierlink/session.json"),
  backupDir: z.string().min(1).optional().default("/etc/tierlink/backups"),
  backupsKept: z.number().int().min(1).optional().default(10),
  /** Held by every process that changes or reads the live shaping state */
  lockFile: z.string().min(1).optional().default("/run/tierlink.lock"),
});

// ============================================
// Complete Configuration Schema
// ============================================

export const ConfigSchema = z
  .object({
    link: LinkSchema.optional().default({}),
    /** Round-trip time used for queue sizing */
    rttMs: z.number().int().positive().optional().default(50),
    leafQueue: z.enum(["bfifo", "none"]).optional().default("bfifo"),
    tiers: z.array(TierSchema).optional().default([]),
    defaultTier: DefaultTierSchema.optional().default({}),
    backend: BackendSchema.optional().default({}),
    reconfigure: ReconfigureSchema.optional().default({}),
    logging: LoggingSchema.optional().default({}),
    state: StateSchema.optional().default({}),
  })
  .superRefine((config, ctx) => {
    config.tiers.forEach((tier, index) => {
      if (tier.kind !== "reserved") {
        return;
      }
      const given = [tier.rateKbps, tier.ratePercent].filter((value) => value !== undefined).length;
      if (given !== 1) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["tiers", index],
          message: `reserved tier ${tier.id} needs exactly one of rateKbps or ratePercent`,
        });
      }
    });
  });

export type ShapingConfig = z.infer<typeof ConfigSchema>;

/**
 * Config as written by users, before defaults are applied
 */
export type PartialConfig = z.input<typeof ConfigSchema>;
