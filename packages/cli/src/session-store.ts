/**
 * Record of the last applied session, kept between invocations so that
 * status, monitor and test label classes the way they were applied.
 *
 * Only the configuration is authoritative on reload: the tree, filters and
 * rules are written for inspection and recompiled from it.
 */

import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { ConfigError, ConfigSchema, ErrorCode, type ShapingConfig, type ShapingSession } from "@tierlink/core";
import { z } from "zod";

const StoredSessionSchema = z.object({
  appliedAt: z.string().datetime(),
  config: ConfigSchema,
});

export interface StoredSession {
  readonly appliedAt: Date;
  readonly config: ShapingConfig;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export class SessionStore {
  readonly path: string;

  constructor(path: string) {
    this.path = path;
  }

  async save(session: ShapingSession, config: ShapingConfig): Promise<void> {
    const record = {
      appliedAt: session.appliedAt.toISOString(),
      config,
      tree: session.tree,
      filters: session.filters,
      ruleSet: session.ruleSet,
    };
    await mkdir(dirname(this.path), { recursive: true });
    const staging = `${this.path}.tmp`;
    await writeFile(staging, `${JSON.stringify(record, null, 2)}\n`, "utf-8");
    await rename(staging, this.path);
  }

  /**
   * @returns undefined when nothing has been applied
   * @throws ConfigError when the record exists but cannot be used
   */
  async load(): Promise<StoredSession | undefined> {
    let text: string;
    try {
      text = await readFile(this.path, "utf-8");
    } catch (error) {
      if (isMissingFile(error)) {
        return undefined;
      }
      throw error;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      throw new ConfigError(`Session file ${this.path} is not valid JSON`, ErrorCode.CONFIG_PARSE_ERROR, {
        path: this.path,
        cause: error instanceof Error ? error : undefined,
      });
    }

    const parsed = StoredSessionSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
      throw new ConfigError(`Session file ${this.path} is invalid: ${issues}`, ErrorCode.CONFIG_INVALID, {
        path: this.path,
        cause: parsed.error,
      });
    }
    return { appliedAt: new Date(parsed.data.appliedAt), config: parsed.data.config };
  }

  async remove(): Promise<void> {
    await rm(this.path, { force: true });
  }
}
