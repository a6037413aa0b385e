/**
 * Lock file shared by every tierlink process on the host, so that only one
 * of them changes the live tc and iptables state at a time and counter
 * reads never land in the middle of a rebuild.
 *
 * @module backend/lockfile
 */

import { mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import { LockTimeoutError, type Logger, type SessionGuard, SessionLock } from "@tierlink/core";
import { Err, Ok, type Result } from "@tierlink/shared";
import lockfile from "proper-lockfile";

export const LOCK_RETRY_MS = 100;
/** A holder that stops refreshing the lock for this long is presumed dead */
export const LOCK_STALE_MS = 10000;

export interface FileSessionLockOptions {
  /** Maximum wait for the lock, default 30000 */
  timeoutMs?: number;
  logger?: Logger;
}

function isLockedError(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ELOCKED";
}

/**
 * Reads and writes both hold the file exclusively; inside one process they
 * also go through a {@link SessionLock}, so local readers share.
 *
 * @example
 * ```typescript
 * const guard = new FileSessionLock("/run/tierlink.lock", { timeoutMs: 30000 });
 * const orchestrator = new Orchestrator({ shaper, marking, guard });
 * ```
 */
export class FileSessionLock implements SessionGuard {
  readonly path: string;
  private readonly local: SessionLock;
  private readonly timeoutMs: number;
  private readonly logger?: Logger;

  constructor(path: string, options: FileSessionLockOptions = {}) {
    this.path = path;
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.local = new SessionLock(this.timeoutMs);
    this.logger = options.logger;
  }

  private async acquireFile(): Promise<Result<() => Promise<void>, LockTimeoutError>> {
    await mkdir(dirname(this.path), { recursive: true });
    try {
      const release = await lockfile.lock(this.path, {
        lockfilePath: this.path,
        realpath: false,
        stale: LOCK_STALE_MS,
        retries: {
          retries: Math.max(1, Math.ceil(this.timeoutMs / LOCK_RETRY_MS)),
          factor: 1,
          minTimeout: LOCK_RETRY_MS,
          maxTimeout: LOCK_RETRY_MS,
        },
        onCompromised: (error) => {
          this.logger?.error(`Lost the lock on ${this.path}`, { error });
        },
      });
      this.logger?.debug(`Locked ${this.path}`);
      return Ok(release);
    } catch (error) {
      if (isLockedError(error)) {
        return Err(new LockTimeoutError(this.timeoutMs));
      }
      throw error;
    }
  }

  private async holdingFile<T>(fn: () => Promise<T>): Promise<Result<T, LockTimeoutError>> {
    const acquired = await this.acquireFile();
    if (!acquired.ok) {
      return acquired;
    }
    try {
      return Ok(await fn());
    } finally {
      await acquired.value();
      this.logger?.debug(`Released ${this.path}`);
    }
  }

  async withWrite<T>(fn: () => Promise<T>): Promise<Result<T, LockTimeoutError>> {
    const local = await this.local.acquireWrite();
    if (!local.ok) {
      return Err(local.error);
    }
    try {
      return await this.holdingFile(fn);
    } finally {
      this.local.releaseWrite();
    }
  }

  /**
   * @throws LockTimeoutError when another process holds the lock too long
   */
  async withRead<T>(fn: () => Promise<T>): Promise<T> {
    return this.local.withRead(async () => {
      const result = await this.holdingFile(fn);
      if (!result.ok) {
        throw result.error;
      }
      return result.value;
    });
  }
}
