/**
 * Session Lock
 *
 * Single-writer lock around the live shaping session. Reconfiguration
 * takes the write side; statistics reads take the read side, so counters
 * are never read while the class tree is being torn down and rebuilt.
 *
 * @module shaping/lock
 */

import { Err, Ok, type Result } from "@tierlink/shared";
import { LockTimeoutError } from "../errors/shaping.js";

/**
 * Write side for reconfiguration, read side for counter reads. Writers are
 * exclusive; a timed-out writer gets an error result, not an exception.
 */
export interface SessionGuard {
  withWrite<T>(fn: () => Promise<T>): Promise<Result<T, LockTimeoutError>>;
  withRead<T>(fn: () => Promise<T>): Promise<T>;
}

interface QueuedWriter {
  resolve: () => void;
  reject: (error: LockTimeoutError) => void;
  timeoutId: ReturnType<typeof setTimeout>;
}

/**
 * Writers queue in arrival order and time out; readers wait without a
 * timeout. A queued writer holds back new readers so it cannot starve.
 *
 * @example
 * ```typescript
 * const lock = new SessionLock(30000);
 *
 * const result = await lock.withWrite(() => applyPlan(plan));
 * if (!result.ok) {
 *   // result.error is a LockTimeoutError
 * }
 *
 * const stats = await lock.withRead(() => collector.snapshot());
 * ```
 */
export class SessionLock implements SessionGuard {
  private writing = false;
  private activeReads = 0;
  private writers: QueuedWriter[] = [];
  private readers: Array<() => void> = [];
  private readonly timeoutMs: number;

  /**
   * @param timeoutMs - Maximum time a writer waits (default: 30000ms)
   */
  constructor(timeoutMs = 30000) {
    this.timeoutMs = timeoutMs;
  }

  async acquireWrite(): Promise<Result<true, LockTimeoutError>> {
    if (!this.writing && this.activeReads === 0 && this.writers.length === 0) {
      this.writing = true;
      return Ok(true);
    }

    return new Promise<Result<true, LockTimeoutError>>((resolve) => {
      const timeoutId = setTimeout(() => {
        const index = this.writers.findIndex((writer) => writer.timeoutId === timeoutId);
        if (index !== -1) {
          this.writers.splice(index, 1);
        }
        resolve(Err(new LockTimeoutError(this.timeoutMs)));
        // Readers held back by this writer may go now
        this.drain();
      }, this.timeoutMs);

      this.writers.push({
        resolve: () => {
          clearTimeout(timeoutId);
          resolve(Ok(true));
        },
        reject: (error) => {
          clearTimeout(timeoutId);
          resolve(Err(error));
        },
        timeoutId,
      });
    });
  }

  /**
   * Idempotent.
   */
  releaseWrite(): void {
    if (!this.writing) {
      return;
    }
    this.writing = false;
    this.drain();
  }

  async acquireRead(): Promise<void> {
    if (!this.writing && this.writers.length === 0) {
      this.activeReads++;
      return;
    }
    return new Promise<void>((resolve) => {
      this.readers.push(resolve);
    });
  }

  releaseRead(): void {
    if (this.activeReads === 0) {
      return;
    }
    this.activeReads--;
    if (this.activeReads === 0) {
      this.drain();
    }
  }

  private drain(): void {
    if (this.writing) {
      return;
    }

    if (this.writers.length > 0) {
      if (this.activeReads === 0) {
        const next = this.writers.shift();
        if (next) {
          this.writing = true;
          next.resolve();
        }
      }
      return;
    }

    const waiting = this.readers;
    this.readers = [];
    this.activeReads += waiting.length;
    for (const resolve of waiting) {
      resolve();
    }
  }

  isWriting(): boolean {
    return this.writing;
  }

  readerCount(): number {
    return this.activeReads;
  }

  queueLength(): number {
    return this.writers.length;
  }

  async withWrite<T>(fn: () => Promise<T>): Promise<Result<T, LockTimeoutError>> {
    const acquired = await this.acquireWrite();
    if (!acquired.ok) {
      return Err(acquired.error);
    }

    try {
      return Ok(await fn());
    } finally {
      this.releaseWrite();
    }
  }

  async withRead<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquireRead();
    try {
      return await fn();
    } finally {
      this.releaseRead();
    }
  }
}
