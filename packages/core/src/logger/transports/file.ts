import { appendFile, mkdir } from "node:fs/promises";
import { dirname } from "node:path";

import { formatData } from "../serialize.js";
import type { LogEntry, LogTransport } from "../types.js";

export interface FileTransportOptions {
  /** Path to the log file */
  path: string;
  /** Flush interval in milliseconds (default: 1000) */
  flushInterval?: number;
  /** Maximum buffer size before auto-flush (default: 100) */
  maxBufferSize?: number;
  /** Error callback for write failures */
  onError?: (error: Error) => void;
}

/**
 * Format a log entry as a single line string.
 */
function formatEntry(entry: LogEntry): string {
  const timestamp = entry.timestamp.toISOString();
  const level = entry.level.toUpperCase().padEnd(5);
  let line = `[${timestamp}] [${level}] ${entry.message}`;

  if (entry.context && Object.keys(entry.context).length > 0) {
    line += ` context=${JSON.stringify(entry.context)}`;
  }

  if (entry.data !== undefined) {
    line += ` data=${formatData(entry.data)}`;
  }

  return line;
}

/**
 * File transport with buffered appends.
 * The parent directory is created on the first flush.
 *
 * @example
 * ```typescript
 * const transport = new FileTransport({
 *   path: '/var/log/tierlink.log',
 *   onError: (err) => console.error('Log write failed:', err.message),
 * });
 * logger.addTransport(transport);
 * ```
 */
export class FileTransport implements LogTransport {
  private readonly path: string;
  private readonly maxBufferSize: number;
  private readonly onError?: (error: Error) => void;
  private buffer: string[] = [];
  private flushTimer: ReturnType<typeof setInterval> | null = null;
  private flushing: Promise<void> | null = null;
  private directoryReady = false;

  /** Last error encountered during file write */
  lastError: Error | null = null;

  constructor(options: FileTransportOptions) {
    this.path = options.path;
    this.maxBufferSize = options.maxBufferSize ?? 100;
    this.onError = options.onError;

    this.flushTimer = setInterval(() => {
      void this.flush();
    }, options.flushInterval ?? 1000);
    this.flushTimer.unref();
  }

  log(entry: LogEntry): void {
    this.buffer.push(formatEntry(entry));

    if (this.buffer.length >= this.maxBufferSize) {
      void this.flush();
    }
  }

  /**
   * Flush buffered entries to file. Concurrent callers share one write.
   */
  async flush(): Promise<void> {
    if (this.flushing) {
      return this.flushing;
    }
    if (this.buffer.length === 0) {
      return;
    }

    this.flushing = this.write();
    try {
      await this.flushing;
    } finally {
      this.flushing = null;
    }
  }

  /**
   * Stop the flush timer and flush remaining entries.
   */
  dispose(): void {
    if (this.flushTimer) {
      clearInterval(this.flushTimer);
      this.flushTimer = null;
    }
    void this.flush();
  }

  private async write(): Promise<void> {
    const entries = this.buffer;
    this.buffer = [];

    try {
      if (!this.directoryReady) {
        await mkdir(dirname(this.path), { recursive: true });
        this.directoryReady = true;
      }
      await appendFile(this.path, `${entries.join("\n")}\n`, "utf-8");
      this.lastError = null;
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      this.lastError = err;
      this.onError?.(err);
      // Keep entries for the next attempt
      this.buffer = [...entries, ...this.buffer];
    }
  }
}
