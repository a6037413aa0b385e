import chalk from "chalk";
import { formatData } from "../serialize.js";
import type { LogEntry, LogLevel, LogTransport } from "../types.js";

const LEVEL_STYLES: Record<LogLevel, (text: string) => string> = {
  trace: chalk.gray,
  debug: chalk.cyan,
  info: chalk.green,
  warn: chalk.yellow,
  error: chalk.red,
  fatal: chalk.magenta,
};

export interface ConsoleTransportOptions {
  /** Force colors on or off. Auto-detects if not specified. */
  colors?: boolean;
  /** Prefix each line with a timestamp (default: true) */
  timestamps?: boolean;
}

/**
 * Detect if colors should be enabled by default.
 * Disables colors when NO_COLOR or CI is set, or stdout is not a TTY.
 */
function shouldEnableColors(): boolean {
  if (process.env.NO_COLOR !== undefined) {
    return false;
  }
  if (process.env.CI) {
    return false;
  }
  return Boolean(process.stdout.isTTY);
}

/**
 * Format a timestamp as ISO string without milliseconds.
 */
function formatTimestamp(date: Date): string {
  return date.toISOString().replace("T", " ").slice(0, 19);
}

/**
 * Console transport with color support.
 * Warnings and worse go to stderr, everything else to stdout.
 *
 * @example
 * ```typescript
 * const transport = new ConsoleTransport({ colors: true });
 * logger.addTransport(transport);
 * // [2025-01-01 10:00:00] [INFO ] (orchestrator) Shaping applied
 * ```
 */
export class ConsoleTransport implements LogTransport {
  private readonly useColors: boolean;
  private readonly timestamps: boolean;

  constructor(options: ConsoleTransportOptions = {}) {
    this.useColors = options.colors ?? shouldEnableColors();
    this.timestamps = options.timestamps ?? true;
  }

  log(entry: LogEntry): void {
    const tag = `[${entry.level.toUpperCase().padEnd(5)}]`;
    const parts: string[] = [];

    if (this.timestamps) {
      parts.push(`[${formatTimestamp(entry.timestamp)}]`);
    }
    parts.push(this.useColors ? LEVEL_STYLES[entry.level](tag) : tag);

    const component = entry.context?.component;
    if (typeof component === "string") {
      parts.push(`(${component})`);
    }
    parts.push(entry.message);

    if (entry.data !== undefined) {
      parts.push(formatData(entry.data));
    }

    const output = parts.join(" ");
    if (entry.level === "warn" || entry.level === "error" || entry.level === "fatal") {
      console.error(output);
    } else {
      console.log(output);
    }
  }
}
