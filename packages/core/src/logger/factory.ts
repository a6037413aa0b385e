import { Logger } from "./logger.js";
import { ConsoleTransport } from "./transports/console.js";
import { FileTransport } from "./transports/file.js";
import { JsonTransport } from "./transports/json.js";
import type { LogLevel } from "./types.js";

/**
 * Options for creating a logger via createLogger factory.
 */
export interface CreateLoggerOptions {
  /** Logger name for identification (default: 'tierlink') */
  name?: string;
  /** Minimum log level (default: 'info') */
  level?: LogLevel;
  /** Enable console output (default: true) */
  console?: boolean;
  /** Append log lines to this file as well */
  file?: string;
  /** Output JSON lines to the console instead of formatted text */
  json?: boolean;
  /** Enable colored console output (auto-detected when omitted) */
  colors?: boolean;
  /** Include timestamps in console output (default: true) */
  timestamps?: boolean;
}

/**
 * Factory function to create a Logger with common transport configurations.
 *
 * @example
 * ```typescript
 * // Console only
 * const logger = createLogger({ level: 'debug' });
 *
 * // Console plus a log file, as the service runs on a router
 * const logger = createLogger({ level: 'info', file: '/var/log/tierlink.log' });
 * ```
 */
export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const logger = new Logger({
    level: options.level ?? "info",
    context: { logger: options.name ?? "tierlink" },
  });

  if (options.console ?? true) {
    logger.addTransport(
      options.json
        ? new JsonTransport()
        : new ConsoleTransport({ colors: options.colors, timestamps: options.timestamps })
    );
  }

  if (options.file) {
    const path = options.file;
    logger.addTransport(
      new FileTransport({
        path,
        onError: (error) => {
          console.error(`tierlink: cannot write log file ${path}: ${error.message}`);
        },
      })
    );
  }

  return logger;
}
