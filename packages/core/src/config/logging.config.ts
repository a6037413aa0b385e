import type { LogLevel } from "../logger/types.js";
import { CONFIG_DEFAULTS } from "./defaults.js";
import type { ShapingConfig } from "./schema.js";

/**
 * Configuration for logging behavior.
 */
export interface LoggingConfig {
  /** Minimum log level to output */
  level: LogLevel;
  /** Enable ANSI color codes in console output */
  colors: boolean;
  /** Include timestamps in log output */
  timestamps: boolean;
  /** Output logs in JSON format */
  json: boolean;
  /** Log file to append to, if any */
  file?: string;
}

/**
 * Output verbosity flags accepted on the command line.
 */
export interface VerbosityFlags {
  debug?: boolean;
  verbose?: boolean;
  quiet?: boolean;
}

/**
 * Interactive terminal configuration.
 * - Colored, human-readable output
 */
export const interactiveConfig: LoggingConfig = {
  level: "warn",
  colors: true,
  timestamps: true,
  json: false,
};

/**
 * Test environment logging configuration.
 * - Warn level (minimal output during tests)
 * - No colors
 */
export const testConfig: LoggingConfig = {
  level: "warn",
  colors: false,
  timestamps: false,
  json: false,
};

/**
 * Resolves the effective level: `--debug` beats `--verbose`, which beats
 * `--quiet`; without flags the configured level applies.
 */
export function levelForFlags(flags: VerbosityFlags, configured: LogLevel): LogLevel {
  if (flags.debug) return "debug";
  if (flags.verbose) return "info";
  if (flags.quiet) return "error";
  return configured;
}

/**
 * Builds the logging configuration for a run from the loaded config and
 * the command-line flags.
 *
 * @example
 * ```typescript
 * const logging = createLoggingConfig(config, { debug: true });
 * // { level: "debug", colors: true, ... }
 * ```
 */
export function createLoggingConfig(config: ShapingConfig, flags: VerbosityFlags = {}): LoggingConfig {
  const base = process.env.NODE_ENV === "test" ? testConfig : interactiveConfig;

  return {
    ...base,
    level: levelForFlags(flags, config.logging.level),
    json: config.logging.json,
    // Debug runs also keep a log file
    file: config.logging.file ?? (flags.debug ? CONFIG_DEFAULTS.paths.logFile : undefined),
  };
}
