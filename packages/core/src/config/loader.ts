import * as fs from "node:fs";
import * as TOML from "@iarna/toml";
import { Err, Ok, type Result } from "@tierlink/shared";
import { ErrorCode, TierlinkError } from "../errors/types.js";
import { deepFreeze } from "../utils/freeze.js";
import { CONFIG_DEFAULTS, DEFAULT_PROFILE } from "./defaults.js";
import { ConfigSchema, type PartialConfig, type ShapingConfig } from "./schema.js";

// ============================================
// Configuration Loader Module
// ============================================

/**
 * Configuration could not be found, read, parsed or validated.
 */
export class ConfigError extends TierlinkError {
  readonly path?: string;

  constructor(message: string, code: ErrorCode, options: { path?: string; cause?: Error } = {}) {
    super(message, code, { cause: options.cause, context: options.path ? { path: options.path } : undefined });
    this.name = "ConfigError";
    this.path = options.path;
  }
}

/**
 * Options for loadConfig function
 */
export interface LoadConfigOptions {
  /**
   * Config file to read. An explicit path must exist; without one the
   * default path is read when present.
   */
  path?: string;
  /** Config overrides (highest priority) */
  overrides?: PartialConfig;
  /** Environment to read TIERLINK_* variables from (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Skip loading environment variables */
  skipEnv?: boolean;
  /** Skip the config file entirely */
  skipFile?: boolean;
}

// ============================================
// parseEnvConfig
// ============================================

/**
 * Environment variable to config path mappings
 */
export const ENV_MAPPINGS: Record<string, readonly string[]> = {
  TIERLINK_INTERFACE: ["link", "interface"],
  TIERLINK_UPLOAD_KBPS: ["link", "rateKbps"],
  TIERLINK_RTT_MS: ["rttMs"],
  TIERLINK_LOG_LEVEL: ["logging", "level"],
  TIERLINK_LOG_FILE: ["logging", "file"],
};

const NUMERIC_PATHS = new Set(["link.rateKbps", "rttMs"]);

/**
 * Numbers are coerced only when they look like integers; anything else is
 * left as a string for validation to reject.
 */
function coerceValue(value: string, path: readonly string[]): unknown {
  if (NUMERIC_PATHS.has(path.join(".")) && /^\d+$/.test(value.trim())) {
    return Number(value.trim());
  }
  return value;
}

/**
 * Check if value is a plain object (not array, null, or other type)
 */
function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    Object.prototype.toString.call(value) === "[object Object]"
  );
}

/**
 * Set a nested value in an object using a path array
 */
function setNestedValue(target: Record<string, unknown>, path: readonly string[], value: unknown): void {
  let current = target;
  for (const key of path.slice(0, -1)) {
    const next = current[key];
    if (isPlainObject(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[key] = created;
      current = created;
    }
  }
  const lastKey = path[path.length - 1];
  if (lastKey !== undefined) {
    current[lastKey] = value;
  }
}

/**
 * Parse TIERLINK_* environment variables into a partial config object.
 *
 * @example
 * ```typescript
 * parseEnvConfig({ TIERLINK_UPLOAD_KBPS: "2000" });
 * // { link: { rateKbps: 2000 } }
 * ```
 */
export function parseEnvConfig(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  for (const [envVar, configPath] of Object.entries(ENV_MAPPINGS)) {
    const value = env[envVar];
    if (value !== undefined && value !== "") {
      setNestedValue(result, configPath, coerceValue(value, configPath));
    }
  }

  return result;
}

// ============================================
// deepMerge
// ============================================

/**
 * Deep merge multiple objects. Later sources override earlier ones.
 * Arrays are replaced (not concatenated).
 * undefined values don't overwrite existing values.
 *
 * @example
 * ```typescript
 * const result = deepMerge(
 *   { link: { interface: "eth0", rateKbps: 1000 } },
 *   { link: { rateKbps: 2000 } }
 * );
 * // { link: { interface: "eth0", rateKbps: 2000 } }
 * ```
 */
export function deepMerge(...sources: Record<string, unknown>[]): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  for (const source of sources) {
    for (const [key, sourceValue] of Object.entries(source)) {
      if (sourceValue === undefined) continue;

      const targetValue = result[key];
      if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
        result[key] = deepMerge(targetValue, sourceValue);
      } else if (isPlainObject(sourceValue)) {
        result[key] = deepMerge(sourceValue);
      } else {
        // Arrays and other values are replaced
        result[key] = sourceValue;
      }
    }
  }

  return result;
}

// ============================================
// loadConfig
// ============================================

/**
 * Read and parse a TOML config file
 */
export function readTomlFile(filePath: string): Result<Record<string, unknown>, ConfigError> {
  try {
    if (!fs.existsSync(filePath)) {
      return Err(new ConfigError(`Config file not found: ${filePath}`, ErrorCode.CONFIG_NOT_FOUND, { path: filePath }));
    }

    const content = fs.readFileSync(filePath, "utf-8");
    const parsed: Record<string, unknown> = TOML.parse(content);
    return Ok(parsed);
  } catch (error) {
    const cause = error instanceof Error ? error : undefined;
    if (error instanceof Error && error.name === "TomlError") {
      return Err(
        new ConfigError(`Failed to parse TOML in ${filePath}: ${error.message}`, ErrorCode.CONFIG_PARSE_ERROR, {
          path: filePath,
          cause,
        })
      );
    }
    return Err(
      new ConfigError(
        `Failed to read config file ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
        ErrorCode.CONFIG_READ_ERROR,
        { path: filePath, cause }
      )
    );
  }
}

/**
 * Load configuration from multiple sources with cascading priority.
 *
 * Load order (later overrides earlier):
 * 1. Built-in profile ({@link DEFAULT_PROFILE})
 * 2. Config file (explicit path, or the default path when present)
 * 3. Environment variables (unless skipEnv)
 * 4. CLI overrides (options.overrides)
 *
 * A source that declares `tiers` replaces the built-in tiers and default
 * tier together. The result is deep-frozen.
 *
 * @example
 * ```typescript
 * const result = loadConfig({ path: "/etc/tierlink/home.toml" });
 * if (result.ok) {
 *   console.log(result.value.link.rateKbps);
 * } else {
 *   console.error(result.error.message);
 * }
 * ```
 */
export function loadConfig(options: LoadConfigOptions = {}): Result<ShapingConfig, ConfigError> {
  const { path, overrides, env = process.env, skipEnv = false, skipFile = false } = options;

  const layers: Record<string, unknown>[] = [];

  if (!skipFile) {
    const filePath = path ?? CONFIG_DEFAULTS.paths.configFile;
    const fileResult = readTomlFile(filePath);
    if (fileResult.ok) {
      layers.push(fileResult.value);
    } else if (path !== undefined || fileResult.error.code !== ErrorCode.CONFIG_NOT_FOUND) {
      // The default file is optional; an explicit one is not
      return fileResult;
    }
  }

  if (!skipEnv) {
    const envConfig = parseEnvConfig(env);
    if (Object.keys(envConfig).length > 0) {
      layers.push(envConfig);
    }
  }

  if (overrides) {
    layers.push(overrides);
  }

  const definesTiers = layers.some((layer) => layer.tiers !== undefined);
  const profile: Record<string, unknown> = definesTiers ? { link: DEFAULT_PROFILE.link } : DEFAULT_PROFILE;

  const merged = deepMerge(profile, ...layers);
  const parseResult = ConfigSchema.safeParse(merged);

  if (!parseResult.success) {
    const issues = parseResult.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    return Err(
      new ConfigError(`Invalid configuration: ${issues}`, ErrorCode.CONFIG_INVALID, {
        path,
        cause: parseResult.error,
      })
    );
  }

  return Ok(deepFreeze(parseResult.data));
}
