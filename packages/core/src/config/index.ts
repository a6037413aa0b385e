// ============================================
// Config Module Barrel Export
// ============================================

export { CONFIG_DEFAULTS, type ConfigDefaults, DEFAULT_PROFILE } from "./defaults.js";
export {
  ConfigError,
  deepMerge,
  ENV_MAPPINGS,
  type LoadConfigOptions,
  loadConfig,
  parseEnvConfig,
  readTomlFile,
} from "./loader.js";
export {
  createLoggingConfig,
  interactiveConfig,
  type LoggingConfig,
  levelForFlags,
  testConfig,
  type VerbosityFlags,
} from "./logging.config.js";
export {
  BackendSchema,
  ConfigSchema,
  DefaultTierSchema,
  LinkSchema,
  LoggingSchema,
  LogLevelSchema,
  type MatchEntry,
  MatchEntrySchema,
  type PartialConfig,
  PercentageTierSchema,
  PortSchema,
  PriorityClassSchema,
  ReconfigureSchema,
  ReservedTierSchema,
  type ShapingConfig,
  StateSchema,
  type TierConfig,
  TierIdSchema,
  TierSchema,
} from "./schema.js";
export { toAllocationInput, toMatchSpecs } from "./shaping-input.js";
