// ============================================
// Config Module Barrel Export
// ============================================

export {
  type ConfigErrorCode,
  type ConfigLoadError,
  deepMerge,
  findProjectConfig,
  type LoadConfigOptions,
  loadConfig,
  parseEnvConfig,
  toConfigurationError,
} from "./loader.js";
export {
  BusConfigSchema,
  type CharacterConfig,
  CharacterConfigSchema,
  LoggingConfigSchema,
  ParallelSchema,
  type PartialQuillworkConfig,
  type QuillworkConfig,
  QuillworkConfigSchema,
  RateLimitConfigSchema,
  RolesSchema,
  TimeoutsSchema,
  type WorkerConfig,
  WorkerConfigSchema,
} from "./schema.js";
