/**
 * prompt-mappings: turn directories of prompt assets into record-to-record
 * transformations driven by one completion per record.
 */

export * from "./templates/index.js";
export * from "./completions/index.js";
export * from "./corpora/index.js";
export * from "./mappings/index.js";
export * from "./logging/index.js";
export {
  loadConfig,
  validateConfig,
  configuredLogLevel,
  ConfigError,
  type AppConfig,
  type EnvSource,
} from "./config/index.js";
