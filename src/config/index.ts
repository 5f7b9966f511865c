/**
 * Application configuration.
 * Validates and exposes typed configuration values.
 */

import {
  ConfigError,
  optionalEnv,
  optionalEnvOrNull,
  optionalEnvInt,
  optionalEnvFloat,
  optionalEnvBool,
  type EnvSource,
} from "./env.js";
import { isLogLevel, type LogLevel } from "../logging/index.js";

export { ConfigError, type EnvSource } from "./env.js";

const ENVIRONMENTS: readonly string[] = ["development", "production", "test"];

export interface AppConfig {
  /** Current environment (development, production, test) */
  readonly env: string;
  /** Echo completion events to the console */
  readonly debug: boolean;
  /** Log level */
  readonly logLevel: string;
  /** Application name */
  readonly appName: string;
  /** Directory for the run log file */
  readonly logDir: string;
  /** Model used for completions */
  readonly completionModel: string;
  /** Upper bound on tokens per completion */
  readonly completionMaxTokens: number;
  /** Sampling temperature; null leaves the service default */
  readonly completionTemperature: number | null;
  /** Event log file; null keeps no event log on disk */
  readonly eventLogPath: string | null;
}

/**
 * Read configuration from the environment. Values are parsed here;
 * cross-field checks happen in validateConfig.
 *
 * @throws ConfigError if a numeric or boolean variable is malformed
 */
export function loadConfig(env: EnvSource = process.env): AppConfig {
  return Object.freeze({
    env: optionalEnv("NODE_ENV", "development", env),
    debug: optionalEnvBool("DEBUG", false, env),
    logLevel: optionalEnv("LOG_LEVEL", "info", env),
    appName: optionalEnv("APP_NAME", "prompt-mappings", env),
    logDir: optionalEnv("LOG_DIR", "output/logs", env),
    completionModel: optionalEnv("COMPLETION_MODEL", "claude-3-5-sonnet-latest", env),
    completionMaxTokens: optionalEnvInt("COMPLETION_MAX_TOKENS", 1024, env),
    completionTemperature: optionalEnvFloat("COMPLETION_TEMPERATURE", env),
    eventLogPath: optionalEnvOrNull("EVENT_LOG_PATH", env),
  });
}

/**
 * Validate a loaded configuration.
 * Call this at application startup to fail fast.
 */
export function validateConfig(config: AppConfig): void {
  if (!ENVIRONMENTS.includes(config.env)) {
    throw new ConfigError(
      `Invalid NODE_ENV: ${config.env}. Must be development, production, or test.`
    );
  }

  if (!isLogLevel(config.logLevel)) {
    throw new ConfigError(
      `Invalid LOG_LEVEL: ${config.logLevel}. Must be debug, info, warn, or error.`
    );
  }

  if (config.completionMaxTokens <= 0) {
    throw new ConfigError(
      `Invalid COMPLETION_MAX_TOKENS: ${config.completionMaxTokens}. Must be a positive integer.`
    );
  }

  const temperature = config.completionTemperature;
  if (temperature !== null && (temperature < 0 || temperature > 1)) {
    throw new ConfigError(
      `Invalid COMPLETION_TEMPERATURE: ${temperature}. Must be between 0 and 1.`
    );
  }
}

/**
 * The configured log level, narrowed. Assumes validateConfig has passed.
 */
export function configuredLogLevel(config: AppConfig): LogLevel {
  return isLogLevel(config.logLevel) ? config.logLevel : "info";
}
