/**
 * Environment variable loading and validation.
 *
 * Every helper reads from `process.env` unless another source is passed,
 * so configuration can be built from a fixed map in tests.
 */

import "dotenv/config";

export type EnvSource = Readonly<Record<string, string | undefined>>;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Get a required environment variable.
 * Throws ConfigError if the variable is missing or empty.
 */
export function requireEnv(key: string, env: EnvSource = process.env): string {
  const value = env[key];
  if (value === undefined || value === "") {
    throw new ConfigError(`Missing required environment variable: ${key}`);
  }
  return value;
}

/**
 * Get an optional environment variable with a default value.
 */
export function optionalEnv(key: string, defaultValue: string, env: EnvSource = process.env): string {
  const value = env[key];
  return value !== undefined && value !== "" ? value : defaultValue;
}

/**
 * Get an optional environment variable, or null when unset or empty.
 */
export function optionalEnvOrNull(key: string, env: EnvSource = process.env): string | null {
  const value = env[key];
  return value !== undefined && value !== "" ? value : null;
}

/**
 * Get an optional environment variable as an integer.
 */
export function optionalEnvInt(key: string, defaultValue: number, env: EnvSource = process.env): number {
  const value = env[key];
  if (value === undefined || value === "") {
    return defaultValue;
  }
  if (!/^-?\d+$/.test(value.trim())) {
    throw new ConfigError(
      `Environment variable ${key} must be a valid integer, got: ${value}`
    );
  }
  return parseInt(value, 10);
}

/**
 * Get an optional environment variable as a number, or null when unset.
 */
export function optionalEnvFloat(key: string, env: EnvSource = process.env): number | null {
  const value = env[key];
  if (value === undefined || value === "") {
    return null;
  }
  const parsed = Number(value);
  if (value.trim() === "" || !Number.isFinite(parsed)) {
    throw new ConfigError(
      `Environment variable ${key} must be a number, got: ${value}`
    );
  }
  return parsed;
}

/**
 * Get an optional environment variable as a boolean.
 * Recognizes: true, false, 1, 0, yes, no (case-insensitive)
 */
export function optionalEnvBool(key: string, defaultValue: boolean, env: EnvSource = process.env): boolean {
  const value = env[key];
  if (value === undefined || value === "") {
    return defaultValue;
  }
  const normalized = value.toLowerCase();
  if (["true", "1", "yes"].includes(normalized)) {
    return true;
  }
  if (["false", "0", "no"].includes(normalized)) {
    return false;
  }
  throw new ConfigError(
    `Environment variable ${key} must be a boolean (true/false/1/0/yes/no), got: ${value}`
  );
}
