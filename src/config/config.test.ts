/**
 * Configuration tests.
 *
 * Run: node --import tsx src/config/config.test.ts
 */

import { strict as assert } from "node:assert";

import {
  ConfigError,
  optionalEnv,
  optionalEnvBool,
  optionalEnvFloat,
  optionalEnvInt,
  optionalEnvOrNull,
  requireEnv,
} from "./env.js";
import { configuredLogLevel, loadConfig, validateConfig } from "./index.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST HELPERS
// ═══════════════════════════════════════════════════════════════════════════

let passed = 0;
let failed = 0;

function test(name: string, fn: () => void): void {
  try {
    fn();
    passed++;
    console.log(`  ✓ ${name}`);
  } catch (err) {
    failed++;
    console.error(`  ✗ ${name}`);
    console.error(`    ${err instanceof Error ? err.message : String(err)}`);
  }
}

function section(title: string): void {
  console.log(`\n── ${title} ──`);
}

// ═══════════════════════════════════════════════════════════════════════════
// ENV HELPERS
// ═══════════════════════════════════════════════════════════════════════════

section("Environment helpers");

test("requireEnv rejects missing and empty values", () => {
  assert.equal(requireEnv("KEY", { KEY: "value" }), "value");
  assert.throws(() => requireEnv("KEY", {}), ConfigError);
  assert.throws(() => requireEnv("KEY", { KEY: "" }), ConfigError);
});

test("optionalEnv falls back on missing and empty values", () => {
  assert.equal(optionalEnv("KEY", "fallback", {}), "fallback");
  assert.equal(optionalEnv("KEY", "fallback", { KEY: "" }), "fallback");
  assert.equal(optionalEnv("KEY", "fallback", { KEY: "set" }), "set");
  assert.equal(optionalEnvOrNull("KEY", {}), null);
});

test("optionalEnvInt parses integers and rejects anything else", () => {
  assert.equal(optionalEnvInt("N", 5, {}), 5);
  assert.equal(optionalEnvInt("N", 5, { N: "256" }), 256);
  assert.equal(optionalEnvInt("N", 5, { N: "-3" }), -3);
  assert.throws(() => optionalEnvInt("N", 5, { N: "12abc" }), ConfigError);
  assert.throws(() => optionalEnvInt("N", 5, { N: "1.5" }), ConfigError);
});

test("optionalEnvFloat parses numbers and returns null when unset", () => {
  assert.equal(optionalEnvFloat("T", {}), null);
  assert.equal(optionalEnvFloat("T", { T: "0.25" }), 0.25);
  assert.throws(() => optionalEnvFloat("T", { T: "warm" }), ConfigError);
  assert.throws(() => optionalEnvFloat("T", { T: "  " }), ConfigError);
});

test("optionalEnvBool recognizes true/false/1/0/yes/no", () => {
  assert.equal(optionalEnvBool("B", false, { B: "YES" }), true);
  assert.equal(optionalEnvBool("B", true, { B: "0" }), false);
  assert.equal(optionalEnvBool("B", true, {}), true);
  assert.throws(() => optionalEnvBool("B", false, { B: "maybe" }), ConfigError);
});

// ═══════════════════════════════════════════════════════════════════════════
// APP CONFIG
// ═══════════════════════════════════════════════════════════════════════════

section("loadConfig / validateConfig");

test("defaults apply when nothing is set", () => {
  const config = loadConfig({});
  assert.deepEqual(config, {
    env: "development",
    debug: false,
    logLevel: "info",
    appName: "prompt-mappings",
    logDir: "output/logs",
    completionModel: "claude-3-5-sonnet-latest",
    completionMaxTokens: 1024,
    completionTemperature: null,
    eventLogPath: null,
  });
  assert.ok(Object.isFrozen(config));
  validateConfig(config);
});

test("reads every variable", () => {
  const config = loadConfig({
    NODE_ENV: "test",
    DEBUG: "true",
    LOG_LEVEL: "debug",
    APP_NAME: "catalog-mapper",
    LOG_DIR: "/tmp/logs",
    COMPLETION_MODEL: "test-model",
    COMPLETION_MAX_TOKENS: "256",
    COMPLETION_TEMPERATURE: "0",
    EVENT_LOG_PATH: "/tmp/events.log",
  });
  assert.equal(config.debug, true);
  assert.equal(config.completionModel, "test-model");
  assert.equal(config.completionMaxTokens, 256);
  assert.equal(config.completionTemperature, 0);
  assert.equal(config.eventLogPath, "/tmp/events.log");
  assert.equal(configuredLogLevel(config), "debug");
  validateConfig(config);
});

test("validateConfig rejects out-of-range values", () => {
  assert.throws(() => validateConfig(loadConfig({ NODE_ENV: "staging" })), ConfigError);
  assert.throws(() => validateConfig(loadConfig({ LOG_LEVEL: "verbose" })), ConfigError);
  assert.throws(() => validateConfig(loadConfig({ COMPLETION_MAX_TOKENS: "0" })), ConfigError);
  assert.throws(() => validateConfig(loadConfig({ COMPLETION_TEMPERATURE: "1.5" })), ConfigError);
});

test("malformed numbers fail while loading", () => {
  assert.throws(() => loadConfig({ COMPLETION_MAX_TOKENS: "many" }), ConfigError);
});

// ═══════════════════════════════════════════════════════════════════════════
// SUMMARY
// ═══════════════════════════════════════════════════════════════════════════

console.log(`\n═══════════════════════════════════════════════`);
console.log(`  Results: ${passed} passed, ${failed} failed`);
console.log(`═══════════════════════════════════════════════\n`);

if (failed > 0) {
  process.exit(1);
}
