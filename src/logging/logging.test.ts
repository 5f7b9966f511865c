/**
 * Logging tests.
 *
 * Run: node --import tsx src/logging/logging.test.ts
 *
 * Tests cover:
 *   1. Run IDs
 *   2. Logger — levels, file output, line format
 *   3. Event entries — line format, parsing, pretty form
 *   4. EventLog — recording, queries, debug echo
 */

import { strict as assert } from "node:assert";
import { existsSync, readFileSync, rmSync, mkdirSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";

import { generateRunId, initRunId, getRunId } from "./run-id.js";
import { createLogger, formatLogLine, isLogLevel, silentLogger, type Logger } from "./logger.js";
import {
  EventKind,
  EventLog,
  EventLogError,
  formatEventEntry,
  parseEventEntry,
  prettyEventEntry,
  type EventEntry,
} from "./event-log.js";

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

const TEST_DIR = join(tmpdir(), `logging-test-${process.pid}`);
mkdirSync(TEST_DIR, { recursive: true });

/** Clock that advances one second per reading. */
function steppingClock(start = "2024-01-15T10:00:00.000Z"): () => Date {
  let tick = 0;
  return () => new Date(Date.parse(start) + 1000 * tick++);
}

const SAMPLE_ENTRY: EventEntry = {
  time: new Date("2024-01-15T10:00:00.000Z"),
  kind: EventKind.Object,
  source: "MappingEngine",
  key: "Completion",
  payload: { Model: "m", Completion: "Line one\nLine two", "Prompt Character Count": 42 },
};

// ═══════════════════════════════════════════════════════════════════════════
// RUN IDS
// ═══════════════════════════════════════════════════════════════════════════

section("Run IDs");

test("generateRunId uses the UTC date and a hex suffix", () => {
  assert.match(generateRunId({ now: new Date("2024-01-15T10:00:00Z") }), /^20240115-[0-9a-f]{6}$/);
});

test("generateRunId folds the mapping name into a slug", () => {
  assert.match(
    generateRunId({ mapping: "Product Category_v2", now: new Date("2024-01-15T10:00:00Z") }),
    /^20240115-product-category-v2-[0-9a-f]{6}$/
  );
});

test("initRunId sets the current run ID", () => {
  assert.equal(initRunId("20240115-abc123"), "20240115-abc123");
  assert.equal(getRunId(), "20240115-abc123");
});

// ═══════════════════════════════════════════════════════════════════════════
// LOGGER
// ═══════════════════════════════════════════════════════════════════════════

section("Logger");

test("isLogLevel accepts the four levels only", () => {
  assert.ok(isLogLevel("debug"));
  assert.ok(isLogLevel("error"));
  assert.ok(!isLogLevel("verbose"));
});

test("writes lines at or above the level with run ID and context", () => {
  const logDir = join(TEST_DIR, "logs");
  const logger = createLogger({ level: "warn", logDir, logFile: "run.log", console: false });

  logger.info("Skipped");
  logger.warn("Low stock", { remaining: 1 });

  const lines = readFileSync(join(logDir, "run.log"), "utf-8").trim().split("\n");
  assert.equal(lines.length, 1);
  assert.match(
    lines[0] ?? "",
    /^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] \[WARN \] \[20240115-abc123\] Low stock \{"remaining":1\}$/
  );
});

test("child loggers add the mapping, model and record scope", () => {
  const logDir = join(TEST_DIR, "scoped");
  const logger = createLogger({ level: "debug", logDir, logFile: "run.log", console: false });

  const engineLogger = logger.child({ mapping: "product-category", model: "scripted-model" });
  engineLogger.info("Mapping corpus", { records: 2 });
  engineLogger.child({ record: 1 }).debug("Requesting completion");

  const lines = readFileSync(join(logDir, "run.log"), "utf-8").trim().split("\n");
  assert.match(
    lines[0] ?? "",
    /\] \[INFO \] \[20240115-abc123\] \[product-category scripted-model\] Mapping corpus \{"records":2\}$/
  );
  assert.match(lines[1] ?? "", /\] \[DEBUG\] \[20240115-abc123\] \[product-category scripted-model #1\] Requesting completion$/);
});

test("formatLogLine omits an empty scope and empty context", () => {
  assert.equal(
    formatLogLine({
      time: new Date("2024-01-15T10:00:00.000Z"),
      level: "error",
      runId: null,
      scope: {},
      message: "Stopped",
      context: {},
    }),
    "[2024-01-15T10:00:00.000Z] [ERROR] [no-run-id] Stopped"
  );
  assert.equal(
    formatLogLine({
      time: new Date("2024-01-15T10:00:00.000Z"),
      level: "info",
      runId: "r1",
      scope: { record: 0 },
      message: "Done",
    }),
    "[2024-01-15T10:00:00.000Z] [INFO ] [r1] [#0] Done"
  );
});

test("silentLogger children stay silent", () => {
  assert.equal(silentLogger.child({ record: 3 }), silentLogger);
});

test("file output off creates no directory", () => {
  const logDir = join(TEST_DIR, "never");
  createLogger({ logDir, console: false, file: false }).error("nothing written");
  assert.ok(!existsSync(logDir));
});

// ═══════════════════════════════════════════════════════════════════════════
// EVENT ENTRIES
// ═══════════════════════════════════════════════════════════════════════════

section("Event entries");

test("formats one tab-separated line with a JSON payload", () => {
  const line = formatEventEntry({
    time: new Date("2024-01-15T10:00:00.000Z"),
    kind: EventKind.Message,
    source: "CLI",
    key: "Start",
    payload: "hello",
  });
  assert.equal(line, '2024-01-15T10:00:00.000Z\tMESSAGE\tCLI\tStart\t"hello"');
});

test("parses its own lines back", () => {
  assert.deepEqual(parseEventEntry(formatEventEntry(SAMPLE_ENTRY)), SAMPLE_ENTRY);
});

test("rejects lines with the wrong field count", () => {
  assert.throws(() => parseEventEntry("2024-01-15T10:00:00.000Z\tMESSAGE\tCLI\t\"x\""), EventLogError);
});

test("rejects a kind that does not match the payload", () => {
  assert.throws(
    () => parseEventEntry('2024-01-15T10:00:00.000Z\tMESSAGE\tCLI\tStart\t{"a":1}'),
    EventLogError
  );
});

test("pretty form sorts fields and prefixes multi-line values", () => {
  assert.equal(
    prettyEventEntry(SAMPLE_ENTRY),
    [
      "Time: 2024-01-15T10:00:00.000Z",
      "Source: MappingEngine",
      "Key: Completion",
      "Completion:",
      ">>> Line one",
      ">>> Line two",
      "Model: m",
      "Prompt Character Count: 42",
    ].join("\n")
  );
});

test("pretty form can show string lengths", () => {
  const lines = prettyEventEntry(SAMPLE_ENTRY, true).split("\n");
  assert.equal(lines[3], "Completion (17):");
  assert.equal(lines[6], "Model (1): m");
  assert.equal(lines[7], "Prompt Character Count: 42");
});

// ═══════════════════════════════════════════════════════════════════════════
// EVENT LOG
// ═══════════════════════════════════════════════════════════════════════════

section("EventLog");

test("appends entries to the file, creating its directory", () => {
  const filePath = join(TEST_DIR, "events", "nested", "events.log");
  const log = new EventLog({ debug: false, filePath }, undefined, { now: steppingClock() });

  log.record("CLI", "Start", "mapping started");
  log.record("MappingEngine", "Completion", { Completion: "ok" });

  const lines = readFileSync(filePath, "utf-8").split("\n");
  assert.deepEqual(lines, [
    '2024-01-15T10:00:00.000Z\tMESSAGE\tCLI\tStart\t"mapping started"',
    '2024-01-15T10:00:01.000Z\tOBJECT\tMappingEngine\tCompletion\t{"Completion":"ok"}',
    "",
  ]);
});

test("select filters by source and key, most recent first, up to a limit", () => {
  const log = new EventLog(
    { debug: false, filePath: join(TEST_DIR, "select.log") },
    undefined,
    { now: steppingClock() }
  );
  log.record("MappingEngine", "Completion", "first");
  log.record("MappingEngine", "Error", "second");
  log.record("MappingEngine", "Completion", "third");
  log.record("CLI", "Completion", "fourth");

  const payloads = (entries: EventEntry[]): unknown[] => entries.map((e) => e.payload);

  assert.deepEqual(payloads(log.select({ source: "MappingEngine", key: "Completion" })), ["third", "first"]);
  assert.deepEqual(payloads(log.select({ key: "Completion", limit: 2 })), ["fourth", "third"]);
  assert.deepEqual(payloads(log.select({ source: "MappingEngine", descending: false })), [
    "first",
    "second",
    "third",
  ]);
  assert.deepEqual(log.select({ limit: 0 }), []);
});

test("sourcesAndKeys lists distinct pairs sorted", () => {
  const log = new EventLog({ debug: false, filePath: join(TEST_DIR, "select.log") });
  assert.deepEqual(log.sourcesAndKeys(), [
    ["CLI", "Completion"],
    ["MappingEngine", "Completion"],
    ["MappingEngine", "Error"],
  ]);
});

test("without a file, records are returned but nothing is stored", () => {
  const log = new EventLog({ debug: false, filePath: null });
  const entry = log.record("CLI", "Start", { ok: true });
  assert.equal(entry.kind, EventKind.Object);
  assert.deepEqual(log.entries(), []);
});

test("debug mode echoes the pretty form through the logger", () => {
  const messages: string[] = [];
  const capture: Logger = {
    debug: () => undefined,
    info: (message) => messages.push(message),
    warn: () => undefined,
    error: () => undefined,
    child: () => capture,
  };
  const log = new EventLog({ debug: true, filePath: null }, capture, {
    now: () => new Date("2024-01-15T10:00:00.000Z"),
  });

  log.record("CLI", "Start", "hello");
  assert.deepEqual(messages, [
    "Time: 2024-01-15T10:00:00.000Z\nSource: CLI\nKey: Start\nMessage: hello\n",
  ]);
});

test("rejects tabs and line breaks in source and key", () => {
  const log = new EventLog({ debug: false, filePath: null });
  assert.throws(() => log.record("CLI\t2", "Start", "x"), EventLogError);
  assert.throws(() => log.record("CLI", "Start\n", "x"), EventLogError);
});

// ═══════════════════════════════════════════════════════════════════════════
// CLEANUP & SUMMARY
// ═══════════════════════════════════════════════════════════════════════════

rmSync(TEST_DIR, { recursive: true, force: true });

console.log(`\n═══════════════════════════════════════════════`);
console.log(`  Results: ${passed} passed, ${failed} failed`);
console.log(`═══════════════════════════════════════════════\n`);

if (failed > 0) {
  process.exit(1);
}
