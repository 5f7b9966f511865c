/**
 * Append-only event log for mapping runs.
 *
 * Every completion attempt is recorded as one event: a timestamped
 * message or JSON object filed under a source (the component) and a key
 * (what happened). Events are written one per line:
 *
 *   <ISO time> \t <MESSAGE|OBJECT> \t <source> \t <key> \t <JSON payload>
 *
 * The log can be queried afterwards by source and key, most recent first.
 *
 * Configuration is an explicit object handed to the EventLog instance;
 * nothing is read from process-wide state.
 */

import { appendFileSync, existsSync, mkdirSync, readFileSync } from "node:fs";
import { dirname } from "node:path";

import type { Logger } from "./logger.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export enum EventKind {
  Message = "MESSAGE",
  Object = "OBJECT",
}

export type EventPayload = string | Record<string, unknown>;

export interface EventEntry {
  readonly time: Date;
  readonly kind: EventKind;
  readonly source: string;
  readonly key: string;
  readonly payload: EventPayload;
}

export interface EventLogConfig {
  /** Echo each event in readable form through the logger */
  readonly debug: boolean;
  /** Log file to append to; null keeps no file */
  readonly filePath: string | null;
}

export interface EventQuery {
  source?: string;
  key?: string;
  /** Maximum number of entries returned */
  limit?: number;
  /** Most recent first (default true) */
  descending?: boolean;
}

export class EventLogError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "EventLogError";
  }
}

// ---------------------------------------------------------------------------
// Line format
// ---------------------------------------------------------------------------

const FIELD_SEPARATOR = "\t";
const UNSAFE_NAME_RE = /[\t\r\n]/;
const MULTILINE_PREFIX = ">>> ";

export function formatEventEntry(entry: EventEntry): string {
  return [
    entry.time.toISOString(),
    entry.kind,
    entry.source,
    entry.key,
    JSON.stringify(entry.payload),
  ].join(FIELD_SEPARATOR);
}

function isPayloadObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * @throws EventLogError if the line is not a well-formed entry
 */
export function parseEventEntry(line: string): EventEntry {
  const fields = line.replace(/\r?\n$/, "").split(FIELD_SEPARATOR);
  if (fields.length !== 5) {
    throw new EventLogError(`Expected 5 tab-separated fields, found ${fields.length}: ${line}`);
  }
  const [timeText = "", kindText = "", source = "", key = "", payloadText = ""] = fields;

  const time = new Date(timeText);
  if (Number.isNaN(time.getTime())) {
    throw new EventLogError(`Invalid event time "${timeText}"`);
  }

  let payload: unknown;
  try {
    payload = JSON.parse(payloadText);
  } catch (err) {
    throw new EventLogError(
      `Invalid event payload: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  if (kindText === EventKind.Message && typeof payload === "string") {
    return { time, kind: EventKind.Message, source, key, payload };
  }
  if (kindText === EventKind.Object && isPayloadObject(payload)) {
    return { time, kind: EventKind.Object, source, key, payload };
  }
  throw new EventLogError(`Event kind "${kindText}" does not match its payload`);
}

function payloadFields(payload: EventPayload): [string, unknown][] {
  if (typeof payload === "string") return [["Message", payload]];
  const object: Record<string, unknown> = payload;
  return Object.keys(object)
    .sort()
    .map((name): [string, unknown] => [name, object[name]]);
}

function displayValue(value: unknown): string {
  return typeof value === "string" ? value : JSON.stringify(value) ?? String(value);
}

/**
 * Readable multi-line rendering of an entry. Object fields are sorted;
 * multi-line values are indented under a ">>> " prefix.
 */
export function prettyEventEntry(entry: EventEntry, showCharacterCounts = false): string {
  const lines = [
    `Time: ${entry.time.toISOString()}`,
    `Source: ${entry.source}`,
    `Key: ${entry.key}`,
  ];

  const count = (value: unknown): string =>
    showCharacterCounts && typeof value === "string" ? ` (${value.length})` : "";

  for (const [name, value] of payloadFields(entry.payload)) {
    const text = displayValue(value);
    if (text.includes("\n")) {
      lines.push(`${name}${count(value)}:`);
      lines.push(...text.split("\n").map((l) => MULTILINE_PREFIX + l));
    } else {
      lines.push(`${name}${count(value)}: ${text}`);
    }
  }

  return lines.join("\n");
}

// ---------------------------------------------------------------------------
// Event log
// ---------------------------------------------------------------------------

export class EventLog {
  private readonly now: () => Date;

  constructor(
    public readonly config: EventLogConfig,
    private readonly logger?: Logger,
    options: { now?: () => Date } = {}
  ) {
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Append an event. Strings are recorded as messages, objects as JSON.
   *
   * @throws EventLogError if source or key contains a tab or line break
   */
  record(source: string, key: string, payload: EventPayload): EventEntry {
    if (UNSAFE_NAME_RE.test(source) || UNSAFE_NAME_RE.test(key)) {
      throw new EventLogError(`Event source and key may not contain tabs or line breaks: "${source}" / "${key}"`);
    }

    const entry: EventEntry = {
      time: this.now(),
      kind: typeof payload === "string" ? EventKind.Message : EventKind.Object,
      source,
      key,
      payload,
    };

    if (this.config.debug) {
      const text = `${prettyEventEntry(entry)}\n`;
      if (this.logger) {
        this.logger.info(text);
      } else {
        console.log(text);
      }
    }

    const { filePath } = this.config;
    if (filePath !== null) {
      const dir = dirname(filePath);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
      appendFileSync(filePath, formatEventEntry(entry) + "\n");
    }

    return entry;
  }

  /**
   * All entries in file order. Empty when no file is configured or it
   * does not exist yet.
   */
  entries(): EventEntry[] {
    const { filePath } = this.config;
    if (filePath === null || !existsSync(filePath)) return [];

    return readFileSync(filePath, "utf-8")
      .split("\n")
      .filter((line) => line.trim().length > 0)
      .map(parseEventEntry);
  }

  /**
   * Entries matching a source and/or key, most recent first unless
   * `descending` is false, capped at `limit`.
   */
  select(query: EventQuery = {}): EventEntry[] {
    const { source, key, limit, descending = true } = query;
    if (limit !== undefined && limit <= 0) return [];

    const ordered = descending ? this.entries().reverse() : this.entries();
    const matching = ordered.filter(
      (entry) =>
        (source === undefined || entry.source === source) &&
        (key === undefined || entry.key === key)
    );
    return limit === undefined ? matching : matching.slice(0, limit);
  }

  /**
   * Distinct (source, key) pairs present in the log, sorted.
   */
  sourcesAndKeys(): [string, string][] {
    const seen = new Map<string, [string, string]>();
    for (const entry of this.entries()) {
      seen.set(`${entry.source}${FIELD_SEPARATOR}${entry.key}`, [entry.source, entry.key]);
    }
    return [...seen.values()].sort(
      ([sa, ka], [sb, kb]) => sa.localeCompare(sb) || ka.localeCompare(kb)
    );
  }
}
