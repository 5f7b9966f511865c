/**
 * Run logger.
 *
 * One line per entry, on the console and/or in a log file:
 *
 *   [2024-01-15T10:00:00.000Z] [WARN ] [20240115-product-category-a1b2c3] [product-category claude-x #3] Completion did not match {"error":"..."}
 *
 * The bracketed scope names the mapping, model and record a line is about.
 * Loggers handed to the engine are narrowed with `child()` so every line a
 * record produces carries its index.
 */

import { appendFileSync, mkdirSync } from "node:fs";
import { join } from "node:path";
import { getRunId } from "./run-id.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export type LogContext = Record<string, unknown>;

/** What part of a mapping run a line is about. */
export interface LogScope {
  /** Mapping directory name */
  mapping?: string;
  model?: string;
  /** Index of the record within its batch */
  record?: number;
}

export interface LogLine {
  time: Date;
  level: LogLevel;
  runId: string | null;
  scope: LogScope;
  message: string;
  context?: LogContext;
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  /** Logger whose lines also carry `scope`; narrower fields win. */
  child(scope: LogScope): Logger;
}

export interface LoggerOptions {
  /** Minimum level written */
  level?: LogLevel;
  logDir?: string;
  /** File name inside logDir */
  logFile?: string;
  console?: boolean;
  file?: boolean;
}

const DEFAULT_OPTIONS: Required<LoggerOptions> = {
  level: "info",
  logDir: "output/logs",
  logFile: "mappings.log",
  console: true,
  file: true,
};

function formatScope(scope: LogScope): string | null {
  const parts: string[] = [];
  if (scope.mapping !== undefined) parts.push(scope.mapping);
  if (scope.model !== undefined) parts.push(scope.model);
  if (scope.record !== undefined) parts.push(`#${scope.record}`);
  return parts.length > 0 ? `[${parts.join(" ")}]` : null;
}

export function formatLogLine(line: LogLine): string {
  const head = [
    `[${line.time.toISOString()}]`,
    `[${line.level.toUpperCase().padEnd(5)}]`,
    `[${line.runId ?? "no-run-id"}]`,
  ];
  const scope = formatScope(line.scope);
  if (scope !== null) head.push(scope);
  head.push(line.message);
  if (line.context && Object.keys(line.context).length > 0) {
    head.push(JSON.stringify(line.context));
  }
  return head.join(" ");
}

const CONSOLE_METHODS: Record<LogLevel, (text: string) => void> = {
  debug: (text) => console.debug(text),
  info: (text) => console.info(text),
  warn: (text) => console.warn(text),
  error: (text) => console.error(text),
};

/**
 * File output is on by default; library callers pass `{ file: false }`.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const opts: Required<LoggerOptions> = { ...DEFAULT_OPTIONS, ...options };
  const logFilePath = join(opts.logDir, opts.logFile);
  const threshold = LOG_LEVELS.indexOf(opts.level);

  if (opts.file) {
    mkdirSync(opts.logDir, { recursive: true });
  }

  function scoped(scope: LogScope): Logger {
    const write = (level: LogLevel, message: string, context?: LogContext): void => {
      if (LOG_LEVELS.indexOf(level) < threshold) return;

      const text = formatLogLine({ time: new Date(), level, runId: getRunId(), scope, message, context });
      if (opts.console) {
        CONSOLE_METHODS[level](text);
      }
      if (opts.file) {
        try {
          appendFileSync(logFilePath, text + "\n");
        } catch (err) {
          console.error(`Failed to write to ${logFilePath}: ${err instanceof Error ? err.message : String(err)}`);
        }
      }
    };

    return {
      debug: (message, context) => write("debug", message, context),
      info: (message, context) => write("info", message, context),
      warn: (message, context) => write("warn", message, context),
      error: (message, context) => write("error", message, context),
      child: (narrower) => scoped({ ...scope, ...narrower }),
    };
  }

  return scoped({});
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  child: () => silentLogger,
};
