/**
 * Helpers shared by the CLIs: colors, option parsing, the entry-point guard.
 */

import { CorpusFormatError } from "../corpora/errors.js";

const COLORS = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  green: "\x1b[32m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  cyan: "\x1b[36m",
};

export type Color = Exclude<keyof typeof COLORS, "reset">;

// Off when stdout is not a TTY or NO_COLOR is set.
let useColors = Boolean(process.stdout.isTTY) && !process.env.NO_COLOR;

export function disableColors(): void {
  useColors = false;
}

export function c(color: Color, text: string): string {
  return useColors ? `${COLORS[color]}${text}${COLORS.reset}` : text;
}

/**
 * True when the running script is `name` (source, build output or bin
 * link), so the CLI modules can be imported by tests without running.
 */
export function isDirectExecution(name: string): boolean {
  const script = process.argv[1];
  if (!script) return false;
  return [`${name}.ts`, `${name}.js`, name].some((suffix) => script.endsWith(suffix));
}

/**
 * Parse a positive integer option value.
 */
export function parsePositiveInt(name: string, value: string): number {
  if (!/^\d+$/.test(value) || Number(value) < 1) {
    throw new Error(`--${name} must be a positive integer, got: ${value}`);
  }
  return Number(value);
}

export function parseNumber(name: string, value: string): number {
  const parsed = Number(value);
  if (value.trim() === "" || !Number.isFinite(parsed)) {
    throw new Error(`--${name} must be a number, got: ${value}`);
  }
  return parsed;
}

/**
 * Error text for the console. Corpus format errors list each bad line.
 */
export function formatError(err: unknown): string {
  if (err instanceof CorpusFormatError) return err.format();
  return err instanceof Error ? err.message : String(err);
}
