#!/usr/bin/env node
/**
 * Query an event log written by run-mapping.
 *
 * USAGE:
 *
 *   npm run show-log -- --log output/logs/events.log --keys
 *   npm run show-log -- --log output/logs/events.log --key Error --limit 5
 *
 * Options:
 *   --log <path>      Event log file (required)
 *   --source <name>   Only entries from this source
 *   --key <name>      Only entries with this key
 *   --limit <n>       At most n entries
 *   --ascending       Oldest first (default: most recent first)
 *   --keys            List distinct source/key pairs instead of entries
 *   --counts          Show character counts of string fields
 *   --json            Output as JSON
 *   --no-color        Disable ANSI colors
 *   -h, --help        Show help
 */

import { existsSync } from "node:fs";
import { parseArgs } from "node:util";

import { EventLog, prettyEventEntry } from "../logging/index.js";
import { c, disableColors, formatError, isDirectExecution, parsePositiveInt } from "./common.js";

const HELP = `
Usage: show-log --log <path> [options]

Options:
  --log <path>      Event log file (required)
  --source <name>   Only entries from this source
  --key <name>      Only entries with this key
  --limit <n>       At most n entries
  --ascending       Oldest first (default: most recent first)
  --keys            List distinct source/key pairs instead of entries
  --counts          Show character counts of string fields
  --json            Output as JSON
  --no-color        Disable ANSI colors
  -h, --help        Show this help message
`;

export interface ShowLogOptions {
  logPath: string;
  source?: string;
  key?: string;
  limit?: number;
  ascending?: boolean;
  keysOnly?: boolean;
  counts?: boolean;
  json?: boolean;
}

const ENTRY_SEPARATOR = "\n" + "─".repeat(60) + "\n";

/**
 * Render matching entries, or the distinct source/key pairs, as text.
 *
 * @throws Error if the log file does not exist
 */
export function showLog(options: ShowLogOptions): string {
  if (!existsSync(options.logPath)) {
    throw new Error(`Event log not found: ${options.logPath}`);
  }
  const log = new EventLog({ debug: false, filePath: options.logPath });

  if (options.keysOnly) {
    const pairs = log.sourcesAndKeys();
    if (options.json) {
      return JSON.stringify(pairs.map(([source, key]) => ({ source, key })), null, 2);
    }
    return pairs.map(([source, key]) => `${source}\t${key}`).join("\n");
  }

  const entries = log.select({
    source: options.source,
    key: options.key,
    limit: options.limit,
    descending: !options.ascending,
  });

  if (options.json) {
    return JSON.stringify(
      entries.map((entry) => ({ ...entry, time: entry.time.toISOString() })),
      null,
      2
    );
  }
  return entries.map((entry) => prettyEventEntry(entry, options.counts)).join(ENTRY_SEPARATOR);
}

async function main(): Promise<void> {
  const { values: args } = parseArgs({
    options: {
      log: { type: "string" },
      source: { type: "string" },
      key: { type: "string" },
      limit: { type: "string" },
      ascending: { type: "boolean", default: false },
      keys: { type: "boolean", default: false },
      counts: { type: "boolean", default: false },
      json: { type: "boolean", default: false },
      "no-color": { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  if (args.help) {
    console.log(HELP);
    process.exit(0);
  }
  if (args["no-color"]) {
    disableColors();
  }
  if (!args.log) {
    console.error(c("red", "Error: --log is required"));
    console.error("  Usage: npm run show-log -- --log <path>");
    process.exit(1);
  }

  const text = showLog({
    logPath: args.log,
    source: args.source,
    key: args.key,
    limit: args.limit !== undefined ? parsePositiveInt("limit", args.limit) : undefined,
    ascending: args.ascending,
    keysOnly: args.keys,
    counts: args.counts,
    json: args.json,
  });

  console.log(text.length > 0 ? text : c("dim", "No matching entries."));
}

if (isDirectExecution("show-log")) {
  main().catch((err: unknown) => {
    console.error(c("red", `Error: ${formatError(err)}`));
    process.exit(1);
  });
}
