#!/usr/bin/env node
/**
 * Run a mapping over a corpus file.
 *
 * Loads the mapping directory, sends one completion per input record and
 * writes the mapped corpus. Every completion is recorded in the event log,
 * which `show-log` can query afterwards.
 *
 * USAGE:
 *
 *   npm run run-mapping -- --mapping mappings/product-category \
 *     --input data/sample-products.tsv --output output/products.yaml
 *
 * Options:
 *   --mapping <dir>       Mapping directory (required)
 *   --input <file>        Input corpus, .tsv or .yaml (required)
 *   --output <file>       Output corpus, .tsv or .yaml (required)
 *   --model <id>          Model (default: COMPLETION_MODEL)
 *   --max-tokens <n>      Max tokens per completion (default: COMPLETION_MAX_TOKENS)
 *   --temperature <t>     Sampling temperature, 0 to 1 (default: COMPLETION_TEMPERATURE)
 *   --default <value>     Fill output fields with this value when a completion
 *                         cannot be parsed, instead of stopping the run
 *   --no-inputs           Leave input fields out of the output
 *   --no-debug-fields     Leave success, error and raw completion fields out
 *   --concurrency <n>     Completions in flight (default: 1)
 *   --event-log <path>    Event log file (default: EVENT_LOG_PATH or <LOG_DIR>/events.log)
 *   --debug               Echo every event to the console
 *   --no-color            Disable ANSI colors
 *   -h, --help            Show help
 *
 * Debug fields: "Completion Success" is "true" or "false"; "Error Message"
 * is empty when the completion parsed; "Completion" is the raw text.
 *
 * Requires ANTHROPIC_API_KEY in the environment or .env.
 *
 * Exit codes:
 *   0 - All records mapped
 *   1 - Error (bad arguments, files, or an unrecovered completion failure)
 */

import { basename, join, resolve } from "node:path";
import { parseArgs } from "node:util";

import { configuredLogLevel, loadConfig, validateConfig } from "../config/index.js";
import { AnthropicCompletionClient, type CompletionClient } from "../completions/index.js";
import { loadCorpus, saveCorpus } from "../corpora/index.js";
import { createLogger, EventLog, generateRunId, initRunId, type Logger } from "../logging/index.js";
import { defaultOnParseFailure, MappingEngine, STRICT } from "../mappings/index.js";
import { c, disableColors, formatError, isDirectExecution, parseNumber, parsePositiveInt } from "./common.js";

// ============================================================
// Types
// ============================================================

export interface RunMappingOptions {
  mappingDir: string;
  inputPath: string;
  outputPath: string;
  /** Absorb parse failures with this value; strict when undefined */
  defaultValue?: string;
  includeInputs: boolean;
  includeDebugFields: boolean;
  concurrency: number;
}

export interface RunMappingDeps {
  client: CompletionClient;
  eventLog: EventLog;
  logger: Logger;
  /** Progress callback, one call per finished record */
  onProgress?: (done: number, total: number, success: boolean) => void;
}

export interface RunMappingSummary {
  records: number;
  failures: number;
  fields: string[];
  outputPath: string;
}

// ============================================================
// CLI Parsing
// ============================================================

export const HELP = `
Usage: run-mapping --mapping <dir> --input <file> --output <file> [options]

Options:
  --mapping <dir>       Mapping directory (required)
  --input <file>        Input corpus, .tsv or .yaml (required)
  --output <file>       Output corpus, .tsv or .yaml (required)
  --model <id>          Model (default: COMPLETION_MODEL)
  --max-tokens <n>      Max tokens per completion (default: COMPLETION_MAX_TOKENS)
  --temperature <t>     Sampling temperature, 0 to 1 (default: COMPLETION_TEMPERATURE)
  --default <value>     Value for output fields when a completion cannot be parsed
  --no-inputs           Leave input fields out of the output
  --no-debug-fields     Leave success, error and raw completion fields out
  --concurrency <n>     Completions in flight (default: 1)
  --event-log <path>    Event log file (default: EVENT_LOG_PATH or <LOG_DIR>/events.log)
  --debug               Echo every event to the console
  --no-color            Disable ANSI colors
  -h, --help            Show this help message

Debug fields in the output:
  Completion Success    "true" or "false"
  Error Message         Parse error, or empty when the completion parsed
  Completion            Raw completion text
`;

function parseCliArgs(argv: string[]) {
  const { values } = parseArgs({
    args: argv,
    options: {
      mapping: { type: "string" },
      input: { type: "string" },
      output: { type: "string" },
      model: { type: "string" },
      "max-tokens": { type: "string" },
      temperature: { type: "string" },
      default: { type: "string" },
      "no-inputs": { type: "boolean", default: false },
      "no-debug-fields": { type: "boolean", default: false },
      concurrency: { type: "string" },
      "event-log": { type: "string" },
      debug: { type: "boolean", default: false },
      "no-color": { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });
  return values;
}

// ============================================================
// Run
// ============================================================

/**
 * Map the input corpus and save the result.
 */
export async function runMapping(
  options: RunMappingOptions,
  deps: RunMappingDeps
): Promise<RunMappingSummary> {
  const { client, eventLog, logger, onProgress } = deps;

  const engine = MappingEngine.fromDirectory(client, options.mappingDir, { eventLog, logger });
  const input = loadCorpus(options.inputPath);

  logger.info("Starting mapping run", {
    mapping: engine.definition.sourceDirPath,
    input: options.inputPath,
    records: input.size,
    model: client.model,
  });

  let done = 0;
  let failures = 0;
  const output = await engine.mapCorpus(input, {
    policy: options.defaultValue === undefined ? STRICT : defaultOnParseFailure(options.defaultValue),
    includeInputs: options.includeInputs,
    includeDebugFields: options.includeDebugFields,
    concurrency: options.concurrency,
    onOutcome: (outcome) => {
      done++;
      if (!outcome.success) failures++;
      onProgress?.(done, input.size, outcome.success);
    },
  });

  const outputPath = saveCorpus(output, options.outputPath);
  logger.info("Mapping run complete", { records: output.size, failures, output: outputPath });

  return { records: output.size, failures, fields: [...output.fields], outputPath };
}

// ============================================================
// Main
// ============================================================

async function main(): Promise<void> {
  const args = parseCliArgs(process.argv.slice(2));

  if (args.help) {
    console.log(HELP);
    process.exit(0);
  }
  if (args["no-color"]) {
    disableColors();
  }

  const { mapping, input, output } = args;
  if (!mapping || !input || !output) {
    console.error(c("red", "Error: --mapping, --input and --output are required"));
    console.error("  Usage: npm run run-mapping -- --mapping <dir> --input <file> --output <file>");
    process.exit(1);
  }

  const config = loadConfig();
  validateConfig(config);

  const runId = initRunId(generateRunId({ mapping: basename(resolve(mapping)) }));
  const logger = createLogger({ level: configuredLogLevel(config), logDir: config.logDir });
  const eventLog = new EventLog(
    {
      debug: args.debug || config.debug,
      filePath: args["event-log"] ?? config.eventLogPath ?? join(config.logDir, "events.log"),
    },
    logger
  );

  const temperature =
    args.temperature !== undefined ? parseNumber("temperature", args.temperature) : config.completionTemperature;
  const client = new AnthropicCompletionClient({
    model: args.model ?? config.completionModel,
    maxTokens:
      args["max-tokens"] !== undefined
        ? parsePositiveInt("max-tokens", args["max-tokens"])
        : config.completionMaxTokens,
    ...(temperature !== null ? { temperature } : {}),
  });

  console.log(c("bold", `Run ${runId}`));
  console.log(`  ${c("cyan", "Mapping:")} ${mapping}`);
  console.log(`  ${c("cyan", "Model:")}   ${client.model}`);
  console.log(`  ${c("cyan", "Events:")}  ${eventLog.config.filePath ?? "(none)"}`);
  console.log("");

  const summary = await runMapping(
    {
      mappingDir: mapping,
      inputPath: input,
      outputPath: output,
      defaultValue: args.default,
      includeInputs: !args["no-inputs"],
      includeDebugFields: !args["no-debug-fields"],
      concurrency: args.concurrency !== undefined ? parsePositiveInt("concurrency", args.concurrency) : 1,
    },
    {
      client,
      eventLog,
      logger,
      onProgress: (done, total, success) => {
        const mark = success ? c("green", "✓") : c("yellow", "!");
        console.log(`  ${mark} ${done}/${total}`);
      },
    }
  );

  console.log("");
  console.log(c("green", `Mapped ${summary.records} record(s) → ${summary.outputPath}`));
  if (summary.failures > 0) {
    console.log(c("yellow", `  ${summary.failures} completion(s) could not be parsed; default value used`));
  }
}

if (isDirectExecution("run-mapping")) {
  main().catch((err: unknown) => {
    console.error(c("red", `Error: ${formatError(err)}`));
    process.exit(1);
  });
}
