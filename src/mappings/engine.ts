/**
 * Mapping engine.
 *
 * Turns records into records through one completion each:
 *
 *   record → input template fill → prompt prefix + user turn
 *          → completion → output template parse → outcome
 *
 * The prompt prefix is built once per engine from the definition: the
 * guidelines as a system turn, then one user/assistant pair per example.
 *
 * USAGE:
 *
 *   const engine = MappingEngine.fromDirectory(client, "mappings/product-category");
 *   const outcome = await engine.map({ "Product Name": "Steel kettle" });
 *
 *   const mapped = await engine.mapCorpus(loadCorpus("data/sample-products.tsv"), {
 *     policy: defaultOnParseFailure("unknown"),
 *     includeDebugFields: true,
 *   });
 */

import { basename } from "node:path";
import { performance } from "node:perf_hooks";

import { ChatPrompt, ChatRole } from "../completions/prompt.js";
import type { CompletionClient } from "../completions/client.js";
import { Corpus } from "../corpora/corpus.js";
import { CorpusRecord } from "../corpora/record.js";
import { SchemaConflictError } from "../corpora/errors.js";
import { EventLog } from "../logging/event-log.js";
import { createLogger, type Logger } from "../logging/logger.js";
import { TemplateParseError } from "../templates/template.js";
import type { MappingDefinition } from "./definition.js";
import { loadMappingDefinition } from "./loader.js";
import { STRICT, type MappingOutcome, type ParseFailurePolicy } from "./policy.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const EVENT_SOURCE = "MappingEngine";
export const COMPLETION_EVENT_KEY = "Completion";
export const ERROR_EVENT_KEY = "Error";

const GUIDELINES_PREVIEW_LENGTH = 64;

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface MappingEngineOptions {
  /** Receives one event per completion and per parse failure */
  eventLog?: EventLog;
  logger?: Logger;
}

export interface MapBatchOptions {
  policy?: ParseFailurePolicy;
  /** Maximum completions in flight (default 1) */
  concurrency?: number;
  /** Called as each record finishes, in completion order */
  onOutcome?: (outcome: MappingOutcome, index: number) => void;
}

export interface MapCorpusOptions extends MapBatchOptions {
  /** Join the input fields onto the output (default true) */
  includeInputs?: boolean;
  /** Add success, error message and raw completion fields (default false) */
  includeDebugFields?: boolean;
  successField?: string;
  errorMessageField?: string;
  rawCompletionField?: string;
}

// ---------------------------------------------------------------------------
// Prompts
// ---------------------------------------------------------------------------

/**
 * System turn with the guidelines, then a user/assistant pair per example.
 */
export function buildPromptPrefix(definition: MappingDefinition): ChatPrompt {
  let prompt = new ChatPrompt([{ role: ChatRole.System, content: definition.guidelines }]);
  for (const example of definition.examples) {
    prompt = prompt
      .append(ChatRole.User, definition.inputTemplate.fill(example.inputs))
      .append(ChatRole.Assistant, definition.outputTemplate.fill(example.outputs));
  }
  return prompt;
}

/**
 * The prompt prefix followed by the unfilled input template.
 */
export function buildPromptTemplate(definition: MappingDefinition): ChatPrompt {
  return buildPromptPrefix(definition).append(ChatRole.User, definition.inputTemplate.raw);
}

// ---------------------------------------------------------------------------
// Ordered pool
// ---------------------------------------------------------------------------

/**
 * Run `fn` over `items` with at most `concurrency` calls pending. Results
 * keep input order. After the first failure no new item is started; the
 * first failure is rethrown once running calls settle.
 */
async function mapInOrder<T, R>(
  items: readonly T[],
  concurrency: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError(`Concurrency must be a positive integer, got ${concurrency}`);
  }

  const results: R[] = [];
  const failures: unknown[] = [];
  const queue = items.entries();

  async function worker(): Promise<void> {
    for (const [index, item] of queue) {
      try {
        results[index] = await fn(item, index);
      } catch (err) {
        failures.push(err);
        return;
      }
      if (failures.length > 0) return;
    }
  }

  const workerCount = Math.min(concurrency, items.length);
  await Promise.all(Array.from({ length: workerCount }, () => worker()));

  if (failures.length > 0) {
    throw failures[0];
  }
  return results;
}

// ---------------------------------------------------------------------------
// Engine
// ---------------------------------------------------------------------------

export class MappingEngine {
  public readonly promptPrefix: ChatPrompt;
  private readonly eventLog: EventLog;
  private readonly logger: Logger;

  /**
   * @throws MissingKeyError if an example lacks a template key
   */
  constructor(
    public readonly definition: MappingDefinition,
    public readonly client: CompletionClient,
    options: MappingEngineOptions = {}
  ) {
    this.promptPrefix = buildPromptPrefix(definition);
    this.eventLog = options.eventLog ?? new EventLog({ debug: false, filePath: null });
    this.logger = (options.logger ?? createLogger({ file: false })).child({
      mapping: definition.sourceDirPath !== null ? basename(definition.sourceDirPath) : undefined,
      model: client.model,
    });
  }

  /**
   * Load a definition from a directory and build an engine around it.
   */
  static fromDirectory(
    client: CompletionClient,
    dirPath: string,
    options: MappingEngineOptions = {}
  ): MappingEngine {
    return new MappingEngine(loadMappingDefinition(dirPath), client, options);
  }

  /** Prompt prefix plus the raw input template, for inspection. */
  get promptTemplate(): ChatPrompt {
    return buildPromptTemplate(this.definition);
  }

  private get guidelinesPreview(): string {
    return `${this.definition.guidelines.slice(0, GUIDELINES_PREVIEW_LENGTH)}...`;
  }

  /**
   * Map one record.
   *
   * @throws MissingKeyError if the record lacks an input template key
   * @throws TemplateParseError under the strict policy when the completion
   *         does not match the output template
   * Completion client errors propagate unchanged.
   */
  async map(
    record: Readonly<Record<string, string>> | CorpusRecord,
    policy: ParseFailurePolicy = STRICT
  ): Promise<MappingOutcome> {
    return this.mapRecord(record, policy, this.logger);
  }

  private async mapRecord(
    record: Readonly<Record<string, string>> | CorpusRecord,
    policy: ParseFailurePolicy,
    logger: Logger
  ): Promise<MappingOutcome> {
    const values = record instanceof CorpusRecord ? record.toObject() : record;
    const inputMessage = this.definition.inputTemplate.fill(values);
    const prompt = this.promptPrefix.append(ChatRole.User, inputMessage);

    logger.debug("Requesting completion", {
      promptCharacters: prompt.characterLength,
    });

    const startedAt = performance.now();
    const completion = await this.client.complete(prompt);
    const elapsedSeconds = (performance.now() - startedAt) / 1000;

    this.eventLog.record(EVENT_SOURCE, COMPLETION_EVENT_KEY, {
      "Model": this.client.model,
      "Prompt Character Count": prompt.characterLength,
      "Definition Directory": this.definition.sourceDirPath,
      "Guidelines": this.guidelinesPreview,
      "Input Message": inputMessage,
      "Completion": completion,
      "Completion Time (seconds)": elapsedSeconds,
    });

    try {
      return {
        raw: completion,
        parsed: this.definition.outputTemplate.parse(completion),
        success: true,
        errorMessage: null,
      };
    } catch (err) {
      if (!(err instanceof TemplateParseError)) throw err;

      const defaultValue = policy.kind === "default" ? policy.value : null;
      this.eventLog.record(EVENT_SOURCE, ERROR_EVENT_KEY, {
        "Model": this.client.model,
        "Definition Directory": this.definition.sourceDirPath,
        "Guidelines": this.guidelinesPreview,
        "Input Message": inputMessage,
        "Completion": completion,
        "Error Type": "Parse",
        "Error Default Value": defaultValue,
        "Error Message": err.message,
      });

      if (policy.kind === "strict") throw err;

      logger.warn("Completion did not match output template; using default", {
        default: policy.value,
        error: err.message,
      });

      const parsed: Record<string, string> = {};
      for (const key of this.definition.outputTemplate.keys) {
        parsed[key] = policy.value;
      }
      return { raw: completion, parsed, success: false, errorMessage: err.message };
    }
  }

  /**
   * Map records independently, returning outcomes in input order. The
   * first unrecovered failure aborts the batch.
   */
  async mapBatch(
    records: readonly (Readonly<Record<string, string>> | CorpusRecord)[],
    options: MapBatchOptions = {}
  ): Promise<MappingOutcome[]> {
    const { policy = STRICT, concurrency = 1, onOutcome } = options;
    return mapInOrder(records, concurrency, async (record, index) => {
      const outcome = await this.mapRecord(record, policy, this.logger.child({ record: index }));
      onOutcome?.(outcome, index);
      return outcome;
    });
  }

  /**
   * Map every record of a corpus into a new corpus of output fields,
   * optionally joined onto the input fields.
   *
   * @throws SchemaConflictError if a debug field name collides with a
   *         template key or another debug field, or if joined input fields
   *         collide with output fields; checked before any completion
   */
  async mapCorpus(corpus: Corpus, options: MapCorpusOptions = {}): Promise<Corpus> {
    const {
      policy = STRICT,
      concurrency = 1,
      onOutcome,
      includeInputs = true,
      includeDebugFields = false,
      successField = "Completion Success",
      errorMessageField = "Error Message",
      rawCompletionField = "Completion",
    } = options;

    const outputKeys = this.definition.outputTemplate.keys;
    const debugFields = [successField, errorMessageField, rawCompletionField];

    if (includeDebugFields) {
      const templateKeys = new Set([...this.definition.inputTemplate.keys, ...outputKeys]);
      const conflicts = debugFields.filter(
        (field, index) => templateKeys.has(field) || debugFields.indexOf(field) !== index
      );
      if (conflicts.length > 0) {
        throw new SchemaConflictError(
          [...new Set(conflicts)],
          `Debug field names collide with template keys or each other: ${[...new Set(conflicts)].join(", ")}`
        );
      }
    }

    const fields = includeDebugFields ? [...outputKeys, ...debugFields] : [...outputKeys];
    if (includeInputs) {
      const shared = corpus.fields.filter((field) => fields.includes(field));
      if (shared.length > 0) {
        throw new SchemaConflictError(
          shared,
          `Input fields collide with output fields: ${shared.join(", ")}`
        );
      }
    }

    this.logger.info("Mapping corpus", { records: corpus.size, concurrency });

    const outcomes = await this.mapBatch(corpus.records, { policy, concurrency, onOutcome });

    const outputRecords = outcomes.map((outcome) => {
      const entries: [string, string][] = outputKeys.map((key) => [key, outcome.parsed[key] ?? ""]);
      if (includeDebugFields) {
        entries.push(
          [successField, String(outcome.success)],
          [errorMessageField, outcome.errorMessage ?? ""],
          [rawCompletionField, outcome.raw]
        );
      }
      return new CorpusRecord(entries);
    });

    const failures = outcomes.filter((outcome) => !outcome.success).length;
    this.logger.info("Mapped corpus", { records: outcomes.length, failures });

    const output = new Corpus(fields, outputRecords);
    return includeInputs ? corpus.join(output) : output;
  }
}
