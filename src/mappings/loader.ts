/**
 * Mapping definition loader.
 *
 * A mapping lives in its own directory:
 *
 *   mappings/product-category/
 *     guidelines.txt         — instructions (system turn)
 *     input_template.txt     — how a record is presented to the model
 *     output_template.txt    — the shape the model answers in
 *     examples.yaml          — worked examples (or examples.tsv)
 *
 * When both example files exist, examples.yaml wins. Each example row
 * carries the fields of both templates and is split into inputs and
 * outputs by template key.
 *
 * USAGE:
 *
 *   const definition = loadMappingDefinition("mappings/product-category");
 *
 *   // Several mappings under one directory, loaded once and cached
 *   const loader = new MappingDefinitionLoader("mappings/");
 *   const definition = loader.load("product-category");
 *   const names = MappingDefinitionLoader.listMappings("mappings/");
 */

import { existsSync, readFileSync, readdirSync, statSync } from "node:fs";
import { join, resolve } from "node:path";

import { Template } from "../templates/template.js";
import { loadCorpus } from "../corpora/loader.js";
import {
  createMappingDefinition,
  type MappingDefinition,
  type MappingExample,
} from "./definition.js";

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export class MappingLoadError extends Error {
  constructor(
    public readonly filePath: string,
    message?: string
  ) {
    super(message ?? `Failed to load mapping file: ${filePath}`);
    this.name = "MappingLoadError";
  }
}

export class ExamplesNotFoundError extends Error {
  constructor(public readonly dirPath: string) {
    super(
      `Mapping requires ${EXAMPLE_FILES.join(" or ")} in given directory '${dirPath}'`
    );
    this.name = "ExamplesNotFoundError";
  }
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const GUIDELINES_FILE = "guidelines.txt";
export const INPUT_TEMPLATE_FILE = "input_template.txt";
export const OUTPUT_TEMPLATE_FILE = "output_template.txt";
/** Example files in order of preference. */
export const EXAMPLE_FILES = ["examples.yaml", "examples.tsv"] as const;

// ---------------------------------------------------------------------------
// Loading
// ---------------------------------------------------------------------------

function readMappingFile(dirPath: string, filename: string): string {
  const filePath = join(dirPath, filename);
  if (!existsSync(filePath)) {
    throw new MappingLoadError(filePath, `Mapping file not found: ${filePath}`);
  }
  return readFileSync(filePath, "utf-8");
}

function loadExamples(
  filePath: string,
  inputKeys: readonly string[],
  outputKeys: readonly string[]
): MappingExample[] {
  const pick = (values: Map<string, string>, keys: readonly string[]): Record<string, string> => {
    const picked: Record<string, string> = {};
    for (const key of keys) {
      const value = values.get(key);
      if (value !== undefined) picked[key] = value;
    }
    return picked;
  };

  return loadCorpus(filePath).records.map((record) => {
    const values = new Map(record);
    return { inputs: pick(values, inputKeys), outputs: pick(values, outputKeys) };
  });
}

/**
 * Load a mapping definition from a directory.
 *
 * @throws MappingLoadError        if the guidelines or a template file is missing
 * @throws TemplateFormatError     if a template file is malformed
 * @throws ExamplesNotFoundError   if neither examples file exists
 * @throws CorpusFormatError       if the examples file is malformed
 * @throws MappingDefinitionError  if templates share more than one key or
 *                                 an example lacks a template key
 */
export function loadMappingDefinition(dirPath: string): MappingDefinition {
  const dir = resolve(dirPath);
  if (!existsSync(dir) || !statSync(dir).isDirectory()) {
    throw new MappingLoadError(dir, `Mapping directory does not exist: ${dir}`);
  }

  const guidelines = readMappingFile(dir, GUIDELINES_FILE).trim();
  const inputTemplate = Template.load(readMappingFile(dir, INPUT_TEMPLATE_FILE));
  const outputTemplate = Template.load(readMappingFile(dir, OUTPUT_TEMPLATE_FILE));

  const examplesFile = EXAMPLE_FILES.map((name) => join(dir, name)).find((path) => existsSync(path));
  if (examplesFile === undefined) {
    throw new ExamplesNotFoundError(dir);
  }

  return createMappingDefinition({
    guidelines,
    inputTemplate,
    outputTemplate,
    examples: loadExamples(examplesFile, inputTemplate.keys, outputTemplate.keys),
    sourceDirPath: dir,
  });
}

// ---------------------------------------------------------------------------
// Loader
// ---------------------------------------------------------------------------

export class MappingDefinitionLoader {
  private readonly baseDir: string;
  private readonly cache = new Map<string, MappingDefinition>();

  /**
   * @param baseDir - Directory whose subdirectories are mappings
   */
  constructor(baseDir: string) {
    this.baseDir = resolve(baseDir);

    if (!existsSync(this.baseDir)) {
      throw new MappingLoadError(
        this.baseDir,
        `Mappings directory does not exist: ${this.baseDir}`
      );
    }
  }

  /**
   * Load a mapping by subdirectory name. Results are cached.
   */
  load(name: string): MappingDefinition {
    const cached = this.cache.get(name);
    if (cached) return cached;

    const definition = loadMappingDefinition(join(this.baseDir, name));
    this.cache.set(name, definition);
    return definition;
  }

  /**
   * Load every mapping under the base directory.
   */
  loadAll(): Map<string, MappingDefinition> {
    const result = new Map<string, MappingDefinition>();
    for (const name of MappingDefinitionLoader.listMappings(this.baseDir)) {
      result.set(name, this.load(name));
    }
    return result;
  }

  /**
   * Subdirectories of `dir` that contain a guidelines file, sorted.
   */
  static listMappings(dir: string): string[] {
    const resolved = resolve(dir);
    if (!existsSync(resolved)) return [];

    return readdirSync(resolved)
      .filter((entry) => {
        const full = join(resolved, entry);
        return statSync(full).isDirectory() && existsSync(join(full, GUIDELINES_FILE));
      })
      .sort();
  }
}
