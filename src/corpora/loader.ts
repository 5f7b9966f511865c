/**
 * Corpus file loading and saving.
 *
 * The encoding is chosen purely by file extension:
 *
 *   .tsv   — tab-separated, header row (see tsv.ts)
 *   .yaml  — sequence of mappings (see yaml.ts)
 *
 * USAGE:
 *
 *   const corpus = loadCorpus("data/reviews.tsv");
 *   saveCorpus(mapped, "output/reviews-mapped.yaml");
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname, extname, resolve } from "node:path";

import type { Corpus } from "./corpus.js";
import { CorpusFormatError } from "./errors.js";
import { formatTsv, parseTsv } from "./tsv.js";
import { formatYaml, parseYamlCorpus } from "./yaml.js";

export type CorpusEncoding = "tsv" | "yaml";

/** File extensions recognized as corpus files. */
const CORPUS_EXTENSIONS: ReadonlyMap<string, CorpusEncoding> = new Map([
  [".tsv", "tsv"],
  [".yaml", "yaml"],
]);

/**
 * Encoding implied by a file path's extension.
 *
 * @throws CorpusFormatError for any other extension
 */
export function corpusEncodingFor(filePath: string): CorpusEncoding {
  const ext = extname(filePath).toLowerCase();
  const encoding = CORPUS_EXTENSIONS.get(ext);
  if (encoding === undefined) {
    throw new CorpusFormatError(
      filePath,
      `File path must end in either .tsv or .yaml file extension (got "${ext || filePath}").`
    );
  }
  return encoding;
}

/**
 * Load a corpus from a .tsv or .yaml file.
 *
 * @throws CorpusFormatError if the extension is unsupported, the file is
 *         missing or its content is malformed
 */
export function loadCorpus(filePath: string): Corpus {
  const encoding = corpusEncodingFor(filePath);
  const fullPath = resolve(filePath);

  if (!existsSync(fullPath)) {
    throw new CorpusFormatError(fullPath, `Corpus file not found: ${fullPath}`);
  }

  const text = readFileSync(fullPath, "utf-8");
  return encoding === "tsv" ? parseTsv(text, fullPath) : parseYamlCorpus(text, fullPath);
}

/**
 * Save a corpus to a .tsv or .yaml file, creating parent directories.
 *
 * @returns The resolved path written
 */
export function saveCorpus(corpus: Corpus, filePath: string): string {
  const encoding = corpusEncodingFor(filePath);
  const fullPath = resolve(filePath);

  const dir = dirname(fullPath);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }

  writeFileSync(fullPath, encoding === "tsv" ? formatTsv(corpus) : formatYaml(corpus), "utf-8");
  return fullPath;
}
