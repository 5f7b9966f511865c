/**
 * YAML corpus encoding.
 *
 * A corpus is a sequence of mappings, one block per record:
 *
 *   -
 *     'Review': 'Arrived broken, would not buy again.'
 *     'Notes': |2-
 *       first line
 *       second line
 *
 * Keys and single-line values are single-quoted (inner quotes doubled).
 * Multi-line values use a block literal with an explicit indentation
 * indicator and strip chomping, so leading spaces survive and no trailing
 * newline is added.
 */

import { parse as parseYaml } from "yaml";
import { z } from "zod";

import { Corpus } from "./corpus.js";
import { CorpusRecord } from "./record.js";
import { CorpusFormatError, type CorpusFormatIssue } from "./errors.js";

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

/**
 * Scalar cell value. Numbers and booleans are read back as their text;
 * an empty value (`key:`) reads as "".
 */
const CellSchema = z
  .union([z.string(), z.number(), z.boolean(), z.null()])
  .transform((value) => (value === null ? "" : String(value)));

/** Unquoted keys such as `2024:` read back as text as well. */
const KeySchema = z.union([z.string(), z.number(), z.boolean()]).transform((key) => String(key));

/**
 * Rows are read as Maps so fields keep document order; plain objects
 * would list integer-like keys ("2024") first.
 */
const RowSchema = z.map(KeySchema, CellSchema);

/** An empty document reads as an empty sequence. */
export const YamlCorpusSchema = z.preprocess((document) => document ?? [], z.array(RowSchema));

// ---------------------------------------------------------------------------
// Encoding
// ---------------------------------------------------------------------------

function singleQuote(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

function formatField(field: string, value: string): string {
  if (!value.includes("\n")) {
    return `  ${singleQuote(field)}: ${singleQuote(value)}`;
  }
  return `  ${singleQuote(field)}: |2-\n    ` + value.split("\n").join("\n    ");
}

export function formatYaml(corpus: Corpus): string {
  return corpus.records
    .map((record) => {
      const body = corpus.fields.map((field) => formatField(field, record.get(field) ?? "")).join("\n");
      return `-\n${body}\n`;
    })
    .join("");
}

// ---------------------------------------------------------------------------
// Decoding
// ---------------------------------------------------------------------------

/**
 * Decode YAML text into a corpus. Fields come from the first row; every
 * other row must have exactly the same fields.
 *
 * @throws CorpusFormatError if the document is not a sequence of flat
 *         mappings or rows disagree on their fields
 */
export function parseYamlCorpus(text: string, filePath: string | null = null): Corpus {
  let document: unknown;
  try {
    document = parseYaml(text, { mapAsMap: true });
  } catch (err) {
    throw new CorpusFormatError(
      filePath,
      `Invalid YAML corpus${filePath ? ` ${filePath}` : ""}: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  const result = YamlCorpusSchema.safeParse(document);
  if (!result.success) {
    const issues: CorpusFormatIssue[] = result.error.issues.map((issue) => {
      const row = issue.path[0];
      return {
        location: typeof row === "number" ? row : null,
        message: `${issue.path.join(".") || "(root)"}: ${issue.message}`,
      };
    });
    throw new CorpusFormatError(
      filePath,
      `Invalid YAML corpus${filePath ? ` ${filePath}` : ""}: expected a sequence of field mappings`,
      issues
    );
  }

  const rows = result.data;
  const first = rows[0];
  const fields = first ? [...first.keys()] : [];
  const issues: CorpusFormatIssue[] = [];

  rows.forEach((row, index) => {
    const keys = [...row.keys()];
    const missing = fields.filter((f) => !keys.includes(f));
    const extra = keys.filter((k) => !fields.includes(k));
    if (missing.length > 0) {
      issues.push({ location: index, message: `missing field(s): ${missing.join(", ")}` });
    }
    if (extra.length > 0) {
      issues.push({ location: index, message: `unexpected field(s): ${extra.join(", ")}` });
    }
  });

  if (issues.length > 0) {
    throw new CorpusFormatError(
      filePath,
      `Invalid YAML corpus${filePath ? ` ${filePath}` : ""}: rows disagree on fields`,
      issues
    );
  }

  return new Corpus(
    fields,
    rows.map((row) => new CorpusRecord(fields.map((field): [string, string] => [field, row.get(field) ?? ""])))
  );
}
