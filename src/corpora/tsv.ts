/**
 * Tab-separated corpus encoding.
 *
 * First line holds the field names; each following line is one record.
 * A cell containing a tab, double quote, CR or LF is wrapped in double
 * quotes with inner quotes doubled; every other cell is written as is.
 */

import { Corpus } from "./corpus.js";
import { CorpusRecord } from "./record.js";
import { CorpusFormatError, type CorpusFormatIssue } from "./errors.js";

const DELIMITER = "\t";
const QUOTE = '"';
const NEEDS_QUOTING_RE = /[\t"\r\n]/;

// ---------------------------------------------------------------------------
// Encoding
// ---------------------------------------------------------------------------

function formatCell(value: string): string {
  if (!NEEDS_QUOTING_RE.test(value)) return value;
  return QUOTE + value.replace(/"/g, '""') + QUOTE;
}

export function formatTsv(corpus: Corpus): string {
  const lines = [corpus.fields.map(formatCell).join(DELIMITER)];
  for (const record of corpus) {
    const line = corpus.fields.map((field) => formatCell(record.get(field) ?? "")).join(DELIMITER);
    // A blank line would read back as no row at all
    lines.push(line === "" ? QUOTE + QUOTE : line);
  }
  return lines.join("\n") + "\n";
}

// ---------------------------------------------------------------------------
// Decoding
// ---------------------------------------------------------------------------

interface TsvRow {
  /** 1-based line the row starts on */
  line: number;
  cells: string[];
}

/**
 * Split TSV text into rows of cells, honoring quoted cells that span
 * tabs and line breaks. Blank lines are skipped.
 */
export function splitTsvRows(text: string, filePath: string | null = null): TsvRow[] {
  const rows: TsvRow[] = [];
  let cells: string[] = [];
  let cell = "";
  let quoted = false;
  let rowStarted = false;
  let line = 1;
  let rowLine = 1;

  const endRow = (): void => {
    if (rowStarted) {
      cells.push(cell);
      rows.push({ line: rowLine, cells });
    }
    cells = [];
    cell = "";
    rowStarted = false;
  };

  for (let i = 0; i < text.length; i++) {
    const ch = text.charAt(i);

    if (quoted) {
      if (ch === QUOTE) {
        if (text.charAt(i + 1) === QUOTE) {
          cell += QUOTE;
          i++;
        } else {
          quoted = false;
        }
      } else {
        if (ch === "\n") line++;
        cell += ch;
      }
      continue;
    }

    if (ch === "\r" && text.charAt(i + 1) === "\n") continue;

    if (ch === "\n") {
      endRow();
      line++;
      rowLine = line;
      continue;
    }

    if (!rowStarted) {
      rowStarted = true;
      rowLine = line;
    }

    if (ch === DELIMITER) {
      cells.push(cell);
      cell = "";
    } else if (ch === QUOTE && cell.length === 0) {
      quoted = true;
    } else {
      cell += ch;
    }
  }

  if (quoted) {
    throw new CorpusFormatError(filePath, `Unterminated quoted cell starting on line ${rowLine}`, [
      { location: rowLine, message: "unterminated quoted cell" },
    ]);
  }
  endRow();

  return rows;
}

/**
 * Decode TSV text into a corpus.
 *
 * @throws CorpusFormatError if a row's cell count differs from the header
 */
export function parseTsv(text: string, filePath: string | null = null): Corpus {
  const [header, ...body] = splitTsvRows(text, filePath);
  if (header === undefined) {
    return new Corpus([], []);
  }

  const fields = header.cells;
  const issues: CorpusFormatIssue[] = [];
  const records: CorpusRecord[] = [];

  for (const row of body) {
    if (row.cells.length !== fields.length) {
      issues.push({
        location: row.line,
        message: `expected ${fields.length} cell(s), found ${row.cells.length}`,
      });
      continue;
    }
    records.push(new CorpusRecord(fields.map((field, i): [string, string] => [field, row.cells[i] ?? ""])));
  }

  if (issues.length > 0) {
    throw new CorpusFormatError(
      filePath,
      `Invalid TSV corpus${filePath ? ` ${filePath}` : ""}: ${issues.length} malformed row(s)`,
      issues
    );
  }

  return new Corpus(fields, records);
}
