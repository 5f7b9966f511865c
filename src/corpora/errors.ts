/**
 * Corpus errors.
 */

/**
 * Two schemas that must be disjoint share one or more field names.
 */
export class SchemaConflictError extends Error {
  constructor(
    public readonly conflictingFields: string[],
    message?: string
  ) {
    super(message ?? `Fields occur on both sides: ${conflictingFields.join(", ")}`);
    this.name = "SchemaConflictError";
  }
}

/**
 * Row-wise join of corpora with different record counts.
 */
export class RowCountError extends Error {
  constructor(
    public readonly leftCount: number,
    public readonly rightCount: number
  ) {
    super(`Joined corpora must contain the same number of rows (got ${leftCount} and ${rightCount}).`);
    this.name = "RowCountError";
  }
}

/**
 * A record whose fields do not match its corpus, or a corpus with
 * duplicate field names.
 */
export class RecordSchemaError extends Error {
  constructor(
    public readonly recordIndex: number | null,
    message: string
  ) {
    super(message);
    this.name = "RecordSchemaError";
  }
}

/**
 * Individual problem found while decoding a corpus file.
 */
export interface CorpusFormatIssue {
  /** 1-based line (TSV) or 0-based row index (YAML); null for the file */
  location: number | null;
  message: string;
}

/**
 * A corpus file that cannot be read or written in the requested encoding.
 */
export class CorpusFormatError extends Error {
  constructor(
    public readonly filePath: string | null,
    message: string,
    public readonly issues: CorpusFormatIssue[] = []
  ) {
    super(message);
    this.name = "CorpusFormatError";
  }

  /**
   * Format errors for display.
   */
  format(): string {
    const lines = [this.message];
    for (const issue of this.issues) {
      const location = issue.location === null ? "[file]" : `[${issue.location}]`;
      lines.push(`  - ${location} ${issue.message}`);
    }
    return lines.join("\n");
  }
}
