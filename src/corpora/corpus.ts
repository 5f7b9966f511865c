/**
 * Corpus of schematized text records.
 *
 * A corpus has an ordered list of distinct field names and an ordered list
 * of records, each holding exactly those fields. Corpora are immutable;
 * `join` builds a new corpus by pairing rows of two corpora whose fields
 * do not overlap.
 */

import { CorpusRecord } from "./record.js";
import { RecordSchemaError, RowCountError, SchemaConflictError } from "./errors.js";

export class Corpus implements Iterable<CorpusRecord> {
  public readonly fields: readonly string[];
  public readonly records: readonly CorpusRecord[];

  /**
   * @throws RecordSchemaError if fields repeat or a record's field set
   *         differs from `fields`
   */
  constructor(fields: Iterable<string>, records: Iterable<CorpusRecord>) {
    this.fields = Object.freeze([...fields]);
    this.records = Object.freeze([...records]);

    const fieldSet = new Set(this.fields);
    if (fieldSet.size !== this.fields.length) {
      const duplicates = this.fields.filter((f, i) => this.fields.indexOf(f) !== i);
      throw new RecordSchemaError(null, `Duplicate corpus field(s): ${duplicates.join(", ")}`);
    }

    this.records.forEach((record, index) => {
      const missing = this.fields.filter((f) => !record.has(f));
      const extra = record.fields.filter((f) => !fieldSet.has(f));
      if (missing.length > 0 || extra.length > 0) {
        const details: string[] = [];
        if (missing.length > 0) details.push(`missing ${missing.join(", ")}`);
        if (extra.length > 0) details.push(`unexpected ${extra.join(", ")}`);
        throw new RecordSchemaError(
          index,
          `Record ${index} does not match corpus fields: ${details.join("; ")}`
        );
      }
    });

    Object.freeze(this);
  }

  /**
   * Build a corpus from plain objects, taking fields from the first row
   * unless given.
   */
  static fromObjects(
    rows: readonly Readonly<Record<string, string>>[],
    fields?: readonly string[]
  ): Corpus {
    const first = rows[0];
    return new Corpus(
      fields ?? (first ? Object.keys(first) : []),
      rows.map((row) => new CorpusRecord(row))
    );
  }

  get size(): number {
    return this.records.length;
  }

  at(index: number): CorpusRecord | undefined {
    return this.records[index];
  }

  /**
   * Pair rows of this corpus with rows of another.
   *
   * @throws SchemaConflictError if the corpora share a field
   * @throws RowCountError if the record counts differ
   */
  join(other: Corpus): Corpus {
    const shared = other.fields.filter((field) => this.fields.includes(field));
    if (shared.length > 0) {
      throw new SchemaConflictError(
        shared,
        `Cannot join corpora that have fields in common: ${shared.join(", ")}`
      );
    }
    if (this.size !== other.size) {
      throw new RowCountError(this.size, other.size);
    }

    return new Corpus(
      [...this.fields, ...other.fields],
      this.records.map((record, index) => {
        const paired = other.records[index];
        if (paired === undefined) {
          throw new RowCountError(this.size, other.size);
        }
        return record.concat(paired);
      })
    );
  }

  /** Rows as plain objects in field order. */
  toObjects(): Record<string, string>[] {
    return this.records.map((record) =>
      Object.fromEntries(this.fields.map((field) => [field, record.get(field) ?? ""]))
    );
  }

  [Symbol.iterator](): Iterator<CorpusRecord> {
    return this.records[Symbol.iterator]();
  }
}
