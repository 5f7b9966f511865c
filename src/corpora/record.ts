/**
 * A single corpus record: named fields holding text values.
 *
 * Records are immutable. Field order is the order the values were given
 * in and is kept through concatenation.
 */

import { SchemaConflictError } from "./errors.js";

export class CorpusRecord implements Iterable<[string, string]> {
  private readonly values: ReadonlyMap<string, string>;

  constructor(values: Readonly<Record<string, string>> | Iterable<readonly [string, string]>) {
    const entries: Iterable<readonly [string, string]> = isEntryIterable(values)
      ? values
      : Object.entries(values);
    this.values = new Map(entries);
    Object.freeze(this);
  }

  /** Field names in order. */
  get fields(): string[] {
    return [...this.values.keys()];
  }

  get size(): number {
    return this.values.size;
  }

  has(field: string): boolean {
    return this.values.has(field);
  }

  get(field: string): string | undefined {
    return this.values.get(field);
  }

  /**
   * Concatenate two records with disjoint fields.
   *
   * @throws SchemaConflictError if a field occurs in both records
   */
  concat(other: CorpusRecord): CorpusRecord {
    const shared = other.fields.filter((field) => this.values.has(field));
    if (shared.length > 0) {
      throw new SchemaConflictError(
        shared,
        `Cannot concatenate records that share field(s): ${shared.join(", ")}`
      );
    }
    return new CorpusRecord([...this, ...other]);
  }

  /** Plain object view, suitable for Template.fill and serialization. */
  toObject(): Record<string, string> {
    return Object.fromEntries(this.values);
  }

  [Symbol.iterator](): Iterator<[string, string]> {
    return this.values.entries();
  }
}

function isEntryIterable(
  value: Readonly<Record<string, string>> | Iterable<readonly [string, string]>
): value is Iterable<readonly [string, string]> {
  return Symbol.iterator in value;
}
