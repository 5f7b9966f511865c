/**
 * What the engine does when a completion does not match the output
 * template.
 */

export type ParseFailurePolicy =
  | { readonly kind: "strict" }
  | { readonly kind: "default"; readonly value: string };

/** Rethrow the parse failure. */
export const STRICT: ParseFailurePolicy = Object.freeze({ kind: "strict" });

/** Absorb the parse failure and fill every output field with `value`. */
export function defaultOnParseFailure(value: string): ParseFailurePolicy {
  return Object.freeze({ kind: "default", value });
}

export interface MappingOutcome {
  /** Completion text exactly as returned */
  readonly raw: string;
  /** Output field values, parsed or defaulted */
  readonly parsed: Readonly<Record<string, string>>;
  readonly success: boolean;
  /** Parse error message when the default was used */
  readonly errorMessage: string | null;
}
