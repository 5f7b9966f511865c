/**
 * Mapping templates.
 *
 * A mapping template is a short plain-text pattern (loaded from
 * input_template.txt or output_template.txt) of literal text and `{key}`
 * placeholders. The same template works in both directions:
 *
 *   fill   — substitute field values into the placeholders (prompt side)
 *   parse  — recover field values from text shaped like the template
 *            (completion side)
 *
 * TEMPLATE FORMAT:
 *
 *   Review: {review}
 *   Product: {product}
 *
 * Rules:
 *   - Placeholders use single braces: {name}; names may not be empty and
 *     may not contain braces
 *   - Literal text and placeholders must alternate. "{a}{b}" is rejected
 *     because nothing separates the two values when parsing
 *   - Leading and trailing whitespace of the template is trimmed
 *   - A placeholder may repeat; fill writes the same value at every
 *     occurrence, parse keeps the value bound at the last occurrence
 *   - A stray "{" or "}" is rejected
 *
 * Known limitation: fill substitutes key by key, so a value that itself
 * contains another key's "{name}" form will be substituted again.
 */

// ---------------------------------------------------------------------------
// Parts
// ---------------------------------------------------------------------------

export interface LiteralPart {
  readonly kind: "literal";
  /** Literal text, exactly as it appears in the template. */
  readonly raw: string;
}

export interface PlaceholderPart {
  readonly kind: "placeholder";
  /** Bracketed form, e.g. `{name}`. */
  readonly raw: string;
  /** Bare placeholder name, e.g. `name`. */
  readonly key: string;
}

export type TemplatePart = LiteralPart | PlaceholderPart;

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export class TemplateFormatError extends Error {
  constructor(
    public readonly templateRaw: string,
    message: string
  ) {
    super(message);
    this.name = "TemplateFormatError";
  }
}

export class MissingKeyError extends Error {
  constructor(
    public readonly key: string,
    public readonly templateRaw: string
  ) {
    super(`Key "${key}" missing from values for template '${templateRaw}'`);
    this.name = "MissingKeyError";
  }
}

export class TemplateParseError extends Error {
  constructor(
    public readonly templateRaw: string,
    public readonly text: string,
    message: string
  ) {
    super(message);
    this.name = "TemplateParseError";
  }
}

// ---------------------------------------------------------------------------
// Tokenizing
// ---------------------------------------------------------------------------

/**
 * Matches either a `{placeholder}` (group 1, name in group 2), a run of
 * brace-free text (group 3) or a lone brace (group 4).
 */
const TOKEN_RE = /(\{([^{}]*)\})|([^{}]+)|([{}])/g;

function tokenize(raw: string): TemplatePart[] {
  const parts: TemplatePart[] = [];

  TOKEN_RE.lastIndex = 0;
  let match: RegExpExecArray | null;
  while ((match = TOKEN_RE.exec(raw)) !== null) {
    const [, placeholder, key, text, stray] = match;

    if (stray !== undefined) {
      throw new TemplateFormatError(
        raw,
        `Unbalanced "${stray}" at position ${match.index} in template '${raw}'`
      );
    }

    let part: TemplatePart;
    if (placeholder !== undefined && key !== undefined) {
      if (key.length === 0) {
        throw new TemplateFormatError(raw, `Empty placeholder "{}" in template '${raw}'`);
      }
      part = { kind: "placeholder", raw: placeholder, key };
    } else {
      part = { kind: "literal", raw: text ?? "" };
    }

    const previous = parts[parts.length - 1];
    if (previous !== undefined && previous.kind === part.kind) {
      throw new TemplateFormatError(
        raw,
        `Keys and non-keys must alternate within a template: '${previous.raw}' is followed by '${part.raw}'`
      );
    }
    parts.push(Object.freeze(part));
  }

  if (parts.length === 0) {
    throw new TemplateFormatError(raw, "Template cannot be empty.");
  }

  return parts;
}

/**
 * Distinct placeholder names in first-occurrence order.
 */
function collectKeys(parts: readonly TemplatePart[]): string[] {
  const seen = new Set<string>();
  for (const part of parts) {
    if (part.kind === "placeholder") {
      seen.add(part.key);
    }
  }
  return [...seen];
}

// ---------------------------------------------------------------------------
// Template
// ---------------------------------------------------------------------------

export class Template {
  private constructor(
    /** Trimmed template source. */
    public readonly raw: string,
    public readonly parts: readonly TemplatePart[],
    public readonly keys: readonly string[]
  ) {
    Object.freeze(this);
  }

  /**
   * Parse a raw template string.
   *
   * @throws TemplateFormatError if the template is empty or malformed
   */
  static load(source: string): Template {
    const raw = source.trim();
    const parts = tokenize(raw);
    return new Template(raw, Object.freeze(parts), Object.freeze(collectKeys(parts)));
  }

  /**
   * Substitute values for every placeholder.
   *
   * @throws MissingKeyError if a template key has no value
   */
  fill(values: Readonly<Record<string, string>>): string {
    let filled = this.raw;
    for (const key of this.keys) {
      const value = Object.prototype.hasOwnProperty.call(values, key) ? values[key] : undefined;
      if (value === undefined) {
        throw new MissingKeyError(key, this.raw);
      }
      filled = filled.split(`{${key}}`).join(value);
    }
    return filled;
  }

  /**
   * Recover placeholder values from text that follows this template's
   * literal structure. Each placeholder takes the text up to the first
   * occurrence of the literal that follows it; the final placeholder takes
   * everything that remains. Text after a trailing literal is ignored.
   *
   * @throws TemplateParseError if a literal cannot be found
   */
  parse(text: string): Record<string, string> {
    const parsed: Record<string, string> = {};
    let remaining = text.trim();
    let index = 0;

    const first = this.parts[0];
    if (first !== undefined && first.kind === "literal") {
      if (!remaining.startsWith(first.raw)) {
        throw new TemplateParseError(
          this.raw,
          text,
          `Expected '${first.raw}' at start of text '${remaining}'.`
        );
      }
      remaining = remaining.slice(first.raw.length);
      index = 1;
    }

    for (; index < this.parts.length; index += 2) {
      const part = this.parts[index];
      if (part === undefined || part.kind !== "placeholder") break;

      const next = this.parts[index + 1];
      if (next === undefined) {
        parsed[part.key] = remaining;
        break;
      }

      const at = remaining.indexOf(next.raw);
      if (at === -1) {
        throw new TemplateParseError(
          this.raw,
          text,
          `Expected '${next.raw}' in text '${remaining}'.`
        );
      }
      parsed[part.key] = remaining.slice(0, at);
      remaining = remaining.slice(at + next.raw.length);
    }

    return parsed;
  }

  toString(): string {
    return this.raw;
  }
}
