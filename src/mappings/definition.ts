/**
 * Mapping definitions: what one input → output transformation consists of.
 */

import type { Template } from "../templates/template.js";

/**
 * A worked example: input field values and the output the model should
 * produce for them.
 */
export interface MappingExample {
  /** Keyed by the input template's keys */
  readonly inputs: Readonly<Record<string, string>>;
  /** Keyed by the output template's keys */
  readonly outputs: Readonly<Record<string, string>>;
}

export interface MappingDefinition {
  /** Instructions sent as the system turn */
  readonly guidelines: string;
  readonly inputTemplate: Template;
  readonly outputTemplate: Template;
  readonly examples: readonly MappingExample[];
  /** Directory the definition was loaded from, if any */
  readonly sourceDirPath: string | null;
}

/**
 * A definition that breaks a structural rule (shared keys, incomplete
 * examples).
 */
export class MappingDefinitionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "MappingDefinitionError";
  }
}

/**
 * Keys that occur in both the input and output template.
 */
export function sharedTemplateKeys(input: Template, output: Template): string[] {
  return input.keys.filter((key) => output.keys.includes(key));
}

/**
 * Assemble a definition and check its structural rules.
 *
 * At most one key may be shared between the input and output templates.
 *
 * @throws MappingDefinitionError if more than one key is shared or an
 *         example is missing a template key
 */
export function createMappingDefinition(input: {
  guidelines: string;
  inputTemplate: Template;
  outputTemplate: Template;
  examples?: readonly MappingExample[];
  sourceDirPath?: string | null;
}): MappingDefinition {
  const shared = sharedTemplateKeys(input.inputTemplate, input.outputTemplate);
  if (shared.length > 1) {
    throw new MappingDefinitionError(
      `Template keys occur in both input and output templates: ${shared.join(", ")}`
    );
  }

  const examples = (input.examples ?? []).map((example, index) => {
    for (const [side, template, values] of [
      ["input", input.inputTemplate, example.inputs],
      ["output", input.outputTemplate, example.outputs],
    ] as const) {
      const missing = template.keys.filter((key) => !Object.prototype.hasOwnProperty.call(values, key));
      if (missing.length > 0) {
        throw new MappingDefinitionError(
          `Example ${index} is missing ${side} field(s): ${missing.join(", ")}`
        );
      }
    }
    return Object.freeze({
      inputs: Object.freeze({ ...example.inputs }),
      outputs: Object.freeze({ ...example.outputs }),
    });
  });

  return Object.freeze({
    guidelines: input.guidelines,
    inputTemplate: input.inputTemplate,
    outputTemplate: input.outputTemplate,
    examples: Object.freeze(examples),
    sourceDirPath: input.sourceDirPath ?? null,
  });
}
