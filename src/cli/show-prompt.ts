#!/usr/bin/env node
/**
 * Print the prompt a mapping sends, with the raw input template in place
 * of a record. Nothing is sent to a model.
 *
 * USAGE:
 *
 *   npm run show-prompt -- --mapping mappings/product-category
 *   npm run show-prompt -- --mapping mappings/product-category --json
 *
 * Options:
 *   --mapping <dir>   Mapping directory (required)
 *   --json            Output messages and character count as JSON
 *   --no-color        Disable ANSI colors
 *   -h, --help        Show help
 */

import { parseArgs } from "node:util";

import { buildPromptTemplate, loadMappingDefinition } from "../mappings/index.js";
import { c, disableColors, formatError, isDirectExecution } from "./common.js";

const HELP = `
Usage: show-prompt --mapping <dir> [--json]

Options:
  --mapping <dir>   Mapping directory (required)
  --json            Output messages and character count as JSON
  --no-color        Disable ANSI colors
  -h, --help        Show this help message
`;

/**
 * Render a mapping's prompt template as text, or as JSON.
 */
export function renderPromptTemplate(mappingDir: string, options: { json?: boolean } = {}): string {
  const definition = loadMappingDefinition(mappingDir);
  const prompt = buildPromptTemplate(definition);

  if (options.json) {
    return JSON.stringify(
      {
        mapping: definition.sourceDirPath,
        characterCount: prompt.characterLength,
        messages: prompt.messages,
      },
      null,
      2
    );
  }
  return prompt.toString();
}

async function main(): Promise<void> {
  const { values: args } = parseArgs({
    options: {
      mapping: { type: "string" },
      json: { type: "boolean", default: false },
      "no-color": { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  if (args.help) {
    console.log(HELP);
    process.exit(0);
  }
  if (args["no-color"]) {
    disableColors();
  }
  if (!args.mapping) {
    console.error(c("red", "Error: --mapping is required"));
    console.error("  Usage: npm run show-prompt -- --mapping <dir>");
    process.exit(1);
  }

  console.log(renderPromptTemplate(args.mapping, { json: args.json }));
}

if (isDirectExecution("show-prompt")) {
  main().catch((err: unknown) => {
    console.error(c("red", `Error: ${formatError(err)}`));
    process.exit(1);
  });
}
