/**
 * Mapping definitions and the engine that runs them.
 */

export {
  createMappingDefinition,
  sharedTemplateKeys,
  MappingDefinitionError,
  type MappingDefinition,
  type MappingExample,
} from "./definition.js";
export {
  loadMappingDefinition,
  MappingDefinitionLoader,
  MappingLoadError,
  ExamplesNotFoundError,
  GUIDELINES_FILE,
  INPUT_TEMPLATE_FILE,
  OUTPUT_TEMPLATE_FILE,
  EXAMPLE_FILES,
} from "./loader.js";
export {
  STRICT,
  defaultOnParseFailure,
  type ParseFailurePolicy,
  type MappingOutcome,
} from "./policy.js";
export {
  MappingEngine,
  buildPromptPrefix,
  buildPromptTemplate,
  EVENT_SOURCE,
  COMPLETION_EVENT_KEY,
  ERROR_EVENT_KEY,
  type MappingEngineOptions,
  type MapBatchOptions,
  type MapCorpusOptions,
} from "./engine.js";
