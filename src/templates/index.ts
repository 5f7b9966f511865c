/**
 * Placeholder templates: fill and inverse parse.
 */

export {
  Template,
  TemplateFormatError,
  MissingKeyError,
  TemplateParseError,
  type TemplatePart,
  type LiteralPart,
  type PlaceholderPart,
} from "./template.js";
