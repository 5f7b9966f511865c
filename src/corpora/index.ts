/**
 * Corpora of schematized text records and their file encodings.
 */

export { CorpusRecord } from "./record.js";
export { Corpus } from "./corpus.js";
export {
  SchemaConflictError,
  RowCountError,
  RecordSchemaError,
  CorpusFormatError,
  type CorpusFormatIssue,
} from "./errors.js";
export { formatTsv, parseTsv, splitTsvRows } from "./tsv.js";
export { formatYaml, parseYamlCorpus, YamlCorpusSchema } from "./yaml.js";
export {
  loadCorpus,
  saveCorpus,
  corpusEncodingFor,
  type CorpusEncoding,
} from "./loader.js";
