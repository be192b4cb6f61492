/**
 * Query Module
 *
 * Question answering over the chunk graph: schema introspection, question
 * translation, execution and answer rendering.
 *
 * @module
 */

export {
  SchemaIntrospector,
  createSchemaIntrospector,
  renderSchema,
  stripRelType,
  type GraphSchema,
  type TypeProperties,
  type RelationshipPattern,
} from "./schema-introspector.js";

export {
  parseCypherQuery,
  findContentColumn,
  type StructuredQuery,
  type Clause,
  type ClauseKeyword,
  type WriteKeyword,
  type Projection,
} from "./cypher-parser.js";

export {
  QueryTranslator,
  createQueryTranslator,
  buildTranslationPrompt,
  sanitizeQuery,
  type QueryTranslatorOptions,
  type TranslationFeedback,
} from "./query-translator.js";

export {
  QueryExecutor,
  createQueryExecutor,
  type ExecutionError,
  type QueryExecutorOptions,
} from "./query-executor.js";

export {
  AnswerSynthesizer,
  GenerativeAnswerSynthesizer,
  resolveContentColumn,
  truncate,
  EMPTY_ANSWER_TEXT,
  NO_CONTENT_ANSWER_TEXT,
  TRUNCATION_MARKER,
  type Answer,
  type AnswerKind,
  type IAnswerSynthesizer,
  type SynthesisOptions,
} from "./answer-synthesizer.js";
