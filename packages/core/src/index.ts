// Errors
export {
  ExtraVarsError,
  ExtraVarsParseError,
  isParseLayerError,
  MalformedAssignmentError,
  SuspiciousTokenError,
  UnbalancedQuoteError
} from './errors';
// Key=value parsing
export { type KvInput, parseKv, parseLiteral, rawParamsText, tokenize } from './kv';
// YAML/JSON decoding
export { decodeMarkup, dumpYaml, isCommentOnlyMarkup, stringToDict } from './markup';
// Merging
export { mergeExtraVars } from './merge';
// Options
export {
  type ProcessExtraVarsOptions,
  ProcessExtraVarsOptionsSchema,
  type ResolvedProcessOptions,
  resolveProcessOptions
} from './options';
// Aggregation
export { processExtraVars } from './process';
// Runtime
export { createNodeIO, type IO, type PathApi } from './runtime';
// Types
export {
  type ExtraVarScalar,
  type ExtraVars,
  type ExtraVarsEvent,
  type ExtraVarsEventSink,
  type ExtraVarValue,
  FILE_REFERENCE_PREFIX,
  isExtraVars,
  type OutputFormat,
  RAW_PARAMS_KEY,
  type SourceKind
} from './types';
