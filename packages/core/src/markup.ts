import {
  type DocumentOptions,
  type ParseOptions,
  parseDocument,
  type SchemaOptions,
  stringify
} from 'yaml';
import { ExtraVarsParseError, isParseLayerError } from './errors';
import { parseKv } from './kv';
import { type ExtraVars, type ExtraVarValue, isExtraVars } from './types';

const TIMESTAMP_TAG = 'tag:yaml.org,2002:timestamp';

/**
 * Shared by decoding and dumping so a dumped mapping always decodes back to itself.
 *
 * YAML 1.1 matches what automation runners read (`yes`/`no` are booleans).
 * Implicit timestamps are left out: `2024-01-01` stays a string.
 */
const YAML_OPTIONS: ParseOptions & DocumentOptions & SchemaOptions = {
  version: '1.1',
  uniqueKeys: false,
  customTags: (tags) =>
    tags.filter((tag) => (typeof tag === 'string' ? tag !== 'timestamp' : tag.tag !== TIMESTAMP_TAG))
};

type DecodeResult = { ok: true; value: ExtraVarValue } | { ok: false };

function toExtraVarValue(value: unknown): ExtraVarValue {
  if (value === null || value === undefined) return null;

  if (typeof value === 'string' || typeof value === 'boolean') {
    return value;
  }

  // .inf and .nan have no JSON form
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : String(value);
  }

  if (Array.isArray(value)) {
    return value.map(toExtraVarValue);
  }

  if (value instanceof Set) {
    return [...value].map(toExtraVarValue);
  }

  if (value instanceof Map) {
    return Object.fromEntries(
      [...value].map(([key, item]) => [String(key), toExtraVarValue(item)])
    );
  }

  if (typeof value === 'object') {
    return Object.fromEntries(
      Object.entries(value).map(([key, item]) => [key, toExtraVarValue(item)])
    );
  }

  return String(value);
}

function decodeDocument(text: string): DecodeResult {
  const doc = parseDocument(text, YAML_OPTIONS);
  if (doc.errors.length > 0) {
    return { ok: false };
  }

  try {
    return { ok: true, value: toExtraVarValue(doc.toJS()) };
  } catch (err) {
    // Alias resolution fails here, after parsing (unknown anchor, too many expansions)
    if (err instanceof ReferenceError) {
      return { ok: false };
    }
    throw err;
  }
}

/**
 * Decode YAML (or JSON, which YAML accepts) into extra variables.
 *
 * @returns the mapping, or `undefined` when the text does not parse or
 * decodes to anything other than a mapping (scalar, sequence, null)
 */
export function decodeMarkup(text: string): ExtraVars | undefined {
  const result = decodeDocument(text);
  if (!result.ok || !isExtraVars(result.value)) {
    return undefined;
  }
  return result.value;
}

/**
 * True when `text` is a valid YAML document holding nothing but comments and blank lines.
 */
export function isCommentOnlyMarkup(text: string): boolean {
  const commentOnly = text.split('\n').every((line) => {
    const trimmed = line.trim();
    return trimmed === '' || trimmed.startsWith('#');
  });
  return commentOnly && decodeDocument(text).ok;
}

/**
 * Render extra variables as block-style YAML with sorted keys.
 */
export function dumpYaml(vars: ExtraVars): string {
  return stringify(vars, { ...YAML_OPTIONS, sortMapEntries: true });
}

/**
 * Turn one source's text into extra variables.
 *
 * YAML/JSON is tried first. When that fails and `allowKv` is set, the text is
 * parsed as `key=value` words instead.
 *
 * @throws {ExtraVarsParseError} when no strategy could decode the text
 */
export function stringToDict(text: string, allowKv = true): ExtraVars {
  const decoded = decodeMarkup(text);
  if (decoded) {
    return decoded;
  }

  if (!allowKv) {
    throw new ExtraVarsParseError(text);
  }

  try {
    return parseKv(text);
  } catch (err) {
    if (isParseLayerError(err)) {
      throw new ExtraVarsParseError(text, { cause: err });
    }
    throw err;
  }
}
