// ============================================================================
// Values
// ============================================================================

export type ExtraVarScalar = string | number | boolean | null;

/**
 * Any value an extra variable can hold. Mirrors what YAML/JSON decoding yields.
 */
export type ExtraVarValue = ExtraVarScalar | ExtraVarValue[] | { [key: string]: ExtraVarValue };

/**
 * A decoded set of extra variables, keyed by variable name.
 */
export type ExtraVars = { [key: string]: ExtraVarValue };

/**
 * Reserved key accumulating positional (non key=value) tokens,
 * space-joined in encounter order across every merged source.
 */
export const RAW_PARAMS_KEY = '_raw_params';

/**
 * Sources starting with this character name a file whose content is decoded instead.
 */
export const FILE_REFERENCE_PREFIX = '@';

// ============================================================================
// Events
// ============================================================================

export type SourceKind = 'inline' | 'file';

export type OutputFormat = 'json' | 'yaml';

export type ExtraVarsEvent =
  | {
      type: 'sourceDecoded';
      index: number;
      kind: SourceKind;
      path?: string;
      keys: string[];
    }
  | { type: 'formatDecided'; format: OutputFormat; message: string };

export type ExtraVarsEventSink = (event: ExtraVarsEvent) => void;

export function isExtraVars(value: ExtraVarValue | undefined): value is ExtraVars {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
