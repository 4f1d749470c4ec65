import { rawParamsText } from './kv';
import { type ExtraVars, type ExtraVarValue, RAW_PARAMS_KEY } from './types';

/**
 * Merge two sets of extra variables with "last wins" semantics.
 *
 * Keys from `incoming` overwrite `base`, except `_raw_params`: when both sides
 * carry it the two are joined with a space, `base` first. Neither argument is
 * modified.
 */
export function mergeExtraVars(base: ExtraVars, incoming: ExtraVars): ExtraVars {
  const merged = new Map<string, ExtraVarValue>(Object.entries(base));

  for (const [key, value] of Object.entries(incoming)) {
    const existing = merged.get(key);

    if (key === RAW_PARAMS_KEY && existing !== undefined) {
      merged.set(key, `${rawParamsText(existing)} ${rawParamsText(value)}`);
      continue;
    }

    merged.set(key, value);
  }

  return Object.fromEntries(merged);
}
