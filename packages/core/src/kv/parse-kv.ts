import { MalformedAssignmentError, SuspiciousTokenError } from '../errors';
import { type ExtraVars, type ExtraVarValue, RAW_PARAMS_KEY } from '../types';
import { parseLiteral } from './literal';
import { tokenize } from './tokenize';

export type KvInput = string | number | boolean | null | undefined;

/**
 * Render an accumulated raw-params value as text, whatever it was decoded as.
 */
export function rawParamsText(value: ExtraVarValue): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}

function appendRawParam(vars: Map<string, ExtraVarValue>, token: string): void {
  const existing = vars.get(RAW_PARAMS_KEY);
  vars.set(RAW_PARAMS_KEY, existing === undefined ? token : `${rawParamsText(existing)} ${token}`);
}

/**
 * Parse shell-like `key=value` text into extra variables.
 *
 * Values go through the literal scanner (`a=5` yields a number) and fall back
 * to the raw string. Words without `=` are collected under `_raw_params`.
 *
 * @example
 * ```typescript
 * parseKv('a=1 b=two --check');
 * // { a: 1, b: 'two', _raw_params: '--check' }
 * ```
 *
 * @throws {MalformedAssignmentError} when a key or value half is empty
 * @throws {SuspiciousTokenError} when a bare word ends with `:`
 * @throws {UnbalancedQuoteError} when quoting is not closed
 */
export function parseKv(input: KvInput): ExtraVars {
  if (input === null || input === undefined) {
    return {};
  }

  const text = typeof input === 'string' ? input : String(input);
  const vars = new Map<string, ExtraVarValue>();

  for (const token of tokenize(text)) {
    const eqIndex = token.indexOf('=');

    if (eqIndex !== -1) {
      const key = token.slice(0, eqIndex);
      const value = token.slice(eqIndex + 1);
      if (key === '' || value === '') {
        throw new MalformedAssignmentError(token);
      }
      vars.set(key, parseLiteral(value) ?? value);
      continue;
    }

    // Re-quote so the word survives being split again later
    const word = token.includes(' ') ? `"${token}"` : token;
    if (word.endsWith(':')) {
      throw new SuspiciousTokenError(word);
    }
    appendRawParam(vars, word);
  }

  return Object.fromEntries(vars);
}
