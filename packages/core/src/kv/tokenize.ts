import { UnbalancedQuoteError } from '../errors';

const WHITESPACE = new Set([' ', '\t', '\r', '\n']);

/**
 * Split text into shell-like words.
 *
 * Whitespace separates words, quotes group them and are removed. Inside single
 * quotes everything is literal; inside double quotes a backslash only escapes
 * `"` and `\`. Outside quotes a backslash escapes any character.
 *
 * @throws {UnbalancedQuoteError} on an unterminated quote or a trailing backslash
 */
export function tokenize(input: string): string[] {
  const tokens: string[] = [];

  let token = '';
  // Set once a word has begun, so '' and "" still yield an (empty) token.
  let started = false;
  let quote: '"' | "'" | null = null;
  let escaped = false;

  for (const char of input) {
    if (escaped) {
      if (quote === '"' && char !== '"' && char !== '\\') {
        token += '\\';
      }
      token += char;
      escaped = false;
      continue;
    }

    if (quote === "'") {
      if (char === "'") {
        quote = null;
      } else {
        token += char;
      }
      continue;
    }

    if (quote === '"') {
      if (char === '\\') {
        escaped = true;
      } else if (char === '"') {
        quote = null;
      } else {
        token += char;
      }
      continue;
    }

    if (char === '\\') {
      escaped = true;
      started = true;
      continue;
    }

    if (char === "'" || char === '"') {
      quote = char;
      started = true;
      continue;
    }

    if (WHITESPACE.has(char)) {
      if (started) {
        tokens.push(token);
        token = '';
        started = false;
      }
      continue;
    }

    token += char;
    started = true;
  }

  if (escaped) {
    throw new UnbalancedQuoteError(input, 'escape');
  }

  if (quote !== null) {
    throw new UnbalancedQuoteError(input, 'quotation');
  }

  if (started) {
    tokens.push(token);
  }

  return tokens;
}
