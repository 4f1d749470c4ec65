/**
 * Literal scanner for key=value right-hand sides.
 *
 * Recognizes a deliberately small grammar: `True`, `False`, `None`, numbers,
 * quoted strings, and bracketed lists / parenthesized tuples of those.
 * Nothing is ever evaluated.
 */

import type { ExtraVarValue } from '../types';

const DIGITS = '\\d(?:_?\\d)*';
const EXPONENT = `[eE][+-]?${DIGITS}`;
const POINT_FLOAT = `(?:${DIGITS})?\\.${DIGITS}|${DIGITS}\\.`;

const DECIMAL_INT = /^(?:0(?:_?0)*|[1-9](?:_?\d)*)$/;
const PREFIXED_INT = /^0(?:[xX](?:_?[0-9a-fA-F])+|[oO](?:_?[0-7])+|[bB](?:_?[01])+)$/;
const FLOAT = new RegExp(`^(?:(?:${POINT_FLOAT})(?:${EXPONENT})?|${DIGITS}${EXPONENT})$`);

const KEYWORDS = new Map<string, ExtraVarValue>([
  ['True', true],
  ['False', false],
  ['None', null]
]);

const ESCAPES = new Map<string, string>([
  ['\\', '\\'],
  ["'", "'"],
  ['"', '"'],
  ['n', '\n'],
  ['r', '\r'],
  ['t', '\t']
]);

const WHITESPACE = new Set([' ', '\t', '\r', '\n']);
const WORD_DELIMITERS = new Set([...WHITESPACE, ',', '[', ']', '(', ')', "'", '"']);

function parseNumber(body: string): number | undefined {
  const digits = body.replaceAll('_', '');

  if (DECIMAL_INT.test(body) || PREFIXED_INT.test(body)) {
    const value = Number(digits);
    // Past this point the number would silently lose precision
    return Number.isSafeInteger(value) ? value : undefined;
  }

  if (FLOAT.test(body)) {
    const value = Number(digits);
    return Number.isFinite(value) ? value : undefined;
  }

  return undefined;
}

function parseWord(word: string): ExtraVarValue | undefined {
  if (KEYWORDS.has(word)) {
    return KEYWORDS.get(word);
  }

  const sign = word.startsWith('-') || word.startsWith('+') ? word.charAt(0) : '';
  const value = parseNumber(word.slice(sign.length));
  if (value === undefined) return undefined;
  return sign === '-' ? -value : value;
}

class LiteralScanner {
  private pos = 0;

  constructor(private readonly text: string) {}

  scan(): ExtraVarValue | undefined {
    const value = this.value();
    this.skipWhitespace();
    return this.pos === this.text.length ? value : undefined;
  }

  private peek(): string {
    return this.text.charAt(this.pos);
  }

  private skipWhitespace(): void {
    while (WHITESPACE.has(this.peek())) {
      this.pos++;
    }
  }

  private value(): ExtraVarValue | undefined {
    this.skipWhitespace();
    const char = this.peek();

    switch (char) {
      case '[':
        return this.sequence(']');
      case '(':
        return this.sequence(')');
      case "'":
      case '"':
        return this.string(char);
      default:
        return this.word();
    }
  }

  private sequence(close: ']' | ')'): ExtraVarValue | undefined {
    this.pos++;
    const items: ExtraVarValue[] = [];
    let sawComma = false;

    this.skipWhitespace();
    if (this.peek() === close) {
      this.pos++;
      return items;
    }

    for (;;) {
      const item = this.value();
      if (item === undefined) return undefined;
      items.push(item);

      this.skipWhitespace();
      const next = this.peek();
      if (next === close) {
        this.pos++;
        break;
      }
      if (next !== ',') return undefined;

      this.pos++;
      sawComma = true;
      this.skipWhitespace();
      if (this.peek() === close) {
        this.pos++;
        break;
      }
    }

    // `(x)` groups a single value, `(x,)` is a one-element tuple
    if (close === ')' && items.length === 1 && !sawComma) {
      return items[0];
    }
    return items;
  }

  private string(quote: string): string | undefined {
    this.pos++;
    let out = '';

    while (this.pos < this.text.length) {
      const char = this.peek();

      if (char === quote) {
        this.pos++;
        return out;
      }

      if (char === '\n') return undefined;

      if (char === '\\') {
        const next = this.text.charAt(this.pos + 1);
        if (next === '') return undefined;
        // Backslash-newline continues the string on the next line
        if (next !== '\n') {
          out += ESCAPES.get(next) ?? `\\${next}`;
        }
        this.pos += 2;
        continue;
      }

      out += char;
      this.pos++;
    }

    return undefined;
  }

  private word(): ExtraVarValue | undefined {
    const start = this.pos;
    while (this.pos < this.text.length && !WORD_DELIMITERS.has(this.peek())) {
      this.pos++;
    }
    if (this.pos === start) return undefined;
    return parseWord(this.text.slice(start, this.pos));
  }
}

/**
 * Interpret `text` as a literal value.
 *
 * @returns the value, or `undefined` when `text` is not a supported literal
 */
export function parseLiteral(text: string): ExtraVarValue | undefined {
  return new LiteralScanner(text).scan();
}
