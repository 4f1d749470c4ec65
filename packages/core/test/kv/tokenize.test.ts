import { describe, expect, test } from 'vitest';
import { UnbalancedQuoteError } from '../../src/errors';
import { tokenize } from '../../src/kv';

describe('tokenize', () => {
  test('splits on any run of whitespace', () => {
    expect(tokenize('a=1 b=2')).toEqual(['a=1', 'b=2']);
    expect(tokenize('  a \t b\n')).toEqual(['a', 'b']);
    expect(tokenize('')).toEqual([]);
  });

  test('groups quoted text into one token and strips the quotes', () => {
    expect(tokenize('msg="hello world" next')).toEqual(['msg=hello world', 'next']);
    expect(tokenize("name='a b'c")).toEqual(['name=a bc']);
  });

  test('keeps empty quoted strings as empty tokens', () => {
    expect(tokenize('"" x')).toEqual(['', 'x']);
    expect(tokenize("''")).toEqual(['']);
  });

  test('escapes any character outside quotes', () => {
    expect(tokenize('a\\ b c')).toEqual(['a b', 'c']);
    expect(tokenize('\\"quoted\\"')).toEqual(['"quoted"']);
  });

  test('only escapes quote and backslash inside double quotes', () => {
    expect(tokenize('"a\\"b\\\\c\\d"')).toEqual(['a"b\\c\\d']);
  });

  test('treats backslashes literally inside single quotes', () => {
    expect(tokenize("'a\\b'")).toEqual(['a\\b']);
  });

  test('gives # no special meaning', () => {
    expect(tokenize('# note')).toEqual(['#', 'note']);
  });

  test('rejects an unterminated quote', () => {
    expect(() => tokenize('say "open')).toThrow(UnbalancedQuoteError);
    expect(() => tokenize("it's")).toThrow('No closing quotation');
  });

  test('rejects a trailing backslash', () => {
    expect(() => tokenize('trail\\')).toThrow('No escaped character');
  });
});
