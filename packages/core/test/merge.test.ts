import { describe, expect, test } from 'vitest';
import { mergeExtraVars } from '../src/merge';

describe('mergeExtraVars', () => {
  test('joins raw params from both sides, base first', () => {
    expect(mergeExtraVars({ _raw_params: 'a' }, { _raw_params: 'b' })).toEqual({
      _raw_params: 'a b'
    });
  });

  test('lets incoming keys win', () => {
    expect(mergeExtraVars({ x: 1 }, { x: 2 })).toEqual({ x: 2 });
  });

  test('keeps keys only present in base', () => {
    expect(mergeExtraVars({ _raw_params: 'a', x: 1 }, { x: 2, y: 3 })).toEqual({
      _raw_params: 'a',
      x: 2,
      y: 3
    });
  });

  test('takes raw params from incoming when base has none', () => {
    expect(mergeExtraVars({ x: 1 }, { _raw_params: 'b' })).toEqual({ x: 1, _raw_params: 'b' });
  });

  test('renders non-string raw params as text before joining', () => {
    expect(mergeExtraVars({ _raw_params: 5 }, { _raw_params: 'b' })).toEqual({
      _raw_params: '5 b'
    });
  });

  test('does not merge nested mappings', () => {
    expect(mergeExtraVars({ db: { host: 'a', port: 1 } }, { db: { host: 'b' } })).toEqual({
      db: { host: 'b' }
    });
  });

  test('keeps base key order and appends new keys', () => {
    expect(Object.keys(mergeExtraVars({ b: 1, a: 1 }, { c: 1, b: 2 }))).toEqual(['b', 'a', 'c']);
  });

  test('leaves both inputs untouched', () => {
    const base = { _raw_params: 'a', x: 1 };
    const incoming = { _raw_params: 'b', x: 2 };

    mergeExtraVars(base, incoming);

    expect(base).toEqual({ _raw_params: 'a', x: 1 });
    expect(incoming).toEqual({ _raw_params: 'b', x: 2 });
  });
});
