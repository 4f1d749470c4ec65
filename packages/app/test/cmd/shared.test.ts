import { ExtraVarsParseError, MalformedAssignmentError } from '@extravars/core';
import { describe, expect, test } from 'vitest';
import { formatFailure } from '../../src/cmd/shared';

describe('formatFailure', () => {
  test('reports extra-vars errors as user errors', () => {
    expect(formatFailure(new MalformedAssignmentError('x='), false)).toBe(
      "Error: Assignment 'x=' needs both a key and a value"
    );
  });

  test('colors the label', () => {
    expect(formatFailure(new ExtraVarsParseError('x'), true)).toBe(
      '\x1b[31mError\x1b[0m: Failed to parse some of the extra variables.\nvariables:\nx'
    );
  });

  test('reports anything else as fatal', () => {
    expect(formatFailure(new Error('boom'), false)).toBe('Fatal error: boom');
    expect(formatFailure('boom', true)).toBe('Fatal error: boom');
  });
});
