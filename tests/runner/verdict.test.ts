import { describe, expect, test } from 'vitest';
import { interpretConsoleLine } from '../../src/runner/verdict.js';

describe('interpretConsoleLine', () => {
  test('ignores ordinary output', () => {
    expect(interpretConsoleLine('running 12 tests')).toBeNull();
    expect(interpretConsoleLine('tests finished')).toBeNull();
  });

  test('reads a passing finish marker', () => {
    expect(interpretConsoleLine('tests finished - passed')).toBe('passed');
  });

  test('reads a failing finish marker', () => {
    expect(interpretConsoleLine('tests finished - failed')).toBe('failed');
  });

  test('matches the marker anywhere in the line', () => {
    expect(interpretConsoleLine('[harness] tests finished - failed (3 of 40)')).toBe('failed');
    expect(interpretConsoleLine('log: tests finished - ok')).toBe('passed');
  });
});
