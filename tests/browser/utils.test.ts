import { describe, expect, test } from 'vitest';
import { formatElapsed, parseDuration, parsePort, pickDebugPort, splitBrowserArgs } from '../../src/browser/utils.js';

describe('parseDuration', () => {
  test('combines units', () => {
    expect(parseDuration('1h 2m 3s', 0)).toBe(3_723_000);
    expect(parseDuration('250ms', 0)).toBe(250);
  });

  test('falls back for blank or unknown input', () => {
    expect(parseDuration('', 42)).toBe(42);
    expect(parseDuration('   ', 42)).toBe(42);
    expect(parseDuration('10 minutes', 42)).toBe(42);
  });
});

describe('pickDebugPort', () => {
  test('stays inside the reserved range', () => {
    expect(pickDebugPort(() => 0)).toBe(33_000);
    expect(pickDebugPort(() => 0.99999)).toBe(42_999);
  });
});

describe('parsePort', () => {
  test('returns null for unusable values', () => {
    expect(parsePort(undefined)).toBeNull();
    expect(parsePort('abc')).toBeNull();
    expect(parsePort('65536')).toBeNull();
    expect(parsePort('8080')).toBe(8080);
  });
});

describe('splitBrowserArgs', () => {
  test('drops empty entries between repeated spaces', () => {
    expect(splitBrowserArgs(' --a  --b=1 ')).toEqual(['--a', '--b=1']);
    expect(splitBrowserArgs(undefined)).toEqual([]);
  });
});

describe('formatElapsed', () => {
  test('picks a readable unit', () => {
    expect(formatElapsed(840)).toBe('840ms');
    expect(formatElapsed(12_340)).toBe('12.3s');
    expect(formatElapsed(125_000)).toBe('2m05s');
  });
});
