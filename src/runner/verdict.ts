import { TESTS_FAILED_MARKER, TESTS_FINISHED_MARKER } from '../browser/constants.js';

export type TestVerdict = 'passed' | 'failed' | 'timed-out';

export const VERDICT_MESSAGES: Record<Exclude<TestVerdict, 'passed'>, string> = {
  failed: 'tests failed',
  'timed-out': 'tests timed out',
};

/**
 * Reads the harness sentinel out of a console line. Plain substring checks: the marker may
 * appear anywhere in the line, and a harness that logs the marker as data will also match.
 */
export function interpretConsoleLine(text: string): Exclude<TestVerdict, 'timed-out'> | null {
  if (!text.includes(TESTS_FINISHED_MARKER)) {
    return null;
  }
  return text.includes(TESTS_FAILED_MARKER) ? 'failed' : 'passed';
}
