import chalk from 'chalk';
import type { BrowserInstallation, BrowserVariant } from '../browser/types.js';
import { formatElapsed } from '../browser/utils.js';
import { HarnessError, describeError } from '../errors.js';
import type { TestRunResult } from '../runner/testRun.js';
import type { TestVerdict } from '../runner/verdict.js';

export const EXIT_CODES: Record<TestVerdict | 'error', number> = {
  passed: 0,
  failed: 1,
  'timed-out': 2,
  error: 3,
};

export function exitCodeFor(verdict: TestVerdict): number {
  return EXIT_CODES[verdict];
}

export function formatRunSummary(result: TestRunResult): string {
  const took = formatElapsed(result.tookMs);
  switch (result.verdict) {
    case 'passed':
      return chalk.green(`✓ tests passed in ${took}`);
    case 'failed':
      return chalk.red(`✗ ${result.message ?? 'tests failed'} after ${took}`);
    case 'timed-out':
      return chalk.yellow(`✗ ${result.message ?? 'tests timed out'} after ${took}`);
  }
}

export function formatRunError(error: unknown): string {
  if (error instanceof HarnessError) {
    return chalk.red(`✗ ${error.stage}: ${error.message}`);
  }
  return chalk.red(`✗ ${describeError(error)}`);
}

export function formatInstallations(
  entries: ReadonlyArray<{ variant: BrowserVariant; installation: BrowserInstallation | null }>,
): string {
  const width = Math.max(...entries.map((entry) => entry.variant.length));
  return entries
    .map(({ variant, installation }) => {
      const label = variant.padEnd(width);
      if (!installation) {
        return `${label}  ${chalk.dim('(no known location)')}`;
      }
      const marker = installation.exists ? chalk.green('found  ') : chalk.dim('missing');
      return `${label}  ${marker}  ${installation.executablePath}`;
    })
    .join('\n');
}
