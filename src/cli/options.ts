import { InvalidArgumentError } from 'commander';
import { isBrowserVariant, BROWSER_VARIANTS } from '../browser/installations.js';
import type { BrowserVariant } from '../browser/types.js';
import { parseDuration, parsePort } from '../browser/utils.js';

export function collectBrowserArgs(value: string, previous: string[] = []): string[] {
  const trimmed = value.trim();
  return trimmed ? previous.concat(trimmed) : previous;
}

export function parseDurationOption(value: string): number {
  const parsed = parseDuration(value, Number.NaN);
  if (Number.isNaN(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Duration must look like 500ms, 5s, 1m, 1m30s or a number of milliseconds.');
  }
  return parsed;
}

export function parsePortOption(value: string): number {
  const trimmed = value.trim();
  const port = /^[0-9]+$/.test(trimmed) ? parsePort(trimmed) : null;
  if (port === null) {
    throw new InvalidArgumentError('Port must be an integer between 1 and 65535.');
  }
  return port;
}

export function parseBrowserVariantOption(value: string): BrowserVariant {
  const normalized = value.trim().toLowerCase();
  if (!isBrowserVariant(normalized)) {
    throw new InvalidArgumentError(`Browser must be one of: ${BROWSER_VARIANTS.join(', ')}.`);
  }
  return normalized;
}
