import { DEBUG_PORT_RANGE_SIZE, DEBUG_PORT_RANGE_START } from './constants.js';

export function parseDuration(input: string, fallback: number): number {
  if (!input) {
    return fallback;
  }
  const trimmed = input.trim();
  if (!trimmed) {
    return fallback;
  }
  const lowercase = trimmed.toLowerCase();
  if (/^[0-9]+$/.test(lowercase)) {
    return Number(lowercase);
  }
  const normalized = lowercase.replace(/\s+/g, '');
  const multiDuration = /([0-9]+)(ms|h|m|s)/g;
  let total = 0;
  let lastIndex = 0;
  let match: RegExpExecArray | null = multiDuration.exec(normalized);
  while (match !== null) {
    // Reject gaps such as "5s?2m": every unit must start where the previous one ended.
    if (match.index !== lastIndex) {
      return fallback;
    }
    total += convertUnit(Number(match[1]), match[2]);
    lastIndex = multiDuration.lastIndex;
    match = multiDuration.exec(normalized);
  }
  if (total > 0 && lastIndex === normalized.length) {
    return total;
  }
  return fallback;
}

function convertUnit(value: number, unitRaw: string | undefined): number {
  switch (unitRaw) {
    case 'ms':
      return value;
    case 's':
      return value * 1000;
    case 'm':
      return value * 60_000;
    case 'h':
      return value * 3_600_000;
    default:
      return value;
  }
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function pickDebugPort(random: () => number = Math.random): number {
  return DEBUG_PORT_RANGE_START + Math.floor(random() * DEBUG_PORT_RANGE_SIZE);
}

export function parsePort(raw: string | null | undefined): number | null {
  if (!raw) return null;
  const value = Number.parseInt(raw, 10);
  if (!Number.isFinite(value) || value <= 0 || value > 65535) {
    return null;
  }
  return value;
}

/** Splits a space-separated argument string; runs of spaces yield no empty entries. */
export function splitBrowserArgs(raw: string | null | undefined): string[] {
  if (!raw) {
    return [];
  }
  return raw.split(' ').filter((entry) => entry.length > 0);
}

export function formatElapsed(ms: number): string {
  if (ms < 1000) {
    return `${Math.round(ms)}ms`;
  }
  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`;
  }
  const minutes = Math.floor(seconds / 60);
  const rest = Math.round(seconds - minutes * 60);
  return `${minutes}m${rest.toString().padStart(2, '0')}s`;
}
