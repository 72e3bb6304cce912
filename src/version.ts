import { readFileSync } from 'node:fs';

let cachedVersion: string | null = null;

export function getCliVersion(): string {
  if (cachedVersion) {
    return cachedVersion;
  }
  // src/ during development, dist/src/ after a build.
  for (const relative of ['../package.json', '../../package.json']) {
    try {
      const raw = readFileSync(new URL(relative, import.meta.url), 'utf8');
      const parsed: unknown = JSON.parse(raw);
      if (parsed && typeof parsed === 'object' && 'version' in parsed && typeof parsed.version === 'string') {
        cachedVersion = parsed.version;
        return cachedVersion;
      }
    } catch {
      // try the next location
    }
  }
  cachedVersion = '0.0.0';
  return cachedVersion;
}
