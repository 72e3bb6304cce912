import { accessSync, constants as fsConstants, statSync } from 'node:fs';
import path from 'node:path';
import type { BrowserInstallation, BrowserVariant } from './types.js';

export const BROWSER_VARIANTS: readonly BrowserVariant[] = ['stable', 'dev', 'chromium', 'embedded', 'headless-shell'];

export interface InstallationResolverOptions {
  platform?: NodeJS.Platform;
  env?: NodeJS.ProcessEnv;
  /** Directory of a runtime install that ships its own Chromium in `../chromium`. */
  runtimeDir?: string | null;
  isFile?: (candidate: string) => boolean;
  /** Used for `PATH` lookups. Defaults to `isFile` when only that is given. */
  isExecutable?: (candidate: string) => boolean;
}

export interface InstallationResolver {
  resolveBest(preferEmbedded?: boolean): BrowserInstallation | null;
  resolveVariant(variant: BrowserVariant): BrowserInstallation | null;
  probeAll(): Array<{ variant: BrowserVariant; installation: BrowserInstallation | null }>;
}

export function isBrowserVariant(value: string): value is BrowserVariant {
  return (BROWSER_VARIANTS as readonly string[]).includes(value);
}

export function createInstallationResolver(options: InstallationResolverOptions = {}): InstallationResolver {
  const platform = options.platform ?? process.platform;
  const env = options.env ?? process.env;
  const isFile = options.isFile ?? isRegularFile;
  const isExecutable = options.isExecutable ?? options.isFile ?? executableCheck(platform);
  const runtimeDir = options.runtimeDir ? trimTrailingSeparators(options.runtimeDir, platform) : null;
  const pathApi = platform === 'win32' ? path.win32 : path.posix;
  // One lookup per binary name for the lifetime of this resolver.
  const searchPathMemo = new Map<string, string | null>();

  const findOnSearchPath = (name: string): string | null => {
    const cached = searchPathMemo.get(name);
    if (cached !== undefined) {
      return cached;
    }
    const found = searchExecutablePath(name, { platform, env, isExecutable });
    searchPathMemo.set(name, found);
    return found;
  };

  const candidatesFor = (variant: BrowserVariant): string[] => {
    switch (variant) {
      case 'stable':
        return stablePaths(platform);
      case 'dev':
        return devPaths(platform);
      case 'chromium':
        return chromiumPaths(platform);
      case 'embedded':
        return runtimeBundledPath(runtimeDir, embeddedRelativePath(platform), pathApi);
      case 'headless-shell':
        return runtimeBundledPath(runtimeDir, headlessShellRelativePath(platform), pathApi);
    }
  };

  const searchNameFor = (variant: BrowserVariant): string | null => {
    const exe = platform === 'win32' ? '.exe' : '';
    switch (variant) {
      case 'embedded':
        return `chrome${exe}`;
      case 'headless-shell':
        return `chrome-headless-shell${exe}`;
      default:
        return null;
    }
  };

  const resolveVariant = (variant: BrowserVariant): BrowserInstallation | null => {
    const candidates = candidatesFor(variant);
    const existing = candidates.find((candidate) => isFile(candidate));
    if (existing) {
      return { variant, executablePath: pathApi.resolve(existing), exists: true };
    }
    const searchName = searchNameFor(variant);
    const onPath = searchName ? findOnSearchPath(searchName) : null;
    if (onPath) {
      return { variant, executablePath: onPath, exists: true };
    }
    const [primary] = candidates;
    if (!primary) {
      return null;
    }
    return { variant, executablePath: primary, exists: false };
  };

  return {
    resolveVariant,
    resolveBest(preferEmbedded = false) {
      const order: BrowserVariant[] = preferEmbedded
        ? ['embedded', 'stable', 'dev', 'chromium']
        : ['stable', 'dev', 'chromium', 'embedded'];
      for (const variant of order) {
        const installation = resolveVariant(variant);
        if (installation?.exists) {
          return installation;
        }
      }
      return null;
    },
    probeAll() {
      return BROWSER_VARIANTS.map((variant) => ({ variant, installation: resolveVariant(variant) }));
    },
  };
}

export function searchExecutablePath(
  name: string,
  {
    platform,
    env,
    isExecutable,
  }: { platform: NodeJS.Platform; env: NodeJS.ProcessEnv; isExecutable: (candidate: string) => boolean },
): string | null {
  const pathApi = platform === 'win32' ? path.win32 : path.posix;
  const rawPath = env.PATH ?? env.Path ?? '';
  const entries = rawPath.split(pathApi.delimiter).filter(Boolean);
  for (const entry of entries) {
    const candidate = pathApi.join(entry, name);
    if (isExecutable(candidate)) {
      return candidate;
    }
  }
  return null;
}

function stablePaths(platform: NodeJS.Platform): string[] {
  switch (platform) {
    case 'linux':
      return ['/usr/bin/google-chrome'];
    case 'darwin':
      return ['/Applications/Google Chrome.app/Contents/MacOS/Google Chrome'];
    case 'win32':
      return [
        'C:\\Program Files (x86)\\Google\\Chrome\\Application\\chrome.exe',
        'C:\\Program Files\\Google\\Chrome\\Application\\chrome.exe',
      ];
    default:
      return [];
  }
}

function devPaths(platform: NodeJS.Platform): string[] {
  switch (platform) {
    case 'linux':
      return ['/usr/bin/google-chrome-unstable'];
    case 'darwin':
      return ['/Applications/Google Chrome Canary.app/Contents/MacOS/Google Chrome Canary'];
    default:
      return [];
  }
}

function chromiumPaths(platform: NodeJS.Platform): string[] {
  switch (platform) {
    case 'linux':
      return ['/usr/bin/chromium-browser'];
    case 'darwin':
      return ['/Applications/Chromium.app/Contents/MacOS/Chromium'];
    default:
      return [];
  }
}

function embeddedRelativePath(platform: NodeJS.Platform): string[] {
  switch (platform) {
    case 'darwin':
      return ['Chromium.app', 'Contents', 'MacOS', 'Chromium'];
    case 'win32':
      return ['chrome.exe'];
    default:
      return ['chrome'];
  }
}

function headlessShellRelativePath(platform: NodeJS.Platform): string[] {
  const binary = platform === 'win32' ? 'chrome-headless-shell.exe' : 'chrome-headless-shell';
  return ['chrome-headless-shell', binary];
}

function runtimeBundledPath(
  runtimeDir: string | null,
  relative: string[],
  pathApi: path.PlatformPath,
): string[] {
  if (!runtimeDir) {
    return [];
  }
  return [pathApi.join(runtimeDir, '..', 'chromium', ...relative)];
}

function trimTrailingSeparators(dir: string, platform: NodeJS.Platform): string {
  const separators = platform === 'win32' ? /[\\/]+$/ : /\/+$/;
  const trimmed = dir.replace(separators, '');
  return trimmed.length > 0 ? trimmed : dir;
}

function isRegularFile(candidate: string): boolean {
  try {
    return statSync(candidate).isFile();
  } catch {
    return false;
  }
}

function executableCheck(platform: NodeJS.Platform): (candidate: string) => boolean {
  if (platform === 'win32') {
    // The searched names already carry `.exe`.
    return isRegularFile;
  }
  return (candidate) => {
    if (!isRegularFile(candidate)) {
      return false;
    }
    try {
      accessSync(candidate, fsConstants.X_OK);
      return true;
    } catch {
      return false;
    }
  };
}
