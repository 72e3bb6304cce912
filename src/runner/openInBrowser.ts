import { statSync } from 'node:fs';
import path from 'node:path';
import { pathToFileURL } from 'node:url';
import { launchBrowser, type LaunchBrowserOptions } from '../browser/browserProcess.js';
import { createInstallationResolver, type InstallationResolver } from '../browser/installations.js';
import { noopLogger, type BrowserExit, type HarnessLogger } from '../browser/types.js';
import { pickDebugPort } from '../browser/utils.js';
import { BrowserNotFoundError } from '../errors.js';
import type { BrowserProcessHandle } from './testRun.js';

export interface OpenInBrowserOptions {
  preferEmbedded?: boolean;
  runtimeDir?: string | null;
  browserArgs?: string[];
  debugPort?: number | null;
  log?: HarnessLogger;
}

export interface OpenInBrowserDeps {
  resolver?: InstallationResolver;
  launch?: (options: LaunchBrowserOptions) => Promise<BrowserProcessHandle>;
  isFile?: (candidate: string) => boolean;
  random?: () => number;
}

/** Existing files open as file:// URLs; anything else is passed through as a URL. */
export function targetToUrl(target: string, isFile: (candidate: string) => boolean = isExistingFile): string {
  if (isFile(target)) {
    return pathToFileURL(path.resolve(target)).href;
  }
  return target;
}

/** Opens `target` in a fresh profile and resolves once the user closes the browser. */
export async function openInBrowser(
  target: string,
  options: OpenInBrowserOptions = {},
  deps: OpenInBrowserDeps = {},
): Promise<BrowserExit> {
  const logger = options.log ?? noopLogger;
  const resolver = deps.resolver ?? createInstallationResolver({ runtimeDir: options.runtimeDir });
  const installation = resolver.resolveBest(options.preferEmbedded ?? true);
  if (!installation) {
    throw new BrowserNotFoundError();
  }
  const url = targetToUrl(target, deps.isFile);
  const launch = deps.launch ?? launchBrowser;
  const browser = await launch({
    installation,
    url,
    debugPort: options.debugPort ?? pickDebugPort(deps.random),
    extraArgs: options.browserArgs,
    onOutput: logger.browserOutput,
    logger,
  });
  try {
    return await browser.exited;
  } finally {
    await browser.dispose();
  }
}

function isExistingFile(candidate: string): boolean {
  try {
    return statSync(candidate).isFile();
  } catch {
    return false;
  }
}
