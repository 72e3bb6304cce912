import {
  CHROME_ARGS_ENV,
  DEBUG_PORT_ENV,
  DEFAULT_HTML_FILE,
  DEFAULT_IDLE_TIMEOUT_MS,
  DEFAULT_TAB_TIMEOUT_MS,
  DEFAULT_TEST_DIRECTORY,
  TAB_POLL_INTERVAL_MS,
} from '../browser/constants.js';
import type { BrowserVariant, HarnessLogger } from '../browser/types.js';
import { parsePort, splitBrowserArgs } from '../browser/utils.js';

export interface WebTestRunOptions {
  /** Directory served as the web root. */
  directory?: string;
  /** Harness page, relative to the served directory. */
  htmlFile?: string;
  /** Force one browser variant instead of the best available. */
  browser?: BrowserVariant | null;
  preferEmbedded?: boolean;
  runtimeDir?: string | null;
  browserArgs?: string[];
  /** Environment overlay for the browser process. */
  browserEnv?: NodeJS.ProcessEnv;
  idleTimeoutMs?: number;
  tabTimeoutMs?: number;
  tabPollIntervalMs?: number;
  debugPort?: number | null;
  verbose?: boolean;
  log?: HarnessLogger;
}

export type ResolvedRunConfig = Required<Omit<WebTestRunOptions, 'log' | 'browser' | 'runtimeDir' | 'debugPort'>> & {
  browser: BrowserVariant | null;
  runtimeDir: string | null;
  debugPort: number | null;
};

export const DEFAULT_RUN_CONFIG: ResolvedRunConfig = {
  directory: DEFAULT_TEST_DIRECTORY,
  htmlFile: DEFAULT_HTML_FILE,
  browser: null,
  preferEmbedded: true,
  runtimeDir: null,
  browserArgs: [],
  browserEnv: {},
  idleTimeoutMs: DEFAULT_IDLE_TIMEOUT_MS,
  tabTimeoutMs: DEFAULT_TAB_TIMEOUT_MS,
  tabPollIntervalMs: TAB_POLL_INTERVAL_MS,
  debugPort: null,
  verbose: false,
};

export function resolveRunConfig(
  options: WebTestRunOptions | undefined,
  env: NodeJS.ProcessEnv = process.env,
): ResolvedRunConfig {
  const directory = options?.directory ?? DEFAULT_RUN_CONFIG.directory;
  const htmlFile = (options?.htmlFile ?? DEFAULT_RUN_CONFIG.htmlFile).replace(/^\/+/, '');
  if (!htmlFile) {
    throw new Error('Harness file name must not be empty.');
  }
  return {
    directory,
    htmlFile,
    browser: options?.browser ?? DEFAULT_RUN_CONFIG.browser,
    // Directories under build/ prefer an installed Chrome.
    preferEmbedded: options?.preferEmbedded ?? !directory.startsWith('build'),
    runtimeDir: options?.runtimeDir ?? DEFAULT_RUN_CONFIG.runtimeDir,
    browserArgs: [...(options?.browserArgs ?? []), ...splitBrowserArgs(env[CHROME_ARGS_ENV])],
    browserEnv: options?.browserEnv ?? DEFAULT_RUN_CONFIG.browserEnv,
    idleTimeoutMs: positiveOr(options?.idleTimeoutMs, DEFAULT_RUN_CONFIG.idleTimeoutMs),
    tabTimeoutMs: positiveOr(options?.tabTimeoutMs, DEFAULT_RUN_CONFIG.tabTimeoutMs),
    tabPollIntervalMs: positiveOr(options?.tabPollIntervalMs, DEFAULT_RUN_CONFIG.tabPollIntervalMs),
    debugPort: options?.debugPort ?? parsePort(env[DEBUG_PORT_ENV]) ?? DEFAULT_RUN_CONFIG.debugPort,
    verbose: options?.verbose ?? DEFAULT_RUN_CONFIG.verbose,
  };
}

function positiveOr(value: number | undefined, fallback: number): number {
  return typeof value === 'number' && Number.isFinite(value) && value > 0 ? value : fallback;
}
