import { spawn, type ChildProcess } from 'node:child_process';
import { mkdtemp, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import readline from 'node:readline';
import type { Readable } from 'node:stream';
import { LaunchFailedError } from '../errors.js';
import { BASE_LAUNCH_FLAGS, PROCESS_EXIT_GRACE_MS, PROFILE_DIR_PREFIX, VERBOSE_LAUNCH_FLAGS } from './constants.js';
import {
  noopLogger,
  type BrowserExit,
  type BrowserInstallation,
  type BrowserOutputStream,
  type HarnessLogger,
} from './types.js';

export interface LaunchBrowserOptions {
  installation: BrowserInstallation;
  url: string;
  debugPort: number;
  extraArgs?: string[];
  /** Overlay merged over the parent environment. */
  env?: NodeJS.ProcessEnv;
  verbose?: boolean;
  profileBaseDir?: string;
  onOutput?: (line: string, stream: BrowserOutputStream) => void;
  logger?: HarnessLogger;
}

export function buildLaunchArgs({
  profileDir,
  debugPort,
  url,
  extraArgs = [],
  verbose = false,
}: {
  profileDir: string;
  debugPort: number;
  url: string;
  extraArgs?: string[];
  verbose?: boolean;
}): string[] {
  const args: string[] = [...BASE_LAUNCH_FLAGS, `--user-data-dir=${profileDir}`, `--remote-debugging-port=${debugPort}`];
  if (verbose) {
    args.push(...VERBOSE_LAUNCH_FLAGS);
  }
  args.push(...extraArgs, url);
  return args;
}

export async function launchBrowser(options: LaunchBrowserOptions): Promise<BrowserProcess> {
  const { installation, debugPort } = options;
  const logger = options.logger ?? noopLogger;
  const profileDir = await mkdtemp(path.join(options.profileBaseDir ?? os.tmpdir(), PROFILE_DIR_PREFIX));
  const args = buildLaunchArgs({
    profileDir,
    debugPort,
    url: options.url,
    extraArgs: options.extraArgs,
    verbose: options.verbose,
  });
  if (logger.verbose) {
    logger(`[browser] ${installation.executablePath} ${args.join(' ')}`);
  }

  let browser: BrowserProcess;
  try {
    const child = spawn(installation.executablePath, args, {
      env: { ...process.env, ...options.env },
      stdio: ['ignore', 'pipe', 'pipe'],
    });
    browser = new BrowserProcess(installation, profileDir, debugPort, child, options.onOutput, logger);
    await browser.spawned;
  } catch (error) {
    await rm(profileDir, { recursive: true, force: true }).catch(() => undefined);
    throw new LaunchFailedError(installation.executablePath, error);
  }

  const pidLabel = typeof browser.pid === 'number' ? ` (pid ${browser.pid})` : '';
  logger(`Launched ${installation.variant} browser${pidLabel} with DevTools port ${debugPort}`);
  return browser;
}

export class BrowserProcess {
  readonly spawned: Promise<void>;
  readonly exited: Promise<BrowserExit>;
  private exit: BrowserExit | null = null;
  private killRequested = false;
  private disposal: Promise<void> | null = null;

  constructor(
    readonly installation: BrowserInstallation,
    readonly profileDir: string,
    readonly debugPort: number,
    private readonly child: ChildProcess,
    onOutput: ((line: string, stream: BrowserOutputStream) => void) | undefined,
    private readonly logger: HarnessLogger,
  ) {
    this.spawned = new Promise<void>((resolve, reject) => {
      child.once('spawn', () => resolve());
      child.once('error', reject);
    });
    this.exited = new Promise<BrowserExit>((resolve) => {
      child.once('exit', (code, signal) => {
        this.exit = { code, signal };
        resolve(this.exit);
      });
    });
    child.on('error', (error) => {
      if (this.exit === null && typeof child.pid === 'number') {
        this.logger(`Browser process error: ${error.message}`);
      }
    });
    const forward = onOutput ?? (() => {});
    drainLines(child.stdout, (line) => forward(line, 'stdout'));
    drainLines(child.stderr, (line) => forward(line, 'stderr'));
  }

  get pid(): number | undefined {
    return this.child.pid;
  }

  get exitCode(): number | null | undefined {
    return this.exit?.code;
  }

  get exitSignal(): NodeJS.Signals | null | undefined {
    return this.exit?.signal;
  }

  get running(): boolean {
    return this.exit === null;
  }

  /** Sends SIGTERM once. Does not wait for the process to go away. */
  kill(): void {
    if (this.killRequested || !this.running) {
      return;
    }
    this.killRequested = true;
    this.child.kill('SIGTERM');
  }

  /** Kills the browser, waits for it to exit, then removes the profile directory. Runs once. */
  dispose(graceMs: number = PROCESS_EXIT_GRACE_MS): Promise<void> {
    if (!this.disposal) {
      this.disposal = this.release(graceMs);
    }
    return this.disposal;
  }

  private async release(graceMs: number): Promise<void> {
    try {
      if (this.running) {
        this.kill();
        if (!(await this.waitForExit(graceMs))) {
          this.logger(`Browser did not exit within ${graceMs}ms; sending SIGKILL`);
          this.child.kill('SIGKILL');
          await this.waitForExit(graceMs);
        }
      }
    } finally {
      await rm(this.profileDir, { recursive: true, force: true, maxRetries: 3, retryDelay: 100 });
    }
  }

  private async waitForExit(timeoutMs: number): Promise<boolean> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<false>((resolve) => {
      timer = setTimeout(() => resolve(false), timeoutMs);
    });
    try {
      return await Promise.race([this.exited.then(() => true as const), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}

function drainLines(stream: Readable | null, onLine: (line: string) => void): void {
  if (!stream) {
    return;
  }
  const lines = readline.createInterface({ input: stream, crlfDelay: Number.POSITIVE_INFINITY });
  lines.on('line', onLine);
}
