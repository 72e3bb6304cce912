import { launchBrowser, type BrowserProcess, type LaunchBrowserOptions } from '../browser/browserProcess.js';
import { DEFAULT_DEBUG_HOST } from '../browser/constants.js';
import {
  connectToTab,
  findTab,
  matchesHarnessTab,
  type DebuggingSession,
  type FindTabOptions,
} from '../browser/devtools.js';
import { createInstallationResolver, type InstallationResolver } from '../browser/installations.js';
import {
  noopLogger,
  type BrowserInstallation,
  type BrowserOutputStream,
  type DevtoolsTab,
  type HarnessLogger,
  type TabPredicate,
} from '../browser/types.js';
import { Watchdog } from '../browser/watchdog.js';
import { formatElapsed, pickDebugPort } from '../browser/utils.js';
import { BrowserExitedError, BrowserNotFoundError, ConnectionError, describeError, toHarnessError } from '../errors.js';
import { startStaticServer, type StaticServer, type StaticServerOptions } from '../server/staticServer.js';
import { resolveRunConfig, type ResolvedRunConfig, type WebTestRunOptions } from './config.js';
import { interpretConsoleLine, VERDICT_MESSAGES, type TestVerdict } from './verdict.js';

export type TestRunState =
  | 'init'
  | 'serving'
  | 'launching'
  | 'tab-found'
  | 'connected'
  | 'running'
  | 'passed'
  | 'failed'
  | 'timed-out'
  | 'errored'
  | 'torn-down';

/** What the run needs from a launched browser. */
export type BrowserProcessHandle = Pick<BrowserProcess, 'pid' | 'running' | 'exited' | 'dispose'>;

/** What the run needs from a DevTools session. */
export type ConsoleSource = Pick<DebuggingSession, 'tab' | 'onConsole' | 'onClose' | 'close'>;

export interface TestRunDeps {
  resolver?: InstallationResolver;
  startServer?: (options: StaticServerOptions) => Promise<StaticServer>;
  launch?: (options: LaunchBrowserOptions) => Promise<BrowserProcessHandle>;
  findTab?: (host: string, port: number, predicate: TabPredicate, options: FindTabOptions) => Promise<DevtoolsTab>;
  connect?: (tab: DevtoolsTab, logger: HarnessLogger) => Promise<ConsoleSource>;
  random?: () => number;
  now?: () => number;
}

export interface TestRunResult {
  verdict: TestVerdict;
  /** Set for every verdict other than `passed`. */
  message?: string;
  url: string;
  debugPort: number;
  browser: BrowserInstallation;
  consoleLines: number;
  tookMs: number;
}

/**
 * One harness run: serve the directory, open the harness page in a fresh browser profile,
 * then watch the page's console for the finish marker. Single use.
 */
export class TestRun {
  private currentState: TestRunState = 'init';
  private readonly history: TestRunState[] = ['init'];
  private server: StaticServer | null = null;
  private browser: BrowserProcessHandle | null = null;
  private session: ConsoleSource | null = null;
  private watchdog: Watchdog | null = null;
  private detachConsole: (() => void) | null = null;
  private detachClose: (() => void) | null = null;
  private teardownPromise: Promise<void> | null = null;
  private started = false;
  private consoleLines = 0;

  constructor(
    readonly config: ResolvedRunConfig,
    private readonly deps: TestRunDeps = {},
    private readonly logger: HarnessLogger = noopLogger,
  ) {}

  get state(): TestRunState {
    return this.currentState;
  }

  /** Every state the run has passed through, in order. */
  get states(): readonly TestRunState[] {
    return this.history;
  }

  async execute(): Promise<TestRunResult> {
    if (this.started) {
      throw new Error('A test run can only be executed once.');
    }
    this.started = true;
    const now = this.deps.now ?? Date.now;
    const startedAt = now();
    try {
      // Nothing is started until a browser is found.
      const installation = this.resolveInstallation();

      this.transition('serving');
      const startServer = this.deps.startServer ?? startStaticServer;
      const server = await startServer({ root: this.config.directory, port: 0, logger: this.logger });
      this.server = server;
      const url = `${server.urlBase}/${this.config.htmlFile}`;

      this.transition('launching');
      const debugPort = this.config.debugPort ?? pickDebugPort(this.deps.random);
      const launch = this.deps.launch ?? launchBrowser;
      this.logger(`Opening ${url} in ${installation.variant} (${installation.executablePath})`);
      this.browser = await launch({
        installation,
        url,
        debugPort,
        extraArgs: this.config.browserArgs,
        env: this.config.browserEnv,
        verbose: this.config.verbose,
        onOutput: this.outputForwarder(),
        logger: this.logger,
      });

      const locate = this.deps.findTab ?? findTab;
      const tab = await locate(DEFAULT_DEBUG_HOST, debugPort, matchesHarnessTab(url, this.config.htmlFile), {
        retryForMs: this.config.tabTimeoutMs,
        pollIntervalMs: this.config.tabPollIntervalMs,
        logger: this.logger,
      });
      this.transition('tab-found');

      const connect = this.deps.connect ?? connectToTab;
      this.session = await connect(tab, this.logger);
      this.transition('connected');

      const verdict = await this.awaitVerdict(this.session, this.browser);
      this.transition(verdict);
      const tookMs = now() - startedAt;
      this.logger(`Tests ${verdict} after ${formatElapsed(tookMs)} (${this.consoleLines} console lines)`);
      return {
        verdict,
        message: verdict === 'passed' ? undefined : VERDICT_MESSAGES[verdict],
        url,
        debugPort,
        browser: installation,
        consoleLines: this.consoleLines,
        tookMs,
      };
    } catch (error) {
      this.transition('errored');
      throw toHarnessError(error);
    } finally {
      await this.teardown();
    }
  }

  /** Releases the connection, the browser and the server. Safe to call any number of times. */
  teardown(): Promise<void> {
    if (!this.teardownPromise) {
      this.teardownPromise = this.releaseResources();
    }
    return this.teardownPromise;
  }

  private resolveInstallation(): BrowserInstallation {
    const resolver =
      this.deps.resolver ?? createInstallationResolver({ runtimeDir: this.config.runtimeDir });
    if (this.config.browser) {
      const forced = resolver.resolveVariant(this.config.browser);
      if (!forced || !forced.exists) {
        const location = forced ? ` at ${forced.executablePath}` : '';
        throw new BrowserNotFoundError(`Unable to locate the ${this.config.browser} browser${location}`, {
          variant: this.config.browser,
        });
      }
      return forced;
    }
    const best = resolver.resolveBest(this.config.preferEmbedded);
    if (!best) {
      throw new BrowserNotFoundError();
    }
    return best;
  }

  private awaitVerdict(session: ConsoleSource, browser: BrowserProcessHandle): Promise<TestVerdict> {
    const emitConsole = this.logger.console ?? this.logger;
    return new Promise<TestVerdict>((resolve, reject) => {
      let settled = false;
      const settle = (outcome: () => void) => {
        if (settled) {
          return;
        }
        settled = true;
        // No console line is processed after the verdict.
        this.releaseListeners();
        outcome();
      };

      this.transition('running');
      this.watchdog = new Watchdog(this.config.idleTimeoutMs, () => settle(() => resolve('timed-out')));
      this.watchdog.arm();
      // The session may replay held lines, and settle the run, before onConsole returns.
      const detachConsole = session.onConsole((event) => {
        if (settled) {
          return;
        }
        this.watchdog?.reset();
        this.consoleLines += 1;
        try {
          emitConsole(event.text);
        } catch (error) {
          settle(() => reject(toHarnessError(error)));
          return;
        }
        const verdict = interpretConsoleLine(event.text);
        if (verdict) {
          settle(() => resolve(verdict));
        }
      });
      if (settled) {
        detachConsole();
        return;
      }
      this.detachConsole = detachConsole;
      this.detachClose = session.onClose(() =>
        settle(() => reject(new ConnectionError('DevTools connection closed before the tests finished'))),
      );
      void browser.exited.then((exit) =>
        settle(() => reject(new BrowserExitedError(exit.code, exit.signal))),
      );
    });
  }

  private releaseListeners(): void {
    this.detachConsole?.();
    this.detachConsole = null;
    this.detachClose?.();
    this.detachClose = null;
    this.watchdog?.cancel();
  }

  private async releaseResources(): Promise<void> {
    this.releaseListeners();
    const releases: Array<[string, () => Promise<void>]> = [];
    const { session, browser, server } = this;
    if (session) {
      releases.push(['DevTools connection', () => session.close()]);
    }
    if (browser) {
      releases.push(['browser process', () => browser.dispose()]);
    }
    if (server) {
      releases.push(['static server', () => server.stop()]);
    }
    const results = await Promise.allSettled(releases.map(([, release]) => Promise.resolve().then(release)));
    results.forEach((result, index) => {
      if (result.status === 'rejected' && this.logger.verbose) {
        this.logger(`Failed to release ${releases[index]?.[0] ?? 'resource'}: ${describeError(result.reason)}`);
      }
    });
    this.transition('torn-down');
  }

  private outputForwarder(): ((line: string, stream: BrowserOutputStream) => void) | undefined {
    if (this.logger.browserOutput) {
      return this.logger.browserOutput;
    }
    if (this.logger.verbose) {
      return (line, stream) => this.logger(`[browser:${stream}] ${line}`);
    }
    return undefined;
  }

  private transition(next: TestRunState): void {
    if (this.logger.verbose) {
      this.logger(`[run] ${this.currentState} -> ${next}`);
    }
    this.currentState = next;
    this.history.push(next);
  }
}

/** Runs the browser tests in `options.directory` and reports how they finished. */
export async function runWebTests(options: WebTestRunOptions = {}, deps: TestRunDeps = {}): Promise<TestRunResult> {
  const run = new TestRun(resolveRunConfig(options), deps, options.log ?? noopLogger);
  return run.execute();
}
