import CDP from 'chrome-remote-interface';
import type { Protocol } from 'devtools-protocol';
import { ConnectionError, ConnectionRefusedError, TabNotFoundError } from '../errors.js';
import { TAB_POLL_INTERVAL_MS } from './constants.js';
import type { ChromeClient, ConsoleEvent, DevtoolsTab, HarnessLogger, TabPredicate } from './types.js';
import { delay } from './utils.js';

export type ListTargets = (host: string, port: number) => Promise<CDP.Target[]>;

/** The subset of a DevTools connection the session needs. */
export interface DevtoolsConnection {
  enableConsole(): Promise<void>;
  onConsoleMessage(listener: (message: { text: string; level: string }) => void): () => void;
  onDisconnect(listener: () => void): void;
  close(): Promise<void>;
}

export interface DevtoolsDeps {
  listTargets?: ListTargets;
  attach?: (tab: DevtoolsTab) => Promise<DevtoolsConnection>;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export interface FindTabOptions {
  retryForMs: number;
  pollIntervalMs?: number;
  logger?: HarnessLogger;
}

const defaultListTargets: ListTargets = (host, port) => CDP.List({ host, port });

export async function listTabs(host: string, port: number, deps: DevtoolsDeps = {}): Promise<DevtoolsTab[]> {
  const listTargets = deps.listTargets ?? defaultListTargets;
  let targets: CDP.Target[];
  try {
    targets = await listTargets(host, port);
  } catch (error) {
    if (isConnectionRefused(error)) {
      throw new ConnectionRefusedError(host, port, error);
    }
    throw error;
  }
  return targets.map((target) => ({
    id: target.id,
    url: target.url,
    type: target.type,
    title: target.title,
    webSocketDebuggerUrl: target.webSocketDebuggerUrl,
  }));
}

/** Exact URL match, or the tab URL ends with the served harness file name. */
export function matchesHarnessTab(url: string, htmlFile: string): TabPredicate {
  return (tab) => tab.url === url || tab.url.endsWith(htmlFile);
}

export async function findTab(
  host: string,
  port: number,
  predicate: TabPredicate,
  options: FindTabOptions,
  deps: DevtoolsDeps = {},
): Promise<DevtoolsTab> {
  const now = deps.now ?? Date.now;
  const sleep = deps.sleep ?? delay;
  const pollIntervalMs = options.pollIntervalMs ?? TAB_POLL_INTERVAL_MS;
  const deadline = now() + options.retryForMs;
  let lastError: unknown;
  let attempts = 0;

  for (;;) {
    attempts += 1;
    try {
      const tabs = await listTabs(host, port, deps);
      const match = tabs.find(predicate);
      if (match) {
        if (options.logger?.verbose) {
          options.logger(`Found tab ${match.id} (${match.url}) after ${attempts} attempt(s)`);
        }
        return match;
      }
      lastError = undefined;
    } catch (error) {
      // Refused connections are expected until the browser opens its DevTools port.
      lastError = error;
    }
    const remaining = deadline - now();
    if (remaining <= 0) {
      throw new TabNotFoundError(host, port, options.retryForMs, lastError);
    }
    await sleep(Math.min(pollIntervalMs, remaining));
  }
}

export async function connectToTab(
  tab: DevtoolsTab,
  logger: HarnessLogger,
  deps: DevtoolsDeps = {},
): Promise<DebuggingSession> {
  const attach = deps.attach ?? attachWithCdp;
  let connection: DevtoolsConnection;
  try {
    connection = await attach(tab);
  } catch (error) {
    throw new ConnectionError(`Unable to connect to tab ${tab.id}: ${describe(error)}`, error);
  }
  const session = new DebuggingSession(tab, connection, deps.now ?? Date.now);
  try {
    await connection.enableConsole();
  } catch (error) {
    await session.close();
    throw new ConnectionError(`Unable to enable console events on tab ${tab.id}: ${describe(error)}`, error);
  }
  logger(`Connected to ${tab.url}`);
  return session;
}

/**
 * Console event source for one tab. Ends when the connection closes; never reconnects.
 *
 * Events that arrive before the first `onConsole` subscriber (including the replay Chrome
 * sends while answering `Runtime.enable`) are held and handed to that subscriber in order.
 */
export class DebuggingSession {
  private readonly consoleListeners = new Set<(event: ConsoleEvent) => void>();
  private backlog: ConsoleEvent[] | null = [];
  private readonly closeListeners = new Set<() => void>();
  private readonly detachConsole: () => void;
  private closed = false;
  private closing: Promise<void> | null = null;

  constructor(
    readonly tab: DevtoolsTab,
    private readonly connection: DevtoolsConnection,
    private readonly now: () => number = Date.now,
  ) {
    this.detachConsole = connection.onConsoleMessage((message) => {
      if (this.closed) {
        return;
      }
      const event: ConsoleEvent = { text: message.text, level: message.level, receivedAt: this.now() };
      if (this.backlog) {
        this.backlog.push(event);
        return;
      }
      for (const listener of [...this.consoleListeners]) {
        listener(event);
      }
    });
    connection.onDisconnect(() => this.markClosed());
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * The first subscriber receives the held events synchronously, before this returns, even
   * when the connection has closed since they arrived.
   */
  onConsole(listener: (event: ConsoleEvent) => void): () => void {
    const held = this.backlog ?? [];
    this.backlog = null;
    if (this.closed) {
      for (const event of held) {
        listener(event);
      }
      return () => {};
    }
    this.consoleListeners.add(listener);
    for (const event of held) {
      if (!this.consoleListeners.has(listener)) {
        break;
      }
      listener(event);
    }
    return () => {
      this.consoleListeners.delete(listener);
    };
  }

  /** Fires once when the connection ends, whichever side closed it. */
  onClose(listener: () => void): () => void {
    if (this.closed) {
      listener();
      return () => {};
    }
    this.closeListeners.add(listener);
    return () => {
      this.closeListeners.delete(listener);
    };
  }

  close(): Promise<void> {
    if (!this.closing) {
      this.closing = this.connection.close().finally(() => this.markClosed());
    }
    return this.closing;
  }

  private markClosed(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.detachConsole();
    this.consoleListeners.clear();
    const listeners = [...this.closeListeners];
    this.closeListeners.clear();
    for (const listener of listeners) {
      listener();
    }
  }
}

export async function attachWithCdp(tab: DevtoolsTab): Promise<DevtoolsConnection> {
  const client = await CDP({ target: tab.webSocketDebuggerUrl });
  return createCdpConnection(client);
}

export function createCdpConnection(client: ChromeClient): DevtoolsConnection {
  return {
    async enableConsole() {
      // Chrome replays earlier console calls before it answers Runtime.enable.
      await client.Runtime.enable();
    },
    onConsoleMessage(listener) {
      let active = true;
      client.on('Runtime.consoleAPICalled', (params: Protocol.Runtime.ConsoleAPICalledEvent) => {
        if (active) {
          listener({ text: formatConsoleArgs(params.args), level: params.type });
        }
      });
      return () => {
        active = false;
      };
    },
    onDisconnect(listener) {
      client.on('disconnect', listener);
    },
    async close() {
      await client.close();
    },
  };
}

export function formatConsoleArgs(args: Protocol.Runtime.RemoteObject[]): string {
  return args.map(formatRemoteObject).join(' ');
}

function formatRemoteObject(arg: Protocol.Runtime.RemoteObject): string {
  if (arg.type === 'undefined') {
    return 'undefined';
  }
  if (arg.unserializableValue !== undefined) {
    return arg.unserializableValue;
  }
  if (arg.value !== undefined && (arg.type === 'string' || arg.type === 'number' || arg.type === 'boolean')) {
    return String(arg.value);
  }
  if (arg.subtype === 'null') {
    return 'null';
  }
  return arg.description ?? arg.className ?? arg.type;
}

function isConnectionRefused(error: unknown): boolean {
  if (error && typeof error === 'object' && 'code' in error && error.code === 'ECONNREFUSED') {
    return true;
  }
  return error instanceof Error && error.message.includes('ECONNREFUSED');
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
