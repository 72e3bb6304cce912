import type CDP from 'chrome-remote-interface';
import type { Protocol } from 'devtools-protocol';
import { describe, expect, test, vi } from 'vitest';
import {
  connectToTab,
  findTab,
  formatConsoleArgs,
  listTabs,
  matchesHarnessTab,
  type DevtoolsConnection,
} from '../../src/browser/devtools.js';
import type { DevtoolsTab } from '../../src/browser/types.js';
import { ConnectionError, ConnectionRefusedError, TabNotFoundError } from '../../src/errors.js';

const HARNESS_URL = 'http://127.0.0.1:51000/index.html';

function target(id: string, url: string): CDP.Target {
  return {
    id,
    url,
    type: 'page',
    title: id,
    description: '',
    devtoolsFrontendUrl: '',
    webSocketDebuggerUrl: `ws://127.0.0.1:33417/devtools/page/${id}`,
  };
}

function refused(): Error {
  return Object.assign(new Error('connect ECONNREFUSED 127.0.0.1:33417'), { code: 'ECONNREFUSED' });
}

function fakeClock() {
  let now = 0;
  const sleeps: number[] = [];
  return {
    now: () => now,
    sleep: async (ms: number) => {
      sleeps.push(ms);
      now += ms;
    },
    sleeps,
  };
}

const tab: DevtoolsTab = {
  id: 'A1',
  url: HARNESS_URL,
  type: 'page',
  title: 'harness',
  webSocketDebuggerUrl: 'ws://127.0.0.1:33417/devtools/page/A1',
};

function fakeConnection() {
  type ConsoleListener = (message: { text: string; level: string }) => void;
  let consoleListener: ConsoleListener | null = null;
  let disconnectListener: (() => void) | null = null;
  const connection: DevtoolsConnection = {
    enableConsole: vi.fn(async () => {}),
    onConsoleMessage: vi.fn((listener: ConsoleListener) => {
      consoleListener = listener;
      return () => {
        consoleListener = null;
      };
    }),
    onDisconnect: vi.fn((listener: () => void) => {
      disconnectListener = listener;
    }),
    close: vi.fn(async () => {}),
  };
  return {
    connection,
    emit: (text: string) => consoleListener?.({ text, level: 'log' }),
    disconnect: () => disconnectListener?.(),
  };
}

describe('listTabs', () => {
  test('maps a refused connection to ConnectionRefusedError', async () => {
    await expect(
      listTabs('127.0.0.1', 33417, { listTargets: async () => Promise.reject(refused()) }),
    ).rejects.toBeInstanceOf(ConnectionRefusedError);
  });

  test('keeps only the fields the harness uses', async () => {
    const tabs = await listTabs('127.0.0.1', 33417, { listTargets: async () => [target('A1', HARNESS_URL)] });
    expect(tabs).toEqual([tab]);
  });
});

describe('matchesHarnessTab', () => {
  const predicate = matchesHarnessTab(HARNESS_URL, 'index.html');

  test('accepts the exact harness URL', () => {
    expect(predicate(tab)).toBe(true);
  });

  test('accepts any URL ending in the harness file name', () => {
    expect(predicate({ ...tab, url: 'http://localhost:51000/nested/index.html' })).toBe(true);
  });

  test('rejects other pages', () => {
    expect(predicate({ ...tab, url: 'chrome://newtab/' })).toBe(false);
  });
});

describe('findTab', () => {
  test('retries while the endpoint refuses and returns the matching tab', async () => {
    const clock = fakeClock();
    const listTargets = vi
      .fn<(host: string, port: number) => Promise<CDP.Target[]>>()
      .mockRejectedValueOnce(refused())
      .mockRejectedValueOnce(refused())
      .mockResolvedValue([target('B2', 'chrome://newtab/'), target('A1', HARNESS_URL)]);

    const found = await findTab(
      '127.0.0.1',
      33417,
      matchesHarnessTab(HARNESS_URL, 'index.html'),
      { retryForMs: 5000, pollIntervalMs: 250 },
      { listTargets, now: clock.now, sleep: clock.sleep },
    );

    expect(found.id).toBe('A1');
    expect(listTargets).toHaveBeenCalledTimes(3);
    expect(clock.sleeps).toEqual([250, 250]);
  });

  test('gives up after the retry window with the last error', async () => {
    const clock = fakeClock();
    const promise = findTab(
      '127.0.0.1',
      33417,
      () => true,
      { retryForMs: 1000, pollIntervalMs: 250 },
      { listTargets: async () => Promise.reject(refused()), now: clock.now, sleep: clock.sleep },
    );

    await expect(promise).rejects.toBeInstanceOf(TabNotFoundError);
    await expect(promise).rejects.toThrow(
      'No matching tab on 127.0.0.1:33417 after 1000ms (last error: DevTools endpoint 127.0.0.1:33417 refused the connection)',
    );
    expect(clock.sleeps).toEqual([250, 250, 250, 250]);
  });

  test('does not report a stale error when tabs were listed but none matched', async () => {
    const clock = fakeClock();
    const promise = findTab(
      '127.0.0.1',
      33417,
      () => false,
      { retryForMs: 300, pollIntervalMs: 250 },
      { listTargets: async () => [target('B2', 'chrome://newtab/')], now: clock.now, sleep: clock.sleep },
    );

    await expect(promise).rejects.toThrow('No matching tab on 127.0.0.1:33417 after 300ms');
    expect(clock.sleeps).toEqual([250, 50]);
  });
});

describe('connectToTab', () => {
  test('delivers console events until the listener unsubscribes', async () => {
    const fake = fakeConnection();
    const logger = vi.fn();
    const session = await connectToTab(tab, logger, { attach: async () => fake.connection, now: () => 42 });
    const received: string[] = [];
    const unsubscribe = session.onConsole((event) => {
      received.push(`${event.text}@${event.receivedAt}`);
    });

    fake.emit('running');
    unsubscribe();
    fake.emit('tests finished - passed');

    expect(received).toEqual(['running@42']);
    expect(fake.connection.enableConsole).toHaveBeenCalledTimes(1);
    expect(logger).toHaveBeenCalledWith(`Connected to ${HARNESS_URL}`);
  });

  test('notifies close listeners once when the connection drops', async () => {
    const fake = fakeConnection();
    const session = await connectToTab(tab, vi.fn(), { attach: async () => fake.connection });
    const onClose = vi.fn();
    session.onClose(onClose);

    fake.disconnect();
    fake.disconnect();

    expect(onClose).toHaveBeenCalledTimes(1);
    expect(session.isClosed).toBe(true);
    const late = vi.fn();
    session.onClose(late);
    expect(late).toHaveBeenCalledTimes(1);
  });

  test('stops delivering console events after the connection closes', async () => {
    const fake = fakeConnection();
    const session = await connectToTab(tab, vi.fn(), { attach: async () => fake.connection });
    const onConsole = vi.fn();
    session.onConsole(onConsole);

    await Promise.all([session.close(), session.close()]);
    fake.emit('tests finished - passed');

    expect(fake.connection.close).toHaveBeenCalledTimes(1);
    expect(onConsole).not.toHaveBeenCalled();
  });

  test('hands lines replayed while enabling console events to the first subscriber', async () => {
    const fake = fakeConnection();
    vi.mocked(fake.connection.enableConsole).mockImplementationOnce(async () => {
      fake.emit('running 2 tests');
      fake.emit('tests finished - passed');
    });
    const session = await connectToTab(tab, vi.fn(), { attach: async () => fake.connection });

    const first: string[] = [];
    const second: string[] = [];
    session.onConsole((event) => {
      first.push(event.text);
    });
    session.onConsole((event) => {
      second.push(event.text);
    });
    fake.emit('printed later');

    expect(first).toEqual(['running 2 tests', 'tests finished - passed', 'printed later']);
    expect(second).toEqual(['printed later']);
  });

  test('keeps held lines for a subscriber that arrives after the connection closed', async () => {
    const fake = fakeConnection();
    vi.mocked(fake.connection.enableConsole).mockImplementationOnce(async () => {
      fake.emit('tests finished - failed');
    });
    const session = await connectToTab(tab, vi.fn(), { attach: async () => fake.connection });
    fake.disconnect();

    const received: string[] = [];
    session.onConsole((event) => {
      received.push(event.text);
    });

    expect(session.isClosed).toBe(true);
    expect(received).toEqual(['tests finished - failed']);
  });

  test('wraps attach failures in ConnectionError', async () => {
    const promise = connectToTab(tab, vi.fn(), { attach: async () => Promise.reject(new Error('socket hang up')) });
    await expect(promise).rejects.toBeInstanceOf(ConnectionError);
    await expect(promise).rejects.toThrow('Unable to connect to tab A1: socket hang up');
  });

  test('closes the connection when console events cannot be enabled', async () => {
    const fake = fakeConnection();
    vi.mocked(fake.connection.enableConsole).mockRejectedValueOnce(new Error('Target closed'));
    const promise = connectToTab(tab, vi.fn(), { attach: async () => fake.connection });
    await expect(promise).rejects.toThrow('Unable to enable console events on tab A1: Target closed');
    expect(fake.connection.close).toHaveBeenCalledTimes(1);
  });
});

describe('formatConsoleArgs', () => {
  test('joins console arguments the way DevTools prints them', () => {
    const args: Protocol.Runtime.RemoteObject[] = [
      { type: 'string', value: 'tests finished -' },
      { type: 'string', value: 'passed' },
      { type: 'number', value: 3 },
      { type: 'number', unserializableValue: 'NaN', description: 'NaN' },
      { type: 'boolean', value: false },
      { type: 'object', subtype: 'null', value: null },
      { type: 'undefined' },
      { type: 'object', className: 'Object', description: 'Object' },
    ];
    expect(formatConsoleArgs(args)).toBe('tests finished - passed 3 NaN false null undefined Object');
  });
});
