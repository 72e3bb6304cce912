import path from 'node:path';
import { pathToFileURL } from 'node:url';
import { describe, expect, test, vi } from 'vitest';
import type { LaunchBrowserOptions } from '../../src/browser/browserProcess.js';
import type { InstallationResolver } from '../../src/browser/installations.js';
import type { BrowserExit, BrowserInstallation } from '../../src/browser/types.js';
import { BrowserNotFoundError } from '../../src/errors.js';
import { openInBrowser, targetToUrl } from '../../src/runner/openInBrowser.js';
import type { BrowserProcessHandle } from '../../src/runner/testRun.js';

const stable: BrowserInstallation = { variant: 'stable', executablePath: '/usr/bin/google-chrome', exists: true };

function resolverReturning(installation: BrowserInstallation | null): InstallationResolver {
  return {
    resolveBest: vi.fn(() => installation),
    resolveVariant: vi.fn(() => installation),
    probeAll: vi.fn(() => []),
  };
}

describe('targetToUrl', () => {
  test('turns existing files into file URLs', () => {
    expect(targetToUrl('coverage/index.html', () => true)).toBe(
      pathToFileURL(path.resolve('coverage/index.html')).href,
    );
  });

  test('passes anything else through', () => {
    expect(targetToUrl('https://example.test/app', () => false)).toBe('https://example.test/app');
  });
});

describe('openInBrowser', () => {
  test('waits for the browser to close and then cleans up', async () => {
    const exit: BrowserExit = { code: 0, signal: null };
    const browser: BrowserProcessHandle = {
      pid: 77,
      running: false,
      exited: Promise.resolve(exit),
      dispose: vi.fn(async () => {}),
    };
    const launch = vi.fn(async (_options: LaunchBrowserOptions) => browser);

    await expect(
      openInBrowser(
        'https://example.test/app',
        { browserArgs: ['--incognito'] },
        { resolver: resolverReturning(stable), launch, isFile: () => false, random: () => 0 },
      ),
    ).resolves.toEqual(exit);
    expect(launch).toHaveBeenCalledWith(
      expect.objectContaining({
        installation: stable,
        url: 'https://example.test/app',
        debugPort: 33_000,
        extraArgs: ['--incognito'],
      }),
    );
    expect(browser.dispose).toHaveBeenCalledTimes(1);
  });

  test('hands browser output and the logger to the launched process', async () => {
    const browser: BrowserProcessHandle = {
      pid: 78,
      running: false,
      exited: Promise.resolve({ code: 0, signal: null }),
      dispose: vi.fn(async () => {}),
    };
    const launch = vi.fn(async (_options: LaunchBrowserOptions) => browser);
    const browserOutput = vi.fn();
    const log = Object.assign(vi.fn(), { verbose: true, browserOutput });

    await openInBrowser('https://example.test/app', { log }, { resolver: resolverReturning(stable), launch, isFile: () => false });

    const options = launch.mock.calls[0]?.[0];
    expect(options?.onOutput).toBe(browserOutput);
    expect(options?.logger).toBe(log);
  });

  test('fails when no browser is installed', async () => {
    const launch = vi.fn();
    await expect(
      openInBrowser('index.html', {}, { resolver: resolverReturning(null), launch }),
    ).rejects.toBeInstanceOf(BrowserNotFoundError);
    expect(launch).not.toHaveBeenCalled();
  });
});
