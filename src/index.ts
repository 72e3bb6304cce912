export { runWebTests, TestRun } from './runner/testRun.js';
export type {
  BrowserProcessHandle,
  ConsoleSource,
  TestRunDeps,
  TestRunResult,
  TestRunState,
} from './runner/testRun.js';
export { resolveRunConfig, DEFAULT_RUN_CONFIG } from './runner/config.js';
export type { ResolvedRunConfig, WebTestRunOptions } from './runner/config.js';
export { interpretConsoleLine } from './runner/verdict.js';
export type { TestVerdict } from './runner/verdict.js';
export { openInBrowser, targetToUrl } from './runner/openInBrowser.js';
export type { OpenInBrowserOptions } from './runner/openInBrowser.js';
export { BROWSER_VARIANTS, createInstallationResolver, isBrowserVariant } from './browser/installations.js';
export type { InstallationResolver, InstallationResolverOptions } from './browser/installations.js';
export { BrowserProcess, buildLaunchArgs, launchBrowser } from './browser/browserProcess.js';
export type { LaunchBrowserOptions } from './browser/browserProcess.js';
export { DebuggingSession, connectToTab, findTab, listTabs, matchesHarnessTab } from './browser/devtools.js';
export { Watchdog } from './browser/watchdog.js';
export { startStaticServer } from './server/staticServer.js';
export type { StaticServer, StaticServerOptions } from './server/staticServer.js';
export type {
  BrowserExit,
  BrowserInstallation,
  BrowserVariant,
  ConsoleEvent,
  DevtoolsTab,
  HarnessLogger,
} from './browser/types.js';
export * from './errors.js';
