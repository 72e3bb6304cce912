import type { OptionValues } from 'commander';
import type { BrowserVariant } from '../browser/types.js';
import type { UserConfig } from '../config.js';
import type { WebTestRunOptions } from '../runner/config.js';

/** Flags of `webharness run` as commander hands them over. */
export interface RunCommandOptions extends OptionValues {
  htmlFile?: string;
  browser?: BrowserVariant;
  preferEmbedded?: boolean;
  runtimeDir?: string;
  browserArg?: string[];
  timeout?: number;
  tabTimeout?: number;
  debugPort?: number;
  verbose?: boolean;
}

type RunFlag = 'htmlFile' | 'browser' | 'preferEmbedded' | 'runtimeDir' | 'timeout' | 'tabTimeout' | 'debugPort';

type SourceGetter = (key: RunFlag) => string | undefined;

export interface ResolveRunOptionsInput {
  directory?: string;
  cli: RunCommandOptions;
  userConfig?: UserConfig;
  /** commander's getOptionValueSource; values from 'default' lose to the user config. */
  getSource?: SourceGetter;
}

/** CLI flags win over the user config, which wins over built-in defaults. */
export function resolveRunOptionsFromConfig({
  directory,
  cli,
  userConfig = {},
  getSource = () => undefined,
}: ResolveRunOptionsInput): WebTestRunOptions {
  const browser = userConfig.browser ?? {};
  const run = userConfig.run ?? {};
  const isSet = (key: RunFlag): boolean => {
    const source = getSource(key);
    return cli[key] !== undefined && source !== 'default';
  };

  return {
    directory: directory ?? run.directory,
    htmlFile: isSet('htmlFile') ? cli.htmlFile : run.htmlFile,
    browser: isSet('browser') ? cli.browser : browser.variant,
    preferEmbedded: isSet('preferEmbedded') ? cli.preferEmbedded : browser.preferEmbedded,
    runtimeDir: isSet('runtimeDir') ? cli.runtimeDir : browser.runtimeDir,
    // Configured args first; Chrome keeps the last value of a repeated switch.
    browserArgs: [...(browser.args ?? []), ...(cli.browserArg ?? [])],
    idleTimeoutMs: isSet('timeout') ? cli.timeout : run.idleTimeoutMs,
    tabTimeoutMs: isSet('tabTimeout') ? cli.tabTimeout : run.tabTimeoutMs,
    debugPort: isSet('debugPort') ? cli.debugPort : run.debugPort,
    verbose: cli.verbose ?? false,
  };
}
