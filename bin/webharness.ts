#!/usr/bin/env node
import 'dotenv/config';
import { once } from 'node:events';
import chalk from 'chalk';
import { Command } from 'commander';
import { createInstallationResolver } from '../src/browser/installations.js';
import { applyHelpStyling } from '../src/cli/help.js';
import { createCliLogger } from '../src/cli/logger.js';
import {
  collectBrowserArgs,
  parseBrowserVariantOption,
  parseDurationOption,
  parsePortOption,
} from '../src/cli/options.js';
import { EXIT_CODES, exitCodeFor, formatInstallations, formatRunError, formatRunSummary } from '../src/cli/report.js';
import { resolveRunOptionsFromConfig, type RunCommandOptions } from '../src/cli/runOptions.js';
import { loadUserConfig } from '../src/config.js';
import { openInBrowser } from '../src/runner/openInBrowser.js';
import { runWebTests } from '../src/runner/testRun.js';
import { getCliVersion } from '../src/version.js';

const VERSION = getCliVersion();
const isTty = Boolean(process.stdout.isTTY);

const program = new Command();
applyHelpStyling(program, VERSION, isTty);

program
  .name('webharness')
  .description('Serve a directory of browser tests, run them in Chrome and report the verdict from the console.')
  .version(VERSION);

program
  .command('run')
  .description('Run the harness page in a fresh browser profile.')
  .argument('[directory]', 'Directory to serve (default: test).')
  .option('--html-file <file>', 'Harness page inside the directory (default: index.html).')
  .option('--browser <variant>', 'Use this browser variant only: stable, dev, chromium, embedded or headless-shell.', parseBrowserVariantOption)
  .option('--prefer-embedded', 'Try the runtime-bundled Chromium before installed browsers.')
  .option('--no-prefer-embedded', 'Try installed browsers before the runtime-bundled Chromium.')
  .option('--runtime-dir <dir>', 'Runtime install whose ../chromium holds an embedded browser.')
  .option('--browser-arg <arg>', 'Extra browser switch (repeatable).', collectBrowserArgs)
  .option('--timeout <duration>', 'Idle time without console output before giving up (default: 60s).', parseDurationOption)
  .option('--tab-timeout <duration>', 'How long to wait for the harness tab to appear (default: 5s).', parseDurationOption)
  .option('--debug-port <port>', 'Remote debugging port (default: random in 33000-42999).', parsePortOption)
  .option('-v, --verbose', 'Log state changes and browser output.')
  .action(async function (this: Command, directory: string | undefined) {
    const cli: RunCommandOptions = this.opts();
    const logger = createCliLogger({ verbose: cli.verbose });
    const { config, error } = await loadUserConfig();
    if (error) {
      console.warn(chalk.yellow(error));
    }
    const options = resolveRunOptionsFromConfig({
      directory,
      cli,
      userConfig: config,
      getSource: (key) => this.getOptionValueSource(key),
    });
    try {
      const result = await runWebTests({ ...options, log: logger });
      console.log(formatRunSummary(result));
      process.exitCode = exitCodeFor(result.verdict);
    } catch (runError) {
      console.error(formatRunError(runError));
      process.exitCode = EXIT_CODES.error;
    }
  });

program
  .command('browsers')
  .description('List every browser variant and where it was looked for.')
  .option('--runtime-dir <dir>', 'Runtime install whose ../chromium holds an embedded browser.')
  .action(async function (this: Command) {
    const opts: { runtimeDir?: string } = this.opts();
    const { config } = await loadUserConfig();
    const resolver = createInstallationResolver({ runtimeDir: opts.runtimeDir ?? config.browser?.runtimeDir });
    console.log(formatInstallations(resolver.probeAll()));
  });

program
  .command('open')
  .description('Open a file or URL in a fresh browser profile and wait until the browser closes.')
  .argument('<target>', 'File path or URL.')
  .option('--runtime-dir <dir>', 'Runtime install whose ../chromium holds an embedded browser.')
  .option('--browser-arg <arg>', 'Extra browser switch (repeatable).', collectBrowserArgs)
  .option('-v, --verbose', 'Show browser output.')
  .action(async function (this: Command, target: string) {
    const opts: { runtimeDir?: string; browserArg?: string[]; verbose?: boolean } = this.opts();
    const { config } = await loadUserConfig();
    try {
      const exit = await openInBrowser(target, {
        preferEmbedded: config.browser?.preferEmbedded,
        runtimeDir: opts.runtimeDir ?? config.browser?.runtimeDir,
        browserArgs: [...(config.browser?.args ?? []), ...(opts.browserArg ?? [])],
        log: createCliLogger({ verbose: opts.verbose }),
      });
      process.exitCode = exit.code ?? 0;
    } catch (openError) {
      console.error(formatRunError(openError));
      process.exitCode = EXIT_CODES.error;
    }
  });

async function main(): Promise<void> {
  const parsePromise = program.parseAsync(process.argv);
  const sigintPromise = once(process, 'SIGINT').then(() => 'sigint' as const);
  const result = await Promise.race([parsePromise.then(() => 'parsed' as const), sigintPromise]);
  if (result === 'sigint') {
    console.log(chalk.yellow('\nCancelled.'));
    process.exitCode = 130;
  }
}

void main().catch((error: unknown) => {
  console.error(chalk.red('✖'), error instanceof Error ? error.message : error);
  process.exitCode = EXIT_CODES.error;
});
