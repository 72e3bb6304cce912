import chalk from 'chalk';
import type { BrowserOutputStream, HarnessLogger } from '../browser/types.js';

export interface CliLoggerOptions {
  verbose?: boolean;
  /** Status and browser output sink. */
  writeErr?: (line: string) => void;
  /** Harness console lines go here verbatim. */
  writeOut?: (line: string) => void;
}

export function createCliLogger({
  verbose = false,
  writeErr = (line) => console.error(line),
  writeOut = (line) => console.log(line),
}: CliLoggerOptions = {}): HarnessLogger {
  const logger: HarnessLogger = (message: string) => {
    writeErr(chalk.dim(message));
  };
  logger.verbose = verbose;
  logger.console = (line: string) => writeOut(line);
  if (verbose) {
    logger.browserOutput = (line: string, stream: BrowserOutputStream) => {
      writeErr(chalk.gray(`[browser:${stream}] ${line}`));
    };
  }
  return logger;
}
