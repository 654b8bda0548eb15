import chalk from 'chalk';
import type { Logger } from '@studyrag/core';

export interface ConsoleLoggerOptions {
  verbose?: boolean;
}

/**
 * Core logger for terminal use. Everything goes to stderr so `--json`
 * output on stdout stays parseable.
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  return {
    debug: (message) => {
      if (options.verbose) {
        // eslint-disable-next-line no-console
        console.error(chalk.dim(message));
      }
    },
    info: (message) => {
      if (options.verbose) {
        // eslint-disable-next-line no-console
        console.error(chalk.blue(message));
      }
    },
    warn: (message) => {
      // eslint-disable-next-line no-console
      console.error(chalk.yellow(`warning: ${message}`));
    },
    error: (message) => {
      // eslint-disable-next-line no-console
      console.error(chalk.red(message));
    },
  };
}
