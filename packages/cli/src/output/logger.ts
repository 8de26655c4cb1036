/**
 * CLI Logger - chalk-coloured diagnostics on stderr
 */

import chalk from 'chalk';

import type { Logger } from 'docstringer-core';

export const LOG_PREFIX = 'docstringer:';

export interface CliLoggerOptions {
  /** Print debug and info lines */
  verbose: boolean;
  /** Sink for one line of output */
  write: (line: string) => void;
}

export function createCliLogger(options: CliLoggerOptions): Logger {
  const { verbose, write } = options;
  return {
    debug(message) {
      if (verbose) {write(chalk.gray(`${LOG_PREFIX} ${message}`));}
    },
    info(message) {
      if (verbose) {write(`${LOG_PREFIX} ${message}`);}
    },
    warn(message) {
      write(chalk.yellow(`${LOG_PREFIX} ${message}`));
    },
  };
}

/**
 * `docstringer: <message>` in red, for fatal errors
 */
export function formatFatal(message: string): string {
  return chalk.red(`${LOG_PREFIX} ${message}`);
}
