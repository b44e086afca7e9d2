/**
 * Logger implementation for CLI
 */

import chalk from 'chalk';
import type { Logger } from '@structmerge/core';

export interface LoggerOptions {
  verbose?: boolean;
  /** Custom output function — routes all log output through this instead of console.error. */
  output?: (msg: string) => void;
}

/**
 * Create a logger instance. Log lines go to stderr so that merged output
 * written to stdout stays clean.
 */
export function createLogger(opts: LoggerOptions = {}): Logger {
  const { verbose = false, output } = opts;
  const write = output ?? ((msg: string) => console.error(msg));

  return {
    debug(msg: string, data?: Record<string, unknown>) {
      if (verbose) {
        const dataStr = data ? ` ${JSON.stringify(data)}` : '';
        write(chalk.gray(`[debug] ${msg}${dataStr}`));
      }
    },

    info(msg: string, data?: Record<string, unknown>) {
      const dataStr = data && verbose ? ` ${JSON.stringify(data)}` : '';
      write(chalk.blue(`[info] ${msg}${dataStr}`));
    },

    warn(msg: string, data?: Record<string, unknown>) {
      const dataStr = data ? ` ${JSON.stringify(data)}` : '';
      write(chalk.yellow(`[warn] ${msg}${dataStr}`));
    },

    error(msg: string, data?: Record<string, unknown>) {
      const dataStr = data ? ` ${JSON.stringify(data)}` : '';
      write(chalk.red(`[error] ${msg}${dataStr}`));
    },
  };
}

/**
 * Silent logger (for tests or JSON mode)
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
