/**
 * Status and debug lines on stderr, so stdout only carries payloads
 */

import chalk from 'chalk';

export interface Logger {
  debug(message: string): void;
  warn(message: string): void;
}

export interface LoggerOptions {
  verbose?: boolean;
  write?: (line: string) => void;
}

export function createLogger({ verbose = false, write = (line) => console.error(line) }: LoggerOptions = {}): Logger {
  return {
    debug(message) {
      if (verbose) write(chalk.dim(`debug: ${message}`));
    },
    warn(message) {
      write(chalk.yellow('Warning:') + ' ' + message);
    },
  };
}
