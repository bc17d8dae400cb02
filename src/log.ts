/**
 * Console logger threaded through every pipeline stage.
 *
 * `info` is detail only shown with --verbose, `step` is a progress headline
 * that is always shown, `warn` and `error` go to stderr.
 */

import chalk from "chalk";

export interface Logger {
  info(message: string): void;
  step(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LoggerOptions {
  verbose?: boolean;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const verbose = options.verbose ?? false;
  return {
    info(message) {
      if (verbose) console.log(chalk.dim(message));
    },
    step(message) {
      console.log(message);
    },
    warn(message) {
      console.error(chalk.yellow(message));
    },
    error(message) {
      console.error(chalk.red(message));
    },
  };
}

export const silentLogger: Logger = {
  info() {},
  step() {},
  warn() {},
  error() {},
};
