import chalk from 'chalk';

const PREFIX = '[agent-precommit]';

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  debug(message: string): void;
}

export interface LoggerOptions {
  debug?: boolean;
  prefix?: string;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const prefix = options.prefix ?? PREFIX;
  const line = (message: string) => (message ? `${prefix} ${message}` : prefix);

  return {
    info(message) {
      console.log(line(message));
    },
    warn(message) {
      console.error(chalk.yellow(line(message)));
    },
    error(message) {
      console.error(chalk.red(line(message)));
    },
    debug(message) {
      if (options.debug) {
        console.error(chalk.gray(line(message)));
      }
    },
  };
}

/** Logger that discards everything; the default for library callers. */
export const silentLogger: Logger = {
  info() {},
  warn() {},
  error() {},
  debug() {},
};
