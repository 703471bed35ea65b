import chalk from 'chalk';

/**
 * Minimal logger used by the pipeline and entry points.
 * Everything goes to stderr so stdout stays clean for CSV/JSON output.
 */

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

export function createConsoleLogger(options: { verbose?: boolean } = {}): Logger {
  return {
    debug: message => {
      if (options.verbose) console.error(chalk.dim(message));
    },
    info: message => console.error(message),
    warn: message => console.error(chalk.yellow(message)),
    error: message => console.error(chalk.red(message)),
  };
}
