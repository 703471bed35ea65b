import { InvalidArgumentError } from 'commander';

/**
 * Option parsers and cross-option checks for the CLI.
 */

export function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return n;
}

export function parseAmount(value: string): number {
  const n = Number(value.replace(/[,$_]/g, ''));
  if (!Number.isFinite(n) || n < 0) {
    throw new InvalidArgumentError('Must be a non-negative dollar amount.');
  }
  return n;
}

/** Returns an error message when the flags would write two documents to stdout */
export function checkOutputOptions(options: { output: string; json?: boolean }): string | null {
  if (options.output === '-' && options.json) {
    return '--json cannot be combined with --output - (both write to stdout). Write the CSV to a file instead.';
  }
  return null;
}
