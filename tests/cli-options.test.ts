import { describe, it, expect } from 'vitest';
import { InvalidArgumentError } from 'commander';
import { checkOutputOptions, parseAmount, parsePositiveInt } from '../src/cli-options.js';

describe('CLI option parsing', () => {
  it('parsePositiveInt accepts whole numbers above zero', () => {
    expect(parsePositiveInt('25')).toBe(25);
    expect(() => parsePositiveInt('0')).toThrow(InvalidArgumentError);
    expect(() => parsePositiveInt('2.5')).toThrow('Must be a positive integer.');
    expect(() => parsePositiveInt('ten')).toThrow(InvalidArgumentError);
  });

  it('parseAmount strips separators and dollar signs', () => {
    expect(parseAmount('$1,500,000')).toBe(1_500_000);
    expect(parseAmount('2_000')).toBe(2000);
    expect(() => parseAmount('-5')).toThrow('Must be a non-negative dollar amount.');
  });
});

describe('checkOutputOptions', () => {
  it('rejects JSON output when the CSV also goes to stdout', () => {
    expect(checkOutputOptions({ output: '-', json: true })).toBe(
      '--json cannot be combined with --output - (both write to stdout). Write the CSV to a file instead.'
    );
  });

  it('allows every other combination', () => {
    expect(checkOutputOptions({ output: '-' })).toBeNull();
    expect(checkOutputOptions({ output: 'vc_database.csv', json: true })).toBeNull();
    expect(checkOutputOptions({ output: 'vc_database.csv' })).toBeNull();
  });
});
