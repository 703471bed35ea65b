import { writeFile } from 'node:fs/promises';
import { IOError, errorMessage } from '../core/errors.js';
import type { ClassifiedInvestor } from '../core/types.js';
import { renderInvestorCsv, type CsvOptions } from './csv-renderer.js';

/**
 * Write investors to a CSV file, replacing any existing file.
 * The parent directory must already exist. There is no partial-write
 * recovery: a failed export is simply run again.
 */
export async function exportInvestors(
  investors: readonly ClassifiedInvestor[],
  destination: string,
  options: CsvOptions = {}
): Promise<{ rows: number; bytes: number }> {
  const csv = renderInvestorCsv(investors, options);

  try {
    await writeFile(destination, csv, 'utf8');
  } catch (err) {
    throw new IOError(`Cannot write CSV to ${destination}: ${errorMessage(err)}`, destination, { cause: err });
  }

  return { rows: investors.length, bytes: Buffer.byteLength(csv, 'utf8') };
}
