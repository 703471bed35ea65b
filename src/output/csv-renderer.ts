/**
 * Renders classified investors as CSV for spreadsheet import.
 *
 * Column order is fixed. Output depends only on the investors passed in
 * (no timestamps), so the same records always render to the same bytes.
 */

import type { ClassifiedInvestor } from '../core/types.js';
import { csvEscape } from './format-utils.js';

export const CSV_COLUMNS = ['entity_name', 'category', 'aum', 'filing_type', 'filing_date'] as const;
export const WIDE_CSV_COLUMNS = ['cik', 'state', 'sic_description', 'source'] as const;

export interface CsvOptions {
  /** Append cik, state, sic_description and source columns */
  wide?: boolean;
}

function formatAum(aum: number | null): string {
  return aum === null ? '' : Math.round(aum).toString();
}

export function renderInvestorCsv(investors: readonly ClassifiedInvestor[], options: CsvOptions = {}): string {
  const header: string[] = [...CSV_COLUMNS];
  if (options.wide) header.push(...WIDE_CSV_COLUMNS);

  const lines = [header.join(',')];

  for (const inv of investors) {
    const filing = inv.source_filing;
    const row = [
      inv.entity_name,
      inv.category,
      formatAum(inv.aum),
      filing.filing_type,
      filing.filing_date,
    ];

    if (options.wide) {
      row.push(
        filing.raw_fields.cik ?? '',
        filing.raw_fields.state ?? '',
        filing.raw_fields.sic_description ?? '',
        filing.source,
      );
    }

    lines.push(row.map(csvEscape).join(','));
  }

  return lines.join('\n') + '\n';
}
