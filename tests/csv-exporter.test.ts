import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { exportInvestors } from '../src/output/csv-exporter.js';
import { renderInvestorCsv } from '../src/output/csv-renderer.js';
import { IOError } from '../src/core/errors.js';
import { classify } from '../src/processing/investor-classifier.js';
import { makeRecord } from './fixtures.js';

const investors = [
  classify(makeRecord('Blue Harbor Family Office, LLC', { cik: '3333333', state: 'MA', sic_description: 'Investment Advice' })),
  classify(makeRecord('Northwind Holdings Inc', { cik: '1234567', aum: '350000000.4', state: 'CT' }, '13F')),
  classify(makeRecord('The "Seed" Fund', {})),
];

describe('renderInvestorCsv', () => {
  it('writes the header and one escaped row per investor', () => {
    expect(renderInvestorCsv(investors)).toBe(
      'entity_name,category,aum,filing_type,filing_date\n' +
      '"Blue Harbor Family Office, LLC",FamilyOffice,,ADV,2024-03-28\n' +
      'Northwind Holdings Inc,Other,350000000,13F,2024-03-28\n' +
      '"The ""Seed"" Fund",VC,,ADV,2024-03-28\n'
    );
  });

  it('adds cik, state, SIC description and source in wide mode', () => {
    const csv = renderInvestorCsv(investors.slice(1, 2), { wide: true });

    expect(csv).toBe(
      'entity_name,category,aum,filing_type,filing_date,cik,state,sic_description,source\n' +
      'Northwind Holdings Inc,Other,350000000,13F,2024-03-28,1234567,CT,,https://example.test/Northwind%20Holdings%20Inc\n'
    );
  });

  it('writes only the header for no investors', () => {
    expect(renderInvestorCsv([])).toBe('entity_name,category,aum,filing_type,filing_date\n');
  });
});

describe('exportInvestors', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'csv-export-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('writes the same bytes on every export', async () => {
    const first = join(dir, 'first.csv');
    const second = join(dir, 'second.csv');

    const written = await exportInvestors(investors, first);
    await exportInvestors(investors, second);

    expect(readFileSync(first)).toEqual(readFileSync(second));
    expect(readFileSync(first, 'utf8')).toBe(renderInvestorCsv(investors));
    expect(written.rows).toBe(3);
    expect(written.bytes).toBe(Buffer.byteLength(renderInvestorCsv(investors), 'utf8'));
  });

  it('replaces an existing file', async () => {
    const target = join(dir, 'vc_database.csv');
    writeFileSync(target, 'stale contents that are longer than the new export\n'.repeat(50));

    await exportInvestors(investors.slice(0, 1), target);

    expect(readFileSync(target, 'utf8')).toBe(
      'entity_name,category,aum,filing_type,filing_date\n' +
      '"Blue Harbor Family Office, LLC",FamilyOffice,,ADV,2024-03-28\n'
    );
  });

  it('raises IOError when the destination cannot be written', async () => {
    const target = join(dir, 'missing', 'out.csv');

    const err = await exportInvestors(investors, target).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(IOError);
    expect(err).toMatchObject({ destination: target });
    expect(err instanceof Error && err.message.startsWith(`Cannot write CSV to ${target}: `)).toBe(true);
  });
});
