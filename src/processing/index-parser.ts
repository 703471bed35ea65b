/**
 * Turns EDGAR index responses into document references.
 *
 * - 13F: the "current filings" Atom feed. Each entry names the manager,
 *   its CIK and the accession number; the parsed document is the filing's
 *   primary_doc.xml cover page.
 * - ADV: the company tickers registry, filtered to names that look like
 *   investment firms; the parsed document is the entity's submissions JSON.
 */

import { z } from 'zod';
import { ParseError } from '../core/errors.js';
import type { DocumentRef } from '../core/types.js';
import { extractBlocks, extractTagValue } from './xml-utils.js';

export const ARCHIVES_BASE_URL = 'https://www.sec.gov/Archives/edgar/data';
export const SUBMISSIONS_BASE_URL = 'https://data.sec.gov/submissions';

/** Name fragments that mark a registry entry as a likely investment firm */
export const INVESTMENT_KEYWORDS = [
  'capital', 'venture', 'partners', 'investment', 'fund',
  'equity', 'management', 'advisors', 'advisory', 'holdings',
  'asset', 'wealth', 'family office', 'trust',
];

export function stripLeadingZeros(cik: string): string {
  return cik.replace(/^0+/, '') || '0';
}

export function submissionsUrl(cik: string, baseUrl: string = SUBMISSIONS_BASE_URL): string {
  return `${baseUrl}/CIK${stripLeadingZeros(cik).padStart(10, '0')}.json`;
}

export function primaryDocUrl(cik: string, accessionNumber: string, baseUrl: string = ARCHIVES_BASE_URL): string {
  return `${baseUrl}/${stripLeadingZeros(cik)}/${accessionNumber.replace(/-/g, '')}/primary_doc.xml`;
}

/** "13F-HR - Acme Capital LLC (0001234567) (Filer)" -> "Acme Capital LLC" */
export function cleanFeedTitle(title: string): string {
  return title
    .replace(/^[\w/-]+\s+-\s+/, '')
    .replace(/\s*\((?:Filer|Subject|Reporting|Filed by)\)\s*$/i, '')
    .replace(/\s*\(\d{10}\)\s*$/, '')
    .replace(/\s*\(13F-HR.*?\)\s*$/, '')
    .replace(/\s*13F-HR.*$/, '')
    .trim();
}

/**
 * Parse the EDGAR getcurrent Atom feed into 13F document refs.
 * Entries without a name, CIK or accession number are dropped.
 */
export function parseCurrentFilingsFeed(
  xml: string,
  source: string,
  archivesBaseUrl: string = ARCHIVES_BASE_URL
): DocumentRef[] {
  if (!/<feed[\s>]/i.test(xml)) {
    throw new ParseError('Response is not an Atom feed', source);
  }

  const refs: DocumentRef[] = [];

  for (const entry of extractBlocks(xml, 'entry')) {
    const title = extractTagValue(entry, 'title');
    if (!title) continue;

    const name = cleanFeedTitle(title);
    const cik = entry.match(/\/edgar\/data\/(\d+)\//)?.[1]
      ?? title.match(/\((\d{10})\)/)?.[1]
      ?? entry.match(/CIK=(\d+)/)?.[1];
    const accession = entry.match(/accession-number=(\d{10}-\d{2}-\d{6})/)?.[1]
      ?? entry.match(/(\d{10}-\d{2}-\d{6})-index\.htm/)?.[1];

    if (!name || !cik || !accession) continue;

    const updated = extractTagValue(entry, 'updated');
    const filingDate = updated && /^\d{4}-\d{2}-\d{2}/.test(updated) ? updated.slice(0, 10) : null;

    refs.push({
      cik: stripLeadingZeros(cik),
      entity_name: name,
      filing_type: '13F',
      url: primaryDocUrl(cik, accession, archivesBaseUrl),
      accession_number: accession,
      filing_date: filingDate,
    });
  }

  return refs;
}

const tickerRegistrySchema = z.record(
  z.object({
    cik_str: z.number().int().nonnegative(),
    ticker: z.string(),
    title: z.string(),
  })
);

function looksLikeInvestmentFirm(name: string): boolean {
  const lower = name.toLowerCase();
  return INVESTMENT_KEYWORDS.some(kw => lower.includes(kw));
}

/**
 * Pick likely investment advisers out of the company tickers registry.
 * Companies listed under several tickers appear once.
 */
export function selectAdviserCandidates(
  body: string,
  source: string,
  limit: number,
  submissionsBaseUrl: string = SUBMISSIONS_BASE_URL
): DocumentRef[] {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch {
    throw new ParseError('Company tickers registry is not valid JSON', source);
  }

  const parsed = tickerRegistrySchema.safeParse(json);
  if (!parsed.success) {
    throw new ParseError(`Unexpected company tickers format: ${parsed.error.issues[0]?.message ?? 'invalid'}`, source);
  }

  const refs: DocumentRef[] = [];
  const seen = new Set<string>();

  for (const entry of Object.values(parsed.data)) {
    if (refs.length >= limit) break;

    const cik = String(entry.cik_str);
    if (seen.has(cik) || !looksLikeInvestmentFirm(entry.title)) continue;
    seen.add(cik);

    refs.push({
      cik,
      entity_name: entry.title.trim(),
      filing_type: 'ADV',
      url: submissionsUrl(cik, submissionsBaseUrl),
      accession_number: null,
      filing_date: null,
    });
  }

  return refs;
}
