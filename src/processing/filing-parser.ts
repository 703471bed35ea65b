/**
 * Filing parser: one fetched document -> one FilingRecord.
 *
 * - ADV: the adviser's submissions JSON (data.sec.gov/submissions), validated
 *   against a schema of the fields we use.
 * - 13F: the 13F-HR cover page (primary_doc.xml), read with regex extraction
 *   since the cover page has a small, fixed structure.
 *
 * Never throws for bad input: the result is tagged so the pipeline can log
 * and skip a document without aborting the batch.
 */

import { z } from 'zod';
import { ParseError } from '../core/errors.js';
import type { FilingRecord, FilingType } from '../core/types.js';
import { stripLeadingZeros } from './index-parser.js';
import { extractState } from './states.js';
import { extractBlock, extractTagValue } from './xml-utils.js';

export type ParseResult =
  | { ok: true; record: FilingRecord }
  | { ok: false; error: ParseError };

export interface ParseContext {
  /** Source URL recorded on the FilingRecord */
  source?: string;
  /** Filing date from the index, preferred over dates inside the document */
  filingDate?: string | null;
}

export function parseFiling(raw: string, filingType: FilingType, context: ParseContext = {}): ParseResult {
  const source = context.source ?? `${filingType} document`;
  const filingDate = context.filingDate ?? null;

  return filingType === 'ADV'
    ? parseSubmissions(raw, source, filingDate)
    : parseCoverPage(raw, source, filingDate);
}

// ── Dates ──────────────────────────────────────────────────────────────

export function isIsoDate(value: string): boolean {
  const match = value.match(/^(\d{4})-(\d{2})-(\d{2})$/);
  if (!match) return false;
  const [, y, m, d] = match;
  const date = new Date(Date.UTC(Number(y), Number(m) - 1, Number(d)));
  return date.getUTCFullYear() === Number(y)
    && date.getUTCMonth() === Number(m) - 1
    && date.getUTCDate() === Number(d);
}

/** Accepts EDGAR's MM-DD-YYYY (13F cover pages), an ISO date or an ISO timestamp; returns ISO or null */
export function toIsoDate(value: string): string | null {
  const trimmed = value.trim();
  const us = trimmed.match(/^(\d{2})[-/](\d{2})[-/](\d{4})$/);
  const iso = us ? `${us[3]}-${us[1]}-${us[2]}` : trimmed.match(/^(\d{4}-\d{2}-\d{2})(?:T\S*)?$/)?.[1];
  return iso && isIsoDate(iso) ? iso : null;
}

// ── Shared helpers ─────────────────────────────────────────────────────

function fail(message: string, source: string, fields: string[] = []): ParseResult {
  return { ok: false, error: new ParseError(message, source, fields) };
}

function missing(source: string, fields: string[]): ParseResult {
  return fail(`Missing or malformed required fields: ${fields.join(', ')}`, source, fields);
}

/** Drop empty values; raw_fields only holds what the document actually had */
function compactFields(fields: Record<string, string | null | undefined>): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(fields)) {
    const trimmed = value?.trim();
    if (trimmed) out[key] = trimmed;
  }
  return out;
}

interface AddressParts {
  street1?: string | null;
  street2?: string | null;
  city?: string | null;
  state?: string | null;
  zip?: string | null;
}

function formatAddress(parts: AddressParts): string {
  const street = [parts.street1, parts.street2].map(s => s?.trim()).filter(Boolean).join(' ');
  const stateZip = [parts.state, parts.zip].map(s => s?.trim()).filter(Boolean).join(' ');
  return [street, parts.city?.trim(), stateZip].filter(Boolean).join(', ');
}

function buildRecord(
  entityName: string,
  filingType: FilingType,
  filingDate: string,
  rawFields: Record<string, string>,
  source: string
): FilingRecord {
  return Object.freeze({
    entity_name: entityName,
    filing_type: filingType,
    filing_date: filingDate,
    raw_fields: Object.freeze(rawFields),
    source,
  });
}

function resolveFilingDate(preferred: string | null, fallback: string | null | undefined): string | null {
  if (preferred) return toIsoDate(preferred);
  return fallback ? toIsoDate(fallback) : null;
}

// ── ADV: submissions JSON ──────────────────────────────────────────────

const addressSchema = z.object({
  street1: z.string().nullish(),
  street2: z.string().nullish(),
  city: z.string().nullish(),
  stateOrCountry: z.string().nullish(),
  zipCode: z.string().nullish(),
});

const submissionsSchema = z.object({
  cik: z.union([z.string().min(1), z.number().int().nonnegative()]).transform(String),
  name: z.string().trim().min(1),
  entityType: z.string().nullish(),
  sic: z.string().nullish(),
  sicDescription: z.string().nullish(),
  phone: z.string().nullish(),
  stateOfIncorporation: z.string().nullish(),
  tickers: z.array(z.string()).nullish(),
  addresses: z.object({
    business: addressSchema.nullish(),
    mailing: addressSchema.nullish(),
  }).nullish(),
  filings: z.object({
    recent: z.object({
      filingDate: z.array(z.string()),
    }),
  }),
});

/**
 * The submissions JSON lists the entity's filings of every form, so without
 * an index date `filing_date` is its most recent filing of any kind, not
 * necessarily an ADV. The 'ADV' label names the source, not the form.
 */
function parseSubmissions(raw: string, source: string, contextDate: string | null): ParseResult {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return fail('Document is not valid JSON', source);
  }

  const parsed = submissionsSchema.safeParse(json);
  if (!parsed.success) {
    const fields = Array.from(new Set(parsed.error.issues.map(issue => issue.path.join('.') || '(root)')));
    return missing(source, fields);
  }

  const doc = parsed.data;
  const filingDate = resolveFilingDate(contextDate, doc.filings.recent.filingDate[0]);
  if (!filingDate) return missing(source, ['filings.recent.filingDate']);

  const business = doc.addresses?.business ?? doc.addresses?.mailing ?? null;
  const address = business
    ? formatAddress({
        street1: business.street1,
        street2: business.street2,
        city: business.city,
        state: business.stateOrCountry,
        zip: business.zipCode,
      })
    : '';

  const rawFields = compactFields({
    cik: stripLeadingZeros(doc.cik),
    entity_type: doc.entityType,
    sic: doc.sic,
    sic_description: doc.sicDescription,
    street: [business?.street1, business?.street2].filter(Boolean).join(' '),
    city: business?.city,
    state: business?.stateOrCountry || extractState(address),
    zip: business?.zipCode,
    address,
    phone: doc.phone,
    state_of_incorporation: doc.stateOfIncorporation,
    tickers: doc.tickers?.join(' '),
  });

  return { ok: true, record: buildRecord(doc.name, 'ADV', filingDate, rawFields, source) };
}

// ── 13F: primary_doc.xml cover page ────────────────────────────────────

function parseWholeNumber(value: string): number | null {
  const cleaned = value.replace(/,/g, '');
  if (!/^\d+(\.\d+)?$/.test(cleaned)) return null;
  return Number(cleaned);
}

function parseCoverPage(raw: string, source: string, contextDate: string | null): ParseResult {
  const manager = extractBlock(raw, 'filingManager');
  const name = manager ? extractTagValue(manager, 'name') : null;
  const periodRaw = extractTagValue(raw, 'reportCalendarOrQuarter') ?? extractTagValue(raw, 'periodOfReport');
  const period = periodRaw ? toIsoDate(periodRaw) : null;
  const filingDate = resolveFilingDate(contextDate, extractTagValue(raw, 'signatureDate'));

  const absent: string[] = [];
  if (!name) absent.push('filingManager.name');
  if (!period) absent.push('reportCalendarOrQuarter');
  if (!filingDate) absent.push('signatureDate');
  if (!name || !period || !filingDate) return missing(source, absent);

  const valueTotalRaw = extractTagValue(raw, 'tableValueTotal');
  const valueTotal = valueTotalRaw === null ? null : parseWholeNumber(valueTotalRaw);
  if (valueTotalRaw !== null && valueTotal === null) {
    return fail(`Malformed tableValueTotal: "${valueTotalRaw}"`, source, ['tableValueTotal']);
  }

  const entryTotal = extractTagValue(raw, 'tableEntryTotal');
  if (entryTotal !== null && !/^\d+$/.test(entryTotal.replace(/,/g, ''))) {
    return fail(`Malformed tableEntryTotal: "${entryTotal}"`, source, ['tableEntryTotal']);
  }

  const street1 = manager ? extractTagValue(manager, 'street1') : null;
  const street2 = manager ? extractTagValue(manager, 'street2') : null;
  const city = manager ? extractTagValue(manager, 'city') : null;
  const stateOrCountry = manager ? extractTagValue(manager, 'stateOrCountry') : null;
  const zip = manager ? extractTagValue(manager, 'zipCode') : null;
  const address = formatAddress({ street1, street2, city, state: stateOrCountry, zip });
  const cik = extractTagValue(raw, 'cik');

  const rawFields = compactFields({
    cik: cik ? stripLeadingZeros(cik) : null,
    period_of_report: period,
    submission_type: extractTagValue(raw, 'submissionType'),
    table_entry_total: entryTotal?.replace(/,/g, ''),
    table_value_total: valueTotal === null ? null : String(valueTotal),
    aum: valueTotal === null ? null : String(valueTotal),
    street: [street1, street2].filter(Boolean).join(' '),
    city,
    state: stateOrCountry || extractState(address),
    zip,
    address,
  });

  return { ok: true, record: buildRecord(name, '13F', filingDate, rawFields, source) };
}
