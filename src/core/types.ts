/**
 * Core data model for edgar-investors.
 *
 * Design principles:
 * - FilingRecords are built once from one fetched document and frozen
 * - Classification references its FilingRecord, never copies or mutates it
 * - Every record carries its source URL so output can be re-sorted stably
 */

export const FILING_TYPES = ['ADV', '13F'] as const;
export type FilingType = (typeof FILING_TYPES)[number];

/** Source selector used by the CLI, web API and MCP tools */
export type FormOption = 'adv' | '13f' | 'all';

export const FORMS_BY_OPTION: Record<FormOption, readonly FilingType[]> = {
  adv: ['ADV'],
  '13f': ['13F'],
  all: FILING_TYPES,
};

export const INVESTOR_CATEGORIES = ['VC', 'PE', 'FamilyOffice', 'HedgeFund', 'Other'] as const;
export type InvestorCategory = (typeof INVESTOR_CATEGORIES)[number];

export const CATEGORY_LABELS: Record<InvestorCategory, string> = {
  VC: 'Venture Capital',
  PE: 'Private Equity',
  FamilyOffice: 'Family Office',
  HedgeFund: 'Hedge Fund',
  Other: 'Other',
};

/** Pointer to one document returned by an index fetch */
export interface DocumentRef {
  cik: string;
  entity_name: string;
  filing_type: FilingType;
  url: string;
  accession_number: string | null;
  filing_date: string | null;
}

export interface IndexQuery {
  form: FilingType;
  limit: number;
}

export interface FilingRecord {
  readonly entity_name: string;
  readonly filing_type: FilingType;
  /** ISO date, YYYY-MM-DD */
  readonly filing_date: string;
  readonly raw_fields: Readonly<Record<string, string>>;
  /** URL of the document the record was parsed from */
  readonly source: string;
}

export interface ClassifiedInvestor {
  readonly entity_name: string;
  readonly category: InvestorCategory;
  readonly aum: number | null;
  readonly source_filing: FilingRecord;
}

export type CategorySummary = Record<InvestorCategory, number>;

/** Shape of the SEC company tickers registry (company_tickers.json) */
export interface SecTickerEntry {
  cik_str: number;
  ticker: string;
  title: string;
}
