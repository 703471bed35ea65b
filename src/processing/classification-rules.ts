import type { FilingRecord, InvestorCategory } from '../core/types.js';

/**
 * Investor classification rules, in priority order.
 *
 * The first rule whose predicate matches decides the category; a record no
 * rule matches is 'Other'. Categories appear in fixed priority
 * VC → PE → FamilyOffice → HedgeFund, so a "Family Ventures" fund is VC.
 *
 * Keyword rules look at the entity name plus the SIC description. A keyword
 * matches at the start of a word: "venture" matches "Ventures" but "trust"
 * does not match "Entrust".
 */

export interface ClassificationRule {
  id: string;
  category: Exclude<InvestorCategory, 'Other'>;
  description: string;
  matches(record: FilingRecord): boolean;
}

/** Minimum reported 13F value for the concentrated-book rule */
export const CONCENTRATED_BOOK_MIN_AUM = 1_000_000_000;
/** Maximum holdings count for the concentrated-book rule */
export const CONCENTRATED_BOOK_MAX_POSITIONS = 50;

export function classificationText(record: FilingRecord): string {
  return `${record.entity_name} ${record.raw_fields.sic_description ?? ''}`.toLowerCase();
}

function escapeRegex(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** True when any keyword starts a word in the text */
export function containsKeyword(text: string, keywords: readonly string[]): boolean {
  return keywords.some(kw => new RegExp(`(^|[^a-z0-9])${escapeRegex(kw)}`).test(text));
}

export function parseAum(record: FilingRecord): number | null {
  const raw = record.raw_fields.aum;
  if (raw === undefined) return null;
  const value = Number(raw);
  return Number.isFinite(value) ? value : null;
}

function keywordRule(
  id: string,
  category: ClassificationRule['category'],
  keywords: readonly string[],
  description: string
): ClassificationRule {
  return {
    id,
    category,
    description,
    matches: record => containsKeyword(classificationText(record), keywords),
  };
}

export const VC_KEYWORDS = ['venture', 'seed', 'startup', 'early stage', 'accelerator'];
export const PE_KEYWORDS = ['private equity', 'buyout', 'leveraged', 'growth equity', 'mezzanine'];
export const FAMILY_OFFICE_KEYWORDS = ['family office', 'family', 'estate', 'trust'];
export const HEDGE_FUND_KEYWORDS = ['hedge', 'offshore', 'alternative', 'arbitrage', 'master fund', 'macro'];
const MANAGER_NAME_KEYWORDS = ['capital', 'partners', 'fund'];

export const CLASSIFICATION_RULES: readonly ClassificationRule[] = [
  keywordRule('vc_keywords', 'VC', VC_KEYWORDS, 'Name or SIC mentions venture, seed or startup investing'),
  keywordRule('pe_keywords', 'PE', PE_KEYWORDS, 'Name or SIC mentions private equity, buyouts or leverage'),
  keywordRule('family_office_keywords', 'FamilyOffice', FAMILY_OFFICE_KEYWORDS, 'Name or SIC mentions a family office, estate or trust'),
  keywordRule('hedge_fund_keywords', 'HedgeFund', HEDGE_FUND_KEYWORDS, 'Name or SIC mentions hedge, offshore or alternative strategies'),
  {
    id: 'concentrated_13f_book',
    category: 'HedgeFund',
    description: `13F filer reporting at least $${CONCENTRATED_BOOK_MIN_AUM / 1e9}B in ${CONCENTRATED_BOOK_MAX_POSITIONS} or fewer positions, named as a capital/partners/fund manager`,
    matches: record => {
      if (record.filing_type !== '13F') return false;
      const aum = parseAum(record);
      const positions = Number(record.raw_fields.table_entry_total ?? NaN);
      return aum !== null
        && aum >= CONCENTRATED_BOOK_MIN_AUM
        && Number.isInteger(positions)
        && positions <= CONCENTRATED_BOOK_MAX_POSITIONS
        && containsKeyword(record.entity_name.toLowerCase(), MANAGER_NAME_KEYWORDS);
    },
  },
];
