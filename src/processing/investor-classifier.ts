import { CLASSIFICATION_RULES, parseAum, type ClassificationRule } from './classification-rules.js';
import type { CategorySummary, ClassifiedInvestor, FilingRecord, FilingType } from '../core/types.js';

/** What a caller knows about an entity it wants classified without fetching */
export interface AdHocEntity {
  entity_name: string;
  filing_type?: FilingType;
  /** ISO date; defaults to today */
  filing_date?: string;
  sic_description?: string;
  aum?: number;
  /** 13F holdings count */
  positions?: number;
}

export function adHocRecord(entity: AdHocEntity, source: string): FilingRecord {
  const rawFields: Record<string, string> = {};
  if (entity.sic_description) rawFields.sic_description = entity.sic_description;
  if (entity.aum !== undefined) rawFields.aum = String(entity.aum);
  if (entity.positions !== undefined) rawFields.table_entry_total = String(entity.positions);

  return Object.freeze({
    entity_name: entity.entity_name,
    filing_type: entity.filing_type ?? 'ADV',
    filing_date: entity.filing_date ?? new Date().toISOString().slice(0, 10),
    raw_fields: Object.freeze(rawFields),
    source,
  });
}

/**
 * Find the first rule that matches, in priority order.
 * Returns undefined when the record falls through to 'Other'.
 */
export function findMatchingRule(
  record: FilingRecord,
  rules: readonly ClassificationRule[] = CLASSIFICATION_RULES
): ClassificationRule | undefined {
  return rules.find(rule => rule.matches(record));
}

/**
 * Classify one filing record. Pure: no I/O, same record, same answer.
 */
export function classify(
  record: FilingRecord,
  rules: readonly ClassificationRule[] = CLASSIFICATION_RULES
): ClassifiedInvestor {
  const rule = findMatchingRule(record, rules);

  return Object.freeze({
    entity_name: record.entity_name,
    category: rule?.category ?? 'Other',
    aum: parseAum(record),
    source_filing: record,
  });
}

/** Count investors per category; every category is present, zero or not */
export function summarizeCategories(investors: readonly ClassifiedInvestor[]): CategorySummary {
  const summary: CategorySummary = { VC: 0, PE: 0, FamilyOffice: 0, HedgeFund: 0, Other: 0 };
  for (const investor of investors) {
    summary[investor.category] += 1;
  }
  return summary;
}
