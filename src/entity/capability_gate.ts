/**
 * Capability Gate
 * Classifies the subject entity and decides which phases apply to it.
 */

export type EntityClassification = 'standard' | 'bank' | 'nbfc';

export const ENTITY_CLASSIFICATIONS: readonly EntityClassification[] = ['standard', 'bank', 'nbfc'];

export interface EntityProfile {
  readonly symbol: string;
  readonly classification: EntityClassification;
  readonly classificationBasis: string;
  readonly sector: string | null;
  /** Ascending, de-duplicated fiscal period labels */
  readonly fiscalYears: readonly string[];
}

export interface ClassificationHints {
  symbol: string;
  fiscalYears: readonly string[];
  /** Explicit override from ingestion, e.g. "bank" */
  classificationHint?: string | null;
  balanceSheetLines?: readonly string[] | null;
  sector?: string | null;
  industry?: string | null;
}

export interface GatedUnit {
  id: string;
  excludeFor?: readonly EntityClassification[];
}

const DEPOSIT_LINE_KEYS = ['deposits', 'customerdeposits', 'depositsfromcustomers'];

const NBFC_KEYWORDS = [
  'nbfc',
  'non-banking',
  'non banking',
  'credit services',
  'housing finance',
  'consumer finance',
];

const BANK_KEYWORDS = ['bank', 'banking'];

// Checked last: "Financial Services / Banks - Regional" must resolve to bank.
const GENERIC_FINANCIAL_KEYWORDS = [
  'financial services',
  'financials',
  'insurance',
  'financial data & stock exchanges',
];

function isClassification(value: string): value is EntityClassification {
  return ENTITY_CLASSIFICATIONS.some((c) => c === value);
}

function normalizeLine(line: string): string {
  return line.replace(/[\s_-]+/g, '').toLowerCase();
}

export function classifyEntity(hints: ClassificationHints): {
  classification: EntityClassification;
  basis: string;
} {
  const hint = hints.classificationHint?.trim().toLowerCase();
  if (hint && isClassification(hint)) {
    return { classification: hint, basis: `explicit hint "${hint}"` };
  }

  const lines = (hints.balanceSheetLines ?? []).map(normalizeLine);
  const depositLine = lines.find((line) => DEPOSIT_LINE_KEYS.includes(line));
  if (depositLine) {
    return { classification: 'bank', basis: `balance sheet line "${depositLine}"` };
  }

  const descriptor = [hints.sector, hints.industry]
    .filter((part): part is string => typeof part === 'string' && part.trim().length > 0)
    .join(' | ')
    .toLowerCase();

  if (descriptor) {
    const nbfc = NBFC_KEYWORDS.find((keyword) => descriptor.includes(keyword));
    if (nbfc) {
      return { classification: 'nbfc', basis: `sector keyword "${nbfc}"` };
    }
    const bank = BANK_KEYWORDS.find((keyword) => descriptor.includes(keyword));
    if (bank) {
      return { classification: 'bank', basis: `sector keyword "${bank}"` };
    }
    const financial = GENERIC_FINANCIAL_KEYWORDS.find((keyword) => descriptor.includes(keyword));
    if (financial) {
      return { classification: 'nbfc', basis: `sector keyword "${financial}"` };
    }
  }

  return { classification: 'standard', basis: 'no financial-services indicator' };
}

export function createEntityProfile(hints: ClassificationHints): EntityProfile {
  const { classification, basis } = classifyEntity(hints);
  const fiscalYears = Array.from(
    new Set(hints.fiscalYears.map((fy) => fy.trim()).filter((fy) => fy.length > 0))
  ).sort();

  return Object.freeze({
    symbol: hints.symbol.trim().toUpperCase(),
    classification,
    classificationBasis: basis,
    sector: hints.sector ?? null,
    fiscalYears: Object.freeze(fiscalYears),
  });
}

export function latestFiscalYear(profile: EntityProfile): string | null {
  return profile.fiscalYears.length > 0 ? profile.fiscalYears[profile.fiscalYears.length - 1] : null;
}

export function isPhaseApplicable(profile: EntityProfile, unit: GatedUnit): boolean {
  return !(unit.excludeFor ?? []).includes(profile.classification);
}
