import { describe, it, expect } from 'vitest';
import {
  classifyEntity,
  createEntityProfile,
  isPhaseApplicable,
  latestFiscalYear,
} from '@/entity/capability_gate';

describe('capability gate', () => {
  describe('classifyEntity', () => {
    it('honours a valid explicit hint first', () => {
      const result = classifyEntity({
        symbol: 'X',
        fiscalYears: [],
        classificationHint: ' NBFC ',
        balanceSheetLines: ['Deposits'],
      });
      expect(result.classification).toBe('nbfc');
    });

    it('ignores an unknown hint', () => {
      const result = classifyEntity({ symbol: 'X', fiscalYears: [], classificationHint: 'insurer' });
      expect(result.classification).toBe('standard');
    });

    it('treats a deposits line as a bank', () => {
      const result = classifyEntity({
        symbol: 'X',
        fiscalYears: [],
        balanceSheetLines: ['Advances', 'Customer deposits'],
      });
      expect(result).toEqual({ classification: 'bank', basis: 'balance sheet line "customerdeposits"' });
    });

    it('checks NBFC keywords before bank keywords', () => {
      const result = classifyEntity({
        symbol: 'X',
        fiscalYears: [],
        sector: 'Financial Services',
        industry: 'Housing Finance',
      });
      expect(result.classification).toBe('nbfc');
    });

    it('resolves a regional bank to bank', () => {
      const result = classifyEntity({
        symbol: 'X',
        fiscalYears: [],
        sector: 'Financial Services',
        industry: 'Banks - Regional',
      });
      expect(result).toEqual({ classification: 'bank', basis: 'sector keyword "bank"' });
    });

    it('defaults to standard', () => {
      const result = classifyEntity({ symbol: 'X', fiscalYears: [], sector: 'Industrials' });
      expect(result.classification).toBe('standard');
    });
  });

  it('creates a frozen profile with ordered, de-duplicated fiscal years', () => {
    const profile = createEntityProfile({
      symbol: ' acme ',
      fiscalYears: ['FY2025', 'FY2023', 'FY2024', 'FY2025', ' '],
    });
    expect(profile.symbol).toBe('ACME');
    expect(profile.fiscalYears).toEqual(['FY2023', 'FY2024', 'FY2025']);
    expect(latestFiscalYear(profile)).toBe('FY2025');
    expect(Object.isFrozen(profile)).toBe(true);
  });

  it('has no latest fiscal year without periods', () => {
    expect(latestFiscalYear(createEntityProfile({ symbol: 'X', fiscalYears: [] }))).toBeNull();
  });

  it('answers phase applicability from the exclusion list', () => {
    const bank = createEntityProfile({ symbol: 'X', fiscalYears: [], classificationHint: 'bank' });
    expect(isPhaseApplicable(bank, { id: 'dcf', excludeFor: ['bank', 'nbfc'] })).toBe(false);
    expect(isPhaseApplicable(bank, { id: 'quality' })).toBe(true);
  });
});
