import { describe, it, expect } from 'vitest';
import type { ConceptPairConfig } from '@/core/config';
import { unavailable, type AnyEnvelope } from '@/signals/envelope';
import { EnvelopeStore } from '@/signals/store';
import {
  compareConcept,
  relativeDelta,
  trustBand,
  trustScore,
  validateSources,
  valuesAgree,
} from '@/validation/cross_source';
import { testConfig } from '../fixtures/bundles';
import { missing, seed, TEST_AS_OF } from '../fixtures/context';

const validation = testConfig().validation;

const revenue: ConceptPairConfig = {
  concept: 'revenue',
  primary: 'fundamentals.revenue_latest',
  secondary: 'doc.revenue',
  per_share: false,
};

const eps: ConceptPairConfig = {
  concept: 'eps',
  primary: 'fundamentals.eps_latest',
  secondary: 'doc.eps',
  per_share: true,
};

function notApplicable(name: string): AnyEnvelope {
  return unavailable(name, 'not_applicable', { sourceId: 'test', computedAt: TEST_AS_OF });
}

function sourceOf(envelopes: AnyEnvelope[]): EnvelopeStore {
  return new EnvelopeStore(TEST_AS_OF, envelopes);
}

describe('cross-source validator', () => {
  describe('valuesAgree', () => {
    it('compares small magnitudes by absolute difference', () => {
      expect(valuesAgree(5, 6.5, validation)).toBe(true);
      expect(valuesAgree(5, 8, validation)).toBe(false);
    });

    it('compares larger magnitudes by relative difference, inclusively', () => {
      expect(valuesAgree(100, 104, validation)).toBe(true);
      expect(valuesAgree(100, 106, validation)).toBe(false);
      expect(valuesAgree(100, 95, validation)).toBe(true);
    });

    it('treats two zeros as identical', () => {
      expect(relativeDelta(0, 0)).toBe(0);
    });
  });

  describe('compareConcept', () => {
    it('corrects a reporting-unit difference', () => {
      const record = compareConcept(
        revenue,
        seed('fundamentals.revenue_latest', 12340),
        seed('doc.revenue', 123.4),
        validation
      );
      expect(record?.match).toBe('match');
      expect(record?.adjustment).toBe('unit_scale');
      expect(record?.factor).toBe(100);
      expect(record?.normalized_b_value).toBeCloseTo(12340, 6);
    });

    it('explains a per-share difference by a share-count change', () => {
      const record = compareConcept(eps, seed('fundamentals.eps_latest', 10), seed('doc.eps', 20.4), validation);
      expect(record?.match).toBe('match');
      expect(record?.adjustment).toBe('corporate_action');
      expect(record?.factor).toBe(2);
      expect(record?.normalized_b_value).toBeCloseTo(10.2, 10);
      expect(record?.detail).toBe('filing value is 2x the ingestion value, consistent with a share-count change');
    });

    it('does not apply a share-count correction to aggregate concepts', () => {
      const record = compareConcept(
        revenue,
        seed('fundamentals.revenue_latest', 10),
        seed('doc.revenue', 20.4),
        validation
      );
      expect(record?.match).toBe('mismatch');
      expect(record?.detail).toBe('values differ by 50.98%');
    });

    it('marks a concept unverifiable when a side has no value', () => {
      const record = compareConcept(
        revenue,
        missing('fundamentals.revenue_latest'),
        missing('doc.revenue'),
        validation
      );
      expect(record?.match).toBe('unverifiable');
      expect(record?.detail).toBe('no value for fundamentals.revenue_latest and doc.revenue');
      expect(record?.source_a_value).toBeNull();
    });

    it('leaves out a concept gated away for the entity', () => {
      expect(
        compareConcept(revenue, notApplicable('fundamentals.revenue_latest'), seed('doc.revenue', 5), validation)
      ).toBeNull();
    });
  });

  describe('validateSources', () => {
    it('scores mismatches and unverifiable concepts and excludes gated ones', () => {
      const assessment = validateSources(
        sourceOf([
          seed('fundamentals.revenue_latest', 1000),
          seed('doc.revenue', 1000),
          seed('fundamentals.net_profit_latest', 100),
          seed('doc.net_profit', 150),
          notApplicable('fundamentals.eps_latest'),
          seed('doc.eps', 12),
          seed('fundamentals.operating_cash_flow_latest', 130),
          seed('doc.audit_opinion', 'Unmodified'),
        ]),
        validation
      );
      expect(assessment.counts).toEqual({ match: 1, mismatch: 1, unverifiable: 1 });
      expect(assessment.excluded).toEqual(['eps']);
      expect(assessment.records.map((r) => r.concept)).toEqual(['revenue', 'net_profit', 'operating_cash_flow']);
      expect(assessment.score).toBe(82);
      expect(assessment.band).toBe('HIGH');
      expect(assessment.audit.opinion).toBe('unmodified');
      expect(assessment.audit.going_concern).toBeNull();
    });

    it('penalises a modified opinion and caps severe auditor flags', () => {
      const assessment = validateSources(
        sourceOf([
          seed('fundamentals.revenue_latest', 1000),
          seed('doc.revenue', 1000),
          seed('fundamentals.net_profit_latest', 100),
          seed('doc.net_profit', 100),
          seed('fundamentals.eps_latest', 12),
          seed('doc.eps', 12),
          seed('fundamentals.operating_cash_flow_latest', 130),
          seed('doc.operating_cash_flow', 130),
          seed('doc.audit_opinion', 'Qualified opinion'),
          seed('doc.auditor_observations', [
            'Material weakness in revenue controls',
            'Going concern uncertainty',
            'Non-compliance with lending covenants',
            'Departure from accounting standards',
            'Key audit matter: inventory valuation',
          ]),
        ]),
        validation
      );
      expect(assessment.audit.opinion_penalty).toBe(25);
      expect(assessment.audit.flag_penalty).toBe(30);
      expect(assessment.score).toBe(45);
      expect(assessment.band).toBe('UNRELIABLE');
    });

    it('treats a going-concern doubt as a modified opinion', () => {
      const assessment = validateSources(
        sourceOf([seed('doc.audit_opinion', 'Unmodified'), seed('doc.going_concern', true)]),
        validation
      );
      expect(assessment.audit.opinion_penalty).toBe(25);
      // four unverifiable concepts and the opinion penalty
      expect(assessment.score).toBe(100 - 4 * 6 - 25);
    });

    it('never raises trust when a match turns into a mismatch', () => {
      const base = [
        seed('fundamentals.revenue_latest', 1000),
        seed('fundamentals.net_profit_latest', 100),
        seed('doc.net_profit', 100),
      ];
      const agreeing = validateSources(sourceOf([...base, seed('doc.revenue', 1000)]), validation);
      const disagreeing = validateSources(sourceOf([...base, seed('doc.revenue', 1500)]), validation);
      expect(disagreeing.score).toBeLessThan(agreeing.score);
    });
  });

  it('clamps the trust score to 0..100', () => {
    expect(trustScore({ mismatch: 0, unverifiable: 0 }, 0, validation.penalties)).toBe(100);
    expect(trustScore({ mismatch: 10, unverifiable: 0 }, 0, validation.penalties)).toBe(0);
  });

  it('bands the score with inclusive lower bounds', () => {
    expect(trustBand(75, validation.bands)).toBe('HIGH');
    expect(trustBand(74.9, validation.bands)).toBe('MODERATE');
    expect(trustBand(60, validation.bands)).toBe('MODERATE');
    expect(trustBand(59, validation.bands)).toBe('UNRELIABLE');
  });
});
