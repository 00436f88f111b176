import { describe, it, expect } from 'vitest';
import type { SynthesisConfig } from '@/core/config';
import type { VoteProducer } from '@/pipeline/types';
import { unavailable } from '@/signals/envelope';
import { EnvelopeStore } from '@/signals/store';
import { confidenceFor, positiveFraction, ratingFor, synthesize, voteCoverage } from '@/synthesis/consensus';
import { collectVotes, tallyVotes, type Direction, type Vote } from '@/synthesis/votes';
import { seed, TEST_AS_OF } from '../fixtures/context';

const config: SynthesisConfig = {
  buy_threshold: 0.65,
  hold_threshold: 0.45,
  high_confidence_coverage: 0.8,
  low_confidence_coverage: 0.5,
};

function vote(signal: string, direction: Direction | null, reason: Vote['reason'] = null): Vote {
  return {
    signal_name: signal,
    phase_id: 'p',
    module_id: signal,
    direction,
    available: direction !== null,
    basis: null,
    basis_value: null,
    rationale: null,
    reason: direction === null ? reason ?? 'missing' : null,
    detail: null,
  };
}

function votes(positive: number, neutral: number, negative: number, missingCount = 0): Vote[] {
  return [
    ...Array.from({ length: positive }, (_, i) => vote(`pos${i}`, 'positive')),
    ...Array.from({ length: neutral }, (_, i) => vote(`neu${i}`, 'neutral')),
    ...Array.from({ length: negative }, (_, i) => vote(`neg${i}`, 'negative')),
    ...Array.from({ length: missingCount }, (_, i) => vote(`mis${i}`, null)),
  ];
}

describe('vote collection', () => {
  const producers: VoteProducer[] = [
    { signal: 'dcf', envelope: 'vote.dcf', phaseId: 'valuation', moduleId: 'dcf' },
    { signal: 'moat', envelope: 'vote.moat', phaseId: 'qualitative', moduleId: 'moat' },
    { signal: 'beta', envelope: 'vote.beta', phaseId: 'market', moduleId: 'beta' },
    { signal: 'esg', envelope: 'vote.esg', phaseId: 'qualitative', moduleId: 'esg' },
  ];

  it('reads one vote per producer in producer order', () => {
    const store = new EnvelopeStore(TEST_AS_OF, [
      seed('vote.dcf', 'positive'),
      unavailable('vote.moat', 'not_applicable', { sourceId: 'test', computedAt: TEST_AS_OF }, 'gated'),
      seed('vote.beta', 'bullish'),
    ]);
    const collected = collectVotes(producers, store);
    expect(collected.map((v) => [v.signal_name, v.direction, v.reason])).toEqual([
      ['dcf', 'positive', null],
      ['moat', null, 'not_applicable'],
      ['beta', null, 'type_mismatch'],
      ['esg', null, 'missing'],
    ]);
    expect(collected[1].detail).toBe('gated');
    expect(collected[2].detail).toBe('expected direction or vote');
  });

  it('carries the basis and rationale of a structured vote', () => {
    const store = new EnvelopeStore(TEST_AS_OF, [
      seed('vote.dcf', {
        direction: 'positive',
        basis: 'valuation.dcf_upside_pct',
        basis_value: 50,
        rationale: 'valuation.dcf_upside_pct = 50 (positive)',
      }),
      seed('vote.moat', { direction: 'sideways', basis: 'moat.score', basis_value: 6, rationale: null }),
    ]);
    const [dcf, moat] = collectVotes(producers, store);
    expect(dcf).toEqual({
      signal_name: 'dcf',
      phase_id: 'valuation',
      module_id: 'dcf',
      direction: 'positive',
      available: true,
      basis: 'valuation.dcf_upside_pct',
      basis_value: 50,
      rationale: 'valuation.dcf_upside_pct = 50 (positive)',
      reason: null,
      detail: null,
    });
    expect(moat.reason).toBe('type_mismatch');
  });

  it('accounts for every registered vote', () => {
    const tally = tallyVotes([...votes(2, 1, 1, 1), vote('gated', null, 'not_applicable')]);
    expect(tally).toEqual({
      registered: 6,
      available: 4,
      unavailable: 2,
      not_applicable: 1,
      positive: 2,
      neutral: 1,
      negative: 1,
    });
    expect(tally.positive + tally.neutral + tally.negative + tally.unavailable).toBe(tally.registered);
  });
});

describe('consensus synthesizer', () => {
  it('counts neutral votes in the denominator and ignores unavailable ones', () => {
    expect(positiveFraction(tallyVotes(votes(3, 1, 0, 4)))).toBe(0.75);
  });

  it('applies inclusive thresholds without rounding', () => {
    expect(ratingFor(0.65, config)).toBe('BUY');
    expect(ratingFor(0.6499, config)).toBe('HOLD');
    expect(ratingFor(0.45, config)).toBe('HOLD');
    expect(ratingFor(0.4499, config)).toBe('SELL');
  });

  it('excludes gated votes from coverage', () => {
    const tally = tallyVotes([...votes(4, 0, 0), vote('gated', null, 'not_applicable')]);
    expect(voteCoverage(tally)).toBe(1);
  });

  it('has no coverage when every vote is gated', () => {
    expect(voteCoverage(tallyVotes([vote('gated', null, 'not_applicable')]))).toBeNull();
  });

  it('derives confidence from coverage and trust band', () => {
    expect(confidenceFor(0.8, 'HIGH', config)).toBe('HIGH');
    expect(confidenceFor(0.8, 'MODERATE', config)).toBe('MEDIUM');
    expect(confidenceFor(0.5, 'HIGH', config)).toBe('MEDIUM');
    expect(confidenceFor(0.49, 'HIGH', config)).toBe('LOW');
    expect(confidenceFor(1, 'UNRELIABLE', config)).toBe('LOW');
  });

  it('produces a candidate from available votes', () => {
    const consensus = synthesize(votes(7, 2, 1), 'HIGH', config);
    expect(consensus.candidate_rating).toBe('BUY');
    expect(consensus.positive_fraction).toBe(0.7);
    expect(consensus.coverage).toBe(1);
    expect(consensus.confidence).toBe('HIGH');
  });

  it('reaches a SELL when fewer than the hold threshold are positive', () => {
    const consensus = synthesize(votes(4, 2, 4, 7), 'MODERATE', config);
    expect(consensus.positive_fraction).toBe(0.4);
    expect(consensus.candidate_rating).toBe('SELL');
    expect(consensus.confidence).toBe('MEDIUM');
  });

  it('has no candidate and low confidence without available votes', () => {
    const consensus = synthesize(votes(0, 0, 0, 3), 'HIGH', config);
    expect(consensus.candidate_rating).toBeNull();
    expect(consensus.positive_fraction).toBeNull();
    expect(consensus.coverage).toBe(0);
    expect(consensus.confidence).toBe('LOW');
  });
});
