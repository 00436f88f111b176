import { describe, it, expect } from 'vitest';
import type { AnyEnvelope } from '@/signals/envelope';
import { EnvelopeStore } from '@/signals/store';
import { applyVetoes, evaluateSafety, type SafetyCheck } from '@/safety/kill_switch';
import type { Rating } from '@/synthesis/consensus';
import { AS_OF, quietPrices, testConfig } from '../fixtures/bundles';
import { seed } from '../fixtures/context';

const { safety, validation } = testConfig();

function healthyEnvelopes(): AnyEnvelope[] {
  return [
    seed('fundamentals.revenue_latest', 1200),
    seed('fundamentals.net_profit_latest', 125),
    seed('price.history', quietPrices()),
    seed('refresh.financials', ['2025-01-15', '2025-04-15', '2025-06-15']),
    seed('refresh.prices', ['2025-06-27', '2025-06-28', '2025-06-29', '2025-06-30']),
  ];
}

function evaluate(candidate: Rating | null, trustScore: number, envelopes: AnyEnvelope[]) {
  return evaluateSafety(
    { candidate, trustScore, asOf: AS_OF, source: new EnvelopeStore(AS_OF, envelopes) },
    safety,
    validation.bands
  );
}

describe('kill switch', () => {
  it('passes the candidate through when every check is clear', () => {
    const decision = evaluate('BUY', 82, healthyEnvelopes());
    expect(decision.rating).toBe('BUY');
    expect(decision.veto_reason).toBeNull();
    expect(decision.vetoes).toEqual([]);
    expect(decision.checks.map((c) => [c.check, c.subject, c.status])).toEqual([
      ['trust', null, 'clear'],
      ['critical_data', 'fundamentals.revenue_latest', 'clear'],
      ['critical_data', 'fundamentals.net_profit_latest', 'clear'],
      ['price_anomaly', 'price.history', 'clear'],
      ['staleness', 'financials', 'clear'],
      ['staleness', 'prices', 'clear'],
      ['no_votes', null, 'clear'],
    ]);
  });

  it.each<Rating>(['BUY', 'HOLD', 'SELL'])('suspends a %s candidate on low trust', (candidate) => {
    const decision = evaluate(candidate, 59, healthyEnvelopes());
    expect(decision.rating).toBe('SUSPENDED');
    expect(decision.veto_reason).toBe('trust score 59 below 60');
  });

  it('keeps a trust score at the moderate band', () => {
    expect(evaluate('HOLD', 60, healthyEnvelopes()).rating).toBe('HOLD');
  });

  it('names the first triggered check as the veto reason', () => {
    const envelopes = healthyEnvelopes()
      .filter((env) => env.name !== 'fundamentals.net_profit_latest' && env.name !== 'price.history')
      .concat(seed('price.history', [...quietPrices(), { date: '2025-06-01', close: 130 }]));
    const decision = evaluate('BUY', 82, envelopes);
    expect(decision.rating).toBe('SUSPENDED');
    expect(decision.veto_reason).toBe('critical input fundamentals.net_profit_latest unavailable (missing)');
    expect(decision.vetoes.map((v) => v.check)).toEqual(['critical_data', 'price_anomaly']);
  });

  it('suspends when no vote is available', () => {
    const decision = evaluate(null, 90, healthyEnvelopes());
    expect(decision.rating).toBe('SUSPENDED');
    expect(decision.veto_reason).toBe('no signal produced an available vote');
  });

  it('does not veto on checks it cannot evaluate', () => {
    const envelopes = healthyEnvelopes().filter((env) => !env.name.startsWith('refresh.') && env.name !== 'price.history');
    const decision = evaluate('SELL', 82, envelopes);
    expect(decision.rating).toBe('SELL');
    const statuses = decision.checks.filter((c) => c.status === 'indeterminate').map((c) => c.detail);
    expect(statuses).toEqual([
      'no price history (missing)',
      'no refresh history for financials',
      'no refresh history for prices',
    ]);
  });

  it('flags stale financials', () => {
    const envelopes = healthyEnvelopes()
      .filter((env) => env.name !== 'refresh.financials')
      .concat(seed('refresh.financials', ['2024-01-01', '2024-04-01', '2024-07-01']));
    const decision = evaluate('BUY', 82, envelopes);
    expect(decision.veto_reason).toBe('financials: last refresh 2024-07-01 is 364 days old, cadence allows 136.5');
  });

  it('lets no candidate lift a triggered check', () => {
    const triggered: SafetyCheck = { check: 'staleness', subject: 'prices', status: 'triggered', detail: 'stale' };
    const clear: SafetyCheck = { check: 'trust', subject: null, status: 'clear', detail: 'ok' };
    for (const candidate of ['BUY', 'HOLD', 'SELL'] as const) {
      expect(applyVetoes(candidate, [clear, triggered])).toBe('SUSPENDED');
      expect(applyVetoes(candidate, [clear])).toBe(candidate);
    }
  });
});
