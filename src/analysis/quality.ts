/**
 * Earnings quality votes
 */

import type { AnalysisModule } from '@/pipeline/types';
import { asNumber, asText, combineNumbers, unavailable, type Envelope } from '@/signals/envelope';
import type { Direction } from '@/synthesis/votes';
import { latestPeriodValue } from './fundamentals';
import { labelFrom, numericVote, normalizeLabel, voteFrom, voteName } from './vote_rules';

export function piotroskiDirection(fScore: number): Direction {
  if (fScore >= 8) return 'positive';
  if (fScore >= 5) return 'neutral';
  return 'negative';
}

export const piotroski = numericVote({
  id: 'piotroski',
  signal: 'piotroski',
  input: 'piotroski.f_score',
  range: [0, 9],
  decide: piotroskiDirection,
});

export type ManipulationRisk = 'LOW' | 'MEDIUM' | 'HIGH';

/**
 * Beneish M-score cut-offs: above -1.78 likely manipulator, -2.22 grey zone.
 */
export function beneishRisk(mScore: number): ManipulationRisk {
  if (mScore > -1.78) return 'HIGH';
  if (mScore > -2.22) return 'MEDIUM';
  return 'LOW';
}

const RISK_DIRECTION: Record<ManipulationRisk, Direction> = {
  LOW: 'positive',
  MEDIUM: 'neutral',
  HIGH: 'negative',
};

export const beneish: AnalysisModule = {
  id: 'beneish',
  requires: ['beneish.m_score'],
  produces: ['quality.manipulation_risk', voteName('beneish')],
  vote: { signal: 'beneish', envelope: voteName('beneish') },
  run(ctx) {
    const score = asNumber(ctx.input('beneish.m_score'));
    return [
      labelFrom(ctx, 'quality.manipulation_risk', score, beneishRisk),
      voteFrom(ctx, 'beneish', score, (m) => RISK_DIRECTION[beneishRisk(m)]),
    ];
  },
};

/** Operating cash flow below this share of EBITDA means profits are not turning into cash */
export const CFO_EBITDA_RED_FLAG = 0.7;

export const cashConversion: AnalysisModule = {
  id: 'cash_conversion',
  requires: ['fin.operating_cash_flow', 'fin.ebitda'],
  produces: ['quality.cfo_to_ebitda', voteName('cash_conversion')],
  vote: { signal: 'cash_conversion', envelope: voteName('cash_conversion') },
  run(ctx) {
    const cfo = latestPeriodValue(ctx, 'fin.operating_cash_flow', 'quality.cfo_latest');
    const ebitda = latestPeriodValue(ctx, 'fin.ebitda', 'quality.ebitda_latest');

    let ratio: Envelope<number>;
    if (ebitda.available && ebitda.value <= 0) {
      ratio = unavailable('quality.cfo_to_ebitda', 'invalid_value', ctx.meta('ratio'), 'EBITDA is not positive');
    } else {
      ratio = combineNumbers('quality.cfo_to_ebitda', [cfo, ebitda], ([c, e]) => c / e, ctx.meta('ratio'));
    }

    return [
      ratio,
      voteFrom(ctx, 'cash_conversion', ratio, (r) => (r < CFO_EBITDA_RED_FLAG ? 'negative' : 'positive')),
    ];
  },
};

export function trendHealthDirection(health: number, direction: string): Direction {
  if (normalizeLabel(direction) === 'IMPROVING' && health >= 7) return 'positive';
  if (health >= 4) return 'neutral';
  return 'negative';
}

export const trendHealth: AnalysisModule = {
  id: 'trend_health',
  requires: ['trend.health_score', 'trend.direction'],
  produces: [voteName('trend_health')],
  vote: { signal: 'trend_health', envelope: voteName('trend_health') },
  run(ctx) {
    const health = asNumber(ctx.input('trend.health_score'));
    const direction = asText(ctx.input('trend.direction'));
    if (!direction.available) {
      return [voteFrom(ctx, 'trend_health', direction, () => null)];
    }
    return [voteFrom(ctx, 'trend_health', health, (score) => trendHealthDirection(score, direction.value))];
  },
};
