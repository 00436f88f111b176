/**
 * Distress phase. Both models assume an industrial balance sheet and are
 * gated out for banks and NBFCs.
 */

import { DataUnavailableError } from '@/core/errors';
import type { AnalysisModule } from '@/pipeline/types';
import { asNumber, available } from '@/signals/envelope';
import { asPeriodSeries } from '@/signals/series';
import type { Direction } from '@/synthesis/votes';
import { labelFrom, voteFrom, voteName } from './vote_rules';

export type AltmanZone = 'SAFE' | 'GREY' | 'DISTRESS';

export function altmanZone(z: number): AltmanZone {
  if (z > 2.99) return 'SAFE';
  if (z >= 1.81) return 'GREY';
  return 'DISTRESS';
}

const ZONE_DIRECTION: Record<AltmanZone, Direction> = {
  SAFE: 'positive',
  GREY: 'neutral',
  DISTRESS: 'negative',
};

export const altmanZ: AnalysisModule = {
  id: 'altman_z',
  requires: ['altman.z_score'],
  produces: ['distress.altman_zone', voteName('altman_z')],
  vote: { signal: 'altman_z', envelope: voteName('altman_z') },
  run(ctx) {
    const z = asNumber(ctx.input('altman.z_score'));
    return [
      labelFrom(ctx, 'distress.altman_zone', z, altmanZone),
      voteFrom(ctx, 'altman_z', z, (score) => ZONE_DIRECTION[altmanZone(score)]),
    ];
  },
};

export type CycleTrend = 'IMPROVING' | 'STABLE' | 'WORSENING';

/**
 * Cash conversion cycle over the last three fiscal years: a move of more than
 * 10% of the first value either way is a trend. A longer cycle is worse.
 */
export function cycleTrend(values: readonly number[]): CycleTrend {
  const first = values[0];
  const last = values[values.length - 1];
  const band = Math.abs(first) * 0.1;
  if (last - first > band) return 'WORSENING';
  if (first - last > band) return 'IMPROVING';
  return 'STABLE';
}

const TREND_DIRECTION: Record<CycleTrend, Direction> = {
  IMPROVING: 'positive',
  STABLE: 'neutral',
  WORSENING: 'negative',
};

export const workingCapital: AnalysisModule = {
  id: 'working_capital',
  requires: ['fin.cash_conversion_cycle'],
  produces: ['distress.working_capital_trend', voteName('working_capital')],
  vote: { signal: 'working_capital', envelope: voteName('working_capital') },
  run(ctx) {
    const series = asPeriodSeries(ctx.input('fin.cash_conversion_cycle'));
    if (!series.available) {
      throw new DataUnavailableError(['fin.cash_conversion_cycle'], `fin.cash_conversion_cycle: ${series.value.reason}`);
    }

    const years = ctx.profile.fiscalYears.slice(-3);
    const values = years.flatMap((year) => {
      const hit = series.value.find((point) => point.period === year);
      return hit ? [hit.value] : [];
    });
    if (years.length < 3 || values.length < 3) {
      throw new DataUnavailableError(
        ['fin.cash_conversion_cycle'],
        'cash conversion cycle needs the last three fiscal years'
      );
    }

    const trend = available('distress.working_capital_trend', cycleTrend(values), ctx.meta(null, series.confidence));
    return [trend, voteFrom(ctx, 'working_capital', trend, (t) => TREND_DIRECTION[t])];
  },
};
