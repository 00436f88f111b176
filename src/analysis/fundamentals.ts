/**
 * Fundamentals phase
 * Latest-period statement values and year-over-year growth. A period the
 * series does not contain stays missing; no earlier period stands in for it.
 */

import { latestFiscalYear } from '@/entity/capability_gate';
import type { AnalysisModule, ModuleContext } from '@/pipeline/types';
import { available, numeric, unavailable, type Envelope } from '@/signals/envelope';
import { asPeriodSeries, valueForPeriod } from '@/signals/series';
import type { Direction } from '@/synthesis/votes';
import { voteFrom, voteName } from './vote_rules';

export const LATEST_LINE_ITEMS = [
  { series: 'fin.revenue', output: 'fundamentals.revenue_latest', unit: 'currency' },
  { series: 'fin.net_profit', output: 'fundamentals.net_profit_latest', unit: 'currency' },
  { series: 'fin.eps', output: 'fundamentals.eps_latest', unit: 'currency/share' },
  { series: 'fin.operating_cash_flow', output: 'fundamentals.operating_cash_flow_latest', unit: 'currency' },
] as const;

/**
 * Value of a period series for one fiscal period.
 */
export function periodValue(
  ctx: ModuleContext,
  seriesName: string,
  period: string | null,
  output: string,
  unit: string | null
): Envelope<number> {
  const series = asPeriodSeries(ctx.input(seriesName));
  if (!series.available) {
    return unavailable(output, 'upstream_unavailable', ctx.meta(unit), `${seriesName}: ${series.value.reason}`);
  }
  if (period === null) {
    return unavailable(output, 'missing', ctx.meta(unit), 'entity has no fiscal periods');
  }
  const value = valueForPeriod(series.value, period);
  if (value === null) {
    return unavailable(output, 'missing', ctx.meta(unit), `${seriesName} has no value for ${period}`);
  }
  return numeric(output, value, ctx.meta(unit, series.confidence));
}

export const latestFinancials: AnalysisModule = {
  id: 'latest_financials',
  requires: LATEST_LINE_ITEMS.map((item) => item.series),
  produces: LATEST_LINE_ITEMS.map((item) => item.output),
  run(ctx) {
    const period = latestFiscalYear(ctx.profile);
    return LATEST_LINE_ITEMS.map((item) => periodValue(ctx, item.series, period, item.output, item.unit));
  },
};

/**
 * Growth of the latest fiscal year over the one before, in percent.
 */
export function growthPct(latest: number, previous: number): number | null {
  if (previous <= 0) return null;
  return (latest / previous - 1) * 100;
}

export function growthDirection(pct: number): Direction {
  if (pct > 10) return 'positive';
  if (pct < -5) return 'negative';
  return 'neutral';
}

function growthModule(id: string, series: string, signal: string): AnalysisModule {
  const output = `fundamentals.${signal}_pct`;
  return {
    id,
    requires: [series],
    produces: [output, voteName(signal)],
    vote: { signal, envelope: voteName(signal) },
    run(ctx) {
      const years = ctx.profile.fiscalYears;
      const latestYear = years.length > 0 ? years[years.length - 1] : null;
      const previousYear = years.length > 1 ? years[years.length - 2] : null;

      const latest = periodValue(ctx, series, latestYear, `${output}.latest`, null);
      const previous = periodValue(ctx, series, previousYear, `${output}.previous`, null);

      let growth: Envelope<number>;
      if (!latest.available) {
        growth = unavailable(output, 'upstream_unavailable', ctx.meta('%'), latest.value.detail);
      } else if (!previous.available) {
        growth = unavailable(output, 'upstream_unavailable', ctx.meta('%'), previous.value.detail);
      } else {
        const pct = growthPct(latest.value, previous.value);
        growth =
          pct === null
            ? unavailable(output, 'invalid_value', ctx.meta('%'), `previous ${series} is not positive`)
            : available(output, pct, ctx.meta('%', Math.min(latest.confidence, previous.confidence)));
      }

      return [growth, voteFrom(ctx, signal, growth, growthDirection)];
    },
  };
}

export const revenueGrowth = growthModule('revenue_growth', 'fin.revenue', 'revenue_growth');
export const profitGrowth = growthModule('profit_growth', 'fin.net_profit', 'profit_growth');

/**
 * Latest-period value of a statement line, for modules outside this phase.
 */
export function latestPeriodValue(ctx: ModuleContext, seriesName: string, output: string): Envelope<number> {
  return periodValue(ctx, seriesName, latestFiscalYear(ctx.profile), output, null);
}
