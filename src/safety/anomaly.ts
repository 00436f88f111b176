/**
 * Data anomaly checks used by the kill switch
 *
 * Price anomaly: a single-period return larger than a multiple of the rolling
 * volatility before it. Staleness: the latest refresh of a data class is older
 * than its own typical refresh interval allows.
 */

import type { PriceAnomalyConfig } from '@/core/config';
import { daysBetween, formatDate, median, parseDate } from '@/core/time';
import { pricesUpTo, standardDeviation, type PricePoint } from '@/signals/series';

export type CheckStatus = 'triggered' | 'clear' | 'indeterminate';

export interface PriceAnomalyResult {
  status: CheckStatus;
  detail: string;
  date: string | null;
  move: number | null;
  threshold: number | null;
}

export interface StalenessResult {
  status: CheckStatus;
  detail: string;
  latest: string | null;
  age_days: number | null;
  allowed_days: number | null;
}

interface DatedReturn {
  date: string;
  value: number;
}

function datedReturns(prices: readonly PricePoint[], asOf: Date): DatedReturn[] {
  const sorted = pricesUpTo(prices, asOf);
  const returns: DatedReturn[] = [];
  for (let i = 1; i < sorted.length; i += 1) {
    const prev = sorted[i - 1].close;
    if (prev <= 0) continue;
    returns.push({ date: sorted[i].date, value: sorted[i].close / prev - 1 });
  }
  return returns;
}

/**
 * Tests the most recent `lookback` returns known on `asOf`, each against the
 * volatility of the `window` returns before it. Reports the largest
 * exceedance.
 */
export function detectPriceAnomaly(
  prices: readonly PricePoint[],
  config: PriceAnomalyConfig,
  asOf: Date
): PriceAnomalyResult {
  const returns = datedReturns(prices, asOf);
  const first = Math.max(config.window, returns.length - config.lookback);
  if (returns.length <= config.window) {
    return {
      status: 'indeterminate',
      detail: `need more than ${config.window} returns, have ${returns.length}`,
      date: null,
      move: null,
      threshold: null,
    };
  }

  let worst: { index: number; ratio: number; threshold: number } | null = null;
  for (let i = first; i < returns.length; i += 1) {
    const window = returns.slice(i - config.window, i).map((r) => r.value);
    const volatility = Math.max(standardDeviation(window) ?? 0, config.volatility_floor);
    const threshold = config.multiplier * volatility;
    const ratio = Math.abs(returns[i].value) / threshold;
    if (ratio > 1 && (!worst || ratio > worst.ratio)) {
      worst = { index: i, ratio, threshold };
    }
  }

  if (!worst) {
    return {
      status: 'clear',
      detail: `no return beyond ${config.multiplier}x rolling volatility`,
      date: null,
      move: null,
      threshold: null,
    };
  }

  const hit = returns[worst.index];
  return {
    status: 'triggered',
    detail: `price moved ${(hit.value * 100).toFixed(1)}% on ${hit.date}, limit ${(worst.threshold * 100).toFixed(1)}%`,
    date: hit.date,
    move: hit.value,
    threshold: worst.threshold,
  };
}

/**
 * Refreshes dated after `asOf` are ignored so a historical run sees what was
 * known at the time. The allowed age is `cadenceMultiplier` times the median
 * interval, and never less than the longest interval already in the history:
 * a weekday feed has gone three days without an update every weekend.
 */
export function assessStaleness(
  refreshes: readonly string[],
  asOf: Date,
  cadenceMultiplier: number
): StalenessResult {
  const days = Array.from(
    new Set(
      refreshes
        .map((value) => parseDate(value))
        .filter((date): date is Date => date !== null && daysBetween(asOf, date) >= 0)
        .map((date) => formatDate(date))
    )
  ).sort();

  if (days.length < 2) {
    return {
      status: 'indeterminate',
      detail: `need two refreshes to infer a cadence, have ${days.length}`,
      latest: days.length === 1 ? days[0] : null,
      age_days: null,
      allowed_days: null,
    };
  }

  const dates = days.flatMap((day) => {
    const parsed = parseDate(day);
    return parsed ? [parsed] : [];
  });
  const intervals: number[] = [];
  for (let i = 1; i < dates.length; i += 1) {
    intervals.push(daysBetween(dates[i], dates[i - 1]));
  }

  const typical = median(intervals) ?? 0;
  const allowed = Math.max(cadenceMultiplier * typical, Math.max(...intervals));
  const latest = dates[dates.length - 1];
  const age = daysBetween(asOf, latest);
  const latestLabel = days[days.length - 1];

  if (age > allowed) {
    return {
      status: 'triggered',
      detail: `last refresh ${latestLabel} is ${age} days old, cadence allows ${allowed.toFixed(1)}`,
      latest: latestLabel,
      age_days: age,
      allowed_days: allowed,
    };
  }

  return {
    status: 'clear',
    detail: `last refresh ${latestLabel} is ${age} days old`,
    latest: latestLabel,
    age_days: age,
    allowed_days: allowed,
  };
}
