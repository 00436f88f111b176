/**
 * Series shapes carried inside envelopes
 */

import { daysBetween, parseDate } from '@/core/time';
import { asShape, type AnyEnvelope, type Envelope } from './envelope';

/** One fiscal period of a statement line item. Missing periods are omitted, never zero-filled. */
export interface PeriodValue {
  period: string;
  value: number;
}

export interface PricePoint {
  date: string;
  close: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

export function isPeriodSeries(value: unknown): value is PeriodValue[] {
  return (
    Array.isArray(value) &&
    value.every(
      (item) =>
        isRecord(item) &&
        typeof item.period === 'string' &&
        typeof item.value === 'number' &&
        Number.isFinite(item.value)
    )
  );
}

export function isPriceSeries(value: unknown): value is PricePoint[] {
  return (
    Array.isArray(value) &&
    value.every(
      (item) =>
        isRecord(item) &&
        typeof item.date === 'string' &&
        typeof item.close === 'number' &&
        Number.isFinite(item.close)
    )
  );
}

export function asPeriodSeries(env: AnyEnvelope): Envelope<PeriodValue[]> {
  return asShape(env, isPeriodSeries, 'period series');
}

export function asPriceSeries(env: AnyEnvelope): Envelope<PricePoint[]> {
  return asShape(env, isPriceSeries, 'price series');
}

/**
 * Value for an exact period, or null when the series has no such period.
 */
export function valueForPeriod(series: readonly PeriodValue[], period: string): number | null {
  const hit = series.find((point) => point.period === period);
  return hit ? hit.value : null;
}

export function sortByDate(points: readonly PricePoint[]): PricePoint[] {
  return [...points].sort((a, b) => a.date.localeCompare(b.date));
}

/**
 * Closes known on `asOf`, sorted by date. Points dated later, or with an
 * unreadable date, are dropped.
 */
export function pricesUpTo(points: readonly PricePoint[], asOf: Date): PricePoint[] {
  return sortByDate(points).filter((point) => {
    const date = parseDate(point.date);
    return date !== null && daysBetween(asOf, date) >= 0;
  });
}

export function standardDeviation(values: readonly number[]): number | null {
  if (values.length < 2) return null;
  const mean = values.reduce((sum, v) => sum + v, 0) / values.length;
  const variance = values.reduce((sum, v) => sum + (v - mean) ** 2, 0) / (values.length - 1);
  return Math.sqrt(variance);
}
