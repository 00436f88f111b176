/**
 * Time utilities for consistent date handling
 */

import { differenceInCalendarDays, format, isValid, parseISO } from 'date-fns';

export function formatDate(date: Date): string {
  return format(date, 'yyyy-MM-dd');
}

/**
 * Parses an ISO date or timestamp. Returns null instead of an Invalid Date.
 */
export function parseDate(dateStr: string): Date | null {
  const parsed = parseISO(dateStr);
  return isValid(parsed) ? parsed : null;
}

export function getRunId(symbol: string, asOf: Date, hash: string): string {
  return `${formatDate(asOf)}__${symbol}__${hash.substring(0, 8)}`;
}

export function daysBetween(later: Date, earlier: Date): number {
  return differenceInCalendarDays(later, earlier);
}

export function median(values: readonly number[]): number | null {
  if (values.length === 0) return null;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
}
