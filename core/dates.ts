/**
 * Calendar date helpers
 *
 * All dates are handled as YYYY-MM-DD strings on the UTC calendar, so
 * lexical comparison is chronological comparison.
 */

import type { IsoDate } from './types';

const MS_PER_DAY = 24 * 60 * 60 * 1000;
const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * True when `value` is a real calendar date in YYYY-MM-DD form
 * (rejects 2024-02-30 and friends).
 */
export function isIsoDate(value: string): boolean {
  const match = ISO_DATE_PATTERN.exec(value);
  if (!match) return false;
  const [, y, m, d] = match;
  const ts = Date.UTC(Number(y), Number(m) - 1, Number(d));
  return toIsoDate(ts) === value;
}

/** Epoch milliseconds → UTC calendar date */
export function toIsoDate(timestampMs: number): IsoDate {
  return new Date(timestampMs).toISOString().split('T')[0];
}

/** UTC midnight of the date, in epoch milliseconds */
export function toTimestamp(date: IsoDate): number {
  return Date.parse(`${date}T00:00:00.000Z`);
}

export function toEpochDays(date: IsoDate): number {
  return Math.round(toTimestamp(date) / MS_PER_DAY);
}

export function fromEpochDays(days: number): IsoDate {
  return toIsoDate(days * MS_PER_DAY);
}

export function addDays(date: IsoDate, days: number): IsoDate {
  return toIsoDate(toTimestamp(date) + days * MS_PER_DAY);
}

export function todayIso(now: Date = new Date()): IsoDate {
  return toIsoDate(now.getTime());
}

/**
 * Every date in [start, end], inclusive. Empty when start > end.
 */
export function dateRange(start: IsoDate, end: IsoDate): IsoDate[] {
  const dates: IsoDate[] = [];
  for (let d = start; d <= end; d = addDays(d, 1)) {
    dates.push(d);
  }
  return dates;
}
