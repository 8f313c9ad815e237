/**
 * Core Types
 * Canonical record schema shared by the fetcher, loader, reconciler and persister
 */

// =============================================================================
// RECORD MODEL
// =============================================================================

/** Calendar date in YYYY-MM-DD form (UTC calendar, no time of day) */
export type IsoDate = string;

/**
 * One day's Fear & Greed observation.
 * `score` is 0-100 inclusive, or null when the source had no value for the date.
 */
export interface SentimentRecord {
  date: IsoDate;
  score: number | null;
}

/** Ordered sequence of records, ascending by date once reconciled */
export type Dataset = readonly SentimentRecord[];

/** Inclusive calendar range */
export interface DateRange {
  start: IsoDate;
  end: IsoDate;
}

// =============================================================================
// POLICIES & FORMATS
// =============================================================================

/**
 * How dates without a score are filled:
 *   zero     - literal 0
 *   backfill - carry the most recent prior score forward
 */
export type MissingValuePolicy = 'zero' | 'backfill';

export const OUTPUT_FORMATS = ['parquet', 'csv'] as const;
export type OutputFormat = typeof OUTPUT_FORMATS[number];

// =============================================================================
// COLUMN NAMES
// =============================================================================

export const DATE_COLUMN = 'date';
export const SCORE_COLUMN = 'fear_greed_score';

// Header written by earlier releases of the scraper; still accepted on load
export const LEGACY_DATE_COLUMN = 'Date';
export const LEGACY_SCORE_COLUMN = 'Fear Greed';

export const MIN_SCORE = 0;
export const MAX_SCORE = 100;

export function compareByDate(a: SentimentRecord, b: SentimentRecord): number {
  return a.date < b.date ? -1 : a.date > b.date ? 1 : 0;
}

export function isValidScore(value: number): boolean {
  return Number.isFinite(value) && value >= MIN_SCORE && value <= MAX_SCORE;
}
