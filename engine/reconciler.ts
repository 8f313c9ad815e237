/**
 * Reconciler
 *
 * Merges local and freshly fetched records into one dataset covering the
 * requested range, one record per calendar date, ascending, every score filled
 * under the active missing-value policy.
 */

import type {
  Dataset,
  DateRange,
  IsoDate,
  MissingValuePolicy,
  SentimentRecord,
} from '../core/types';
import { compareByDate, isValidScore } from '../core/types';
import { addDays, dateRange, isIsoDate } from '../core/dates';
import { InvalidDateRangeError, SchemaError } from '../core/errors';

export interface ReconcileResult {
  /** One record per resolved date in the range, ascending */
  records: SentimentRecord[];
  /**
   * Dates that could not be filled (backfill with no prior score).
   * They are not present in `records`.
   */
  unresolved: IsoDate[];
}

/**
 * Combine local and remote records, one per date, ascending.
 * A remote score replaces the local one; a remote record without a score
 * leaves an existing local score in place.
 */
export function mergeRecords(local: Dataset, remote: Dataset): SentimentRecord[] {
  const byDate = new Map<IsoDate, number | null>();

  for (const record of local) {
    byDate.set(record.date, record.score);
  }
  for (const record of remote) {
    if (record.score !== null || !byDate.has(record.date)) {
      byDate.set(record.date, record.score);
    }
  }

  return Array.from(byDate, ([date, score]) => ({ date, score })).sort(compareByDate);
}

/**
 * Build the canonical dataset for `range`.
 *
 * zero:     dates without a score get 0.
 * backfill: dates without a score take the latest earlier score, including one
 *           dated before range.start; leading dates with nothing earlier are
 *           reported in `unresolved`.
 *
 * Throws InvalidDateRangeError when either end of `range` is not YYYY-MM-DD.
 */
export function reconcile(
  remote: Dataset,
  local: Dataset | null,
  range: DateRange,
  policy: MissingValuePolicy
): ReconcileResult {
  for (const date of [range.start, range.end]) {
    if (!isIsoDate(date)) {
      throw new InvalidDateRangeError(`Invalid range bound "${date}". Use YYYY-MM-DD`);
    }
  }
  if (range.start > range.end) {
    return { records: [], unresolved: [] };
  }

  const merged = mergeRecords(local ?? [], remote);
  const scores = new Map<IsoDate, number | null>(merged.map(r => [r.date, r.score]));

  let carry: number | null = null;
  if (policy === 'backfill') {
    for (const record of merged) {
      if (record.date >= range.start) break;
      if (record.score !== null) carry = record.score;
    }
  }

  const records: SentimentRecord[] = [];
  const unresolved: IsoDate[] = [];

  for (const date of dateRange(range.start, range.end)) {
    const score = scores.get(date) ?? null;

    if (score !== null) {
      records.push({ date, score });
      carry = score;
    } else if (policy === 'zero') {
      records.push({ date, score: 0 });
    } else if (carry !== null) {
      records.push({ date, score: carry });
    } else {
      unresolved.push(date);
    }
  }

  return { records, unresolved };
}

/**
 * Check the persisted-dataset invariants: dates inside `range`, strictly
 * ascending with no gaps, every score present and within 0-100.
 */
export function assertCompleteDataset(dataset: Dataset, range: DateRange): void {
  let prev: IsoDate | null = null;

  for (const record of dataset) {
    if (record.date < range.start || record.date > range.end) {
      throw new SchemaError(`Record ${record.date} is outside ${range.start}..${range.end}`);
    }
    if (prev !== null && record.date !== addDays(prev, 1)) {
      throw new SchemaError(`Records are not contiguous: ${prev} is followed by ${record.date}`);
    }
    if (record.score === null || !isValidScore(record.score)) {
      throw new SchemaError(`Record ${record.date} has no valid score`);
    }
    prev = record.date;
  }
}
