/**
 * Dataset Summary
 * Descriptive statistics over a reconciled dataset, plus the console report
 */

import type { Dataset, IsoDate, SentimentRecord } from '../core/types';
import { EmptyDatasetError } from '../core/errors';

export const SENTIMENT_BUCKETS = ['extremeFear', 'fear', 'greed', 'extremeGreed'] as const;
export type SentimentBucket = typeof SENTIMENT_BUCKETS[number];

export const BUCKET_LABELS: Record<SentimentBucket, string> = {
  extremeFear: 'Extreme Fear',
  fear: 'Fear',
  greed: 'Greed',
  extremeGreed: 'Extreme Greed',
};

export interface DatasetSummary {
  count: number;
  mean: number;
  min: number;
  max: number;
  firstDate: IsoDate;
  lastDate: IsoDate;
  latest: { date: IsoDate; score: number };
  /** Zero scores, which under zero-fill usually mark missing days */
  zeroCount: number;
  buckets: Record<SentimentBucket, number>;
}

/**
 * [0,25) Extreme Fear, [25,50) Fear, [50,75) Greed, [75,100] Extreme Greed
 */
export function classifyScore(score: number): SentimentBucket {
  if (score < 25) return 'extremeFear';
  if (score < 50) return 'fear';
  if (score < 75) return 'greed';
  return 'extremeGreed';
}

/**
 * Compute statistics over the scored records of `dataset`.
 * Records without a score are skipped; none left → EmptyDatasetError.
 */
export function summarize(dataset: Dataset): DatasetSummary {
  const scored = dataset.filter(
    (r): r is SentimentRecord & { score: number } => r.score !== null
  );
  if (scored.length === 0) {
    throw new EmptyDatasetError();
  }

  const buckets: Record<SentimentBucket, number> = {
    extremeFear: 0,
    fear: 0,
    greed: 0,
    extremeGreed: 0,
  };

  let sum = 0;
  let min = Infinity;
  let max = -Infinity;
  let zeroCount = 0;
  let first = scored[0];
  let latest = scored[0];

  for (const record of scored) {
    sum += record.score;
    min = Math.min(min, record.score);
    max = Math.max(max, record.score);
    if (record.score === 0) zeroCount++;
    buckets[classifyScore(record.score)]++;
    if (record.date < first.date) first = record;
    if (record.date >= latest.date) latest = record;
  }

  return {
    count: scored.length,
    mean: sum / scored.length,
    min,
    max,
    firstDate: first.date,
    lastDate: latest.date,
    latest: { date: latest.date, score: latest.score },
    zeroCount,
    buckets,
  };
}

// =============================================================================
// CONSOLE OUTPUT
// =============================================================================

/**
 * Render the summary block and a preview of the most recent records.
 */
export function formatSummary(summary: DatasetSummary, recent: Dataset = []): string {
  const lines: string[] = [];
  const row = (label: string, value: string) => lines.push(`   ${label.padEnd(22)}${value}`);

  lines.push('', '📊 Fear & Greed Index Summary', '═'.repeat(50));
  row('Total Records:', String(summary.count));
  row('Date Range:', `${summary.firstDate} to ${summary.lastDate}`);
  row('Average F&G:', summary.mean.toFixed(2));
  row('Min F&G:', String(summary.min));
  row('Max F&G:', String(summary.max));
  row('Missing/Zero Values:', String(summary.zeroCount));
  row('Latest:', `${summary.latest.score} on ${summary.latest.date} (${BUCKET_LABELS[classifyScore(summary.latest.score)]})`);

  lines.push('', '🎯 Sentiment Buckets', '─'.repeat(50));
  for (const bucket of SENTIMENT_BUCKETS) {
    row(`${BUCKET_LABELS[bucket]}:`, String(summary.buckets[bucket]));
  }

  if (recent.length > 0) {
    lines.push('', `🕒 Recent Data (last ${recent.length} records)`, '─'.repeat(50));
    for (const record of recent) {
      row(record.date, record.score === null ? 'n/a' : String(record.score));
    }
  }

  return lines.join('\n');
}

export function printSummary(summary: DatasetSummary, recent: Dataset = []): void {
  console.log(formatSummary(summary, recent));
}
