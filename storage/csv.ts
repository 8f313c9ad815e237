/**
 * CSV codec for datasets
 *
 *   date,fear_greed_score
 *   2024-01-01,45
 *   2024-01-02,
 *
 * An empty score cell is a missing value. Fields may be wrapped in double
 * quotes; embedded commas are not supported since no column needs them.
 */

import type { Dataset, SentimentRecord } from '../core/types';
import {
  DATE_COLUMN,
  SCORE_COLUMN,
  LEGACY_DATE_COLUMN,
  LEGACY_SCORE_COLUMN,
  isValidScore,
} from '../core/types';
import { isIsoDate } from '../core/dates';
import { SchemaError } from '../core/errors';

const NUMBER_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Serialize records in the order given. Scores use their shortest exact
 * decimal form so they reload unchanged.
 */
export function formatCsv(dataset: Dataset): string {
  const lines = [[DATE_COLUMN, SCORE_COLUMN].join(',')];
  for (const record of dataset) {
    lines.push([record.date, record.score === null ? '' : String(record.score)].join(','));
  }
  return lines.join('\n') + '\n';
}

/**
 * Parse CSV text into records, in file order.
 * `source` only names the file in error messages.
 */
export function parseCsv(text: string, source: string): SentimentRecord[] {
  const lines = text.replace(/^\uFEFF/, '').split(/\r?\n/);
  const headerIdx = lines.findIndex(l => l.trim() !== '');
  if (headerIdx === -1) {
    throw new SchemaError(`${source}: file is empty (expected a header row)`);
  }

  const header = splitRow(lines[headerIdx]);
  const { dateIdx, scoreIdx } = resolveColumns(header, source);

  const records: SentimentRecord[] = [];
  for (let i = headerIdx + 1; i < lines.length; i++) {
    if (lines[i].trim() === '') continue;
    const lineNo = i + 1;
    const cells = splitRow(lines[i]);

    const rawDate = cells[dateIdx] ?? '';
    const date = normalizeDate(rawDate);
    if (date === null) {
      throw new SchemaError(`${source}:${lineNo}: invalid date "${rawDate}" (expected YYYY-MM-DD)`);
    }

    records.push({ date, score: parseScore(cells[scoreIdx] ?? '', `${source}:${lineNo}`) });
  }

  return records;
}

function splitRow(line: string): string[] {
  return line.split(',').map(cell => {
    const trimmed = cell.trim();
    return trimmed.length >= 2 && trimmed.startsWith('"') && trimmed.endsWith('"')
      ? trimmed.slice(1, -1)
      : trimmed;
  });
}

function resolveColumns(header: string[], source: string): { dateIdx: number; scoreIdx: number } {
  let dateIdx = header.indexOf(DATE_COLUMN);
  let scoreIdx = header.indexOf(SCORE_COLUMN);

  if (dateIdx === -1 && scoreIdx === -1) {
    dateIdx = header.indexOf(LEGACY_DATE_COLUMN);
    scoreIdx = header.indexOf(LEGACY_SCORE_COLUMN);
  }

  const missing: string[] = [];
  if (dateIdx === -1) missing.push(DATE_COLUMN);
  if (scoreIdx === -1) missing.push(SCORE_COLUMN);
  if (missing.length > 0) {
    throw new SchemaError(`${source}: missing column(s) ${missing.join(', ')} in header "${header.join(',')}"`);
  }

  return { dateIdx, scoreIdx };
}

/** Accepts YYYY-MM-DD, optionally followed by a time part, which is dropped */
function normalizeDate(raw: string): string | null {
  const date = raw.slice(0, 10);
  const rest = raw.slice(10);
  if (rest !== '' && !/^[T ]/.test(rest)) return null;
  return isIsoDate(date) ? date : null;
}

function parseScore(raw: string, where: string): number | null {
  if (raw === '') return null;
  if (!NUMBER_PATTERN.test(raw)) {
    throw new SchemaError(`${where}: score "${raw}" is not a number`);
  }
  const score = Number(raw);
  if (!isValidScore(score)) {
    throw new SchemaError(`${where}: score ${raw} is outside 0-100`);
  }
  return score;
}
