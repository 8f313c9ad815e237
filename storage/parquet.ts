/**
 * Parquet codec for datasets
 *
 * Schema:
 *   date              DATE    (days since epoch)
 *   fear_greed_score  DOUBLE  optional
 *
 * Files with the older `Date` / `Fear Greed` columns are read as well.
 */

import { ParquetReader, ParquetSchema, ParquetWriter } from '@dsnp/parquetjs';
import type { Dataset, IsoDate, SentimentRecord } from '../core/types';
import {
  DATE_COLUMN,
  LEGACY_DATE_COLUMN,
  LEGACY_SCORE_COLUMN,
  SCORE_COLUMN,
  isValidScore,
} from '../core/types';
import { fromEpochDays, isIsoDate, toIsoDate, toTimestamp } from '../core/dates';
import { SchemaError } from '../core/errors';

export const FNG_PARQUET_SCHEMA = new ParquetSchema({
  [DATE_COLUMN]: { type: 'DATE' },
  [SCORE_COLUMN]: { type: 'DOUBLE', optional: true },
});

/**
 * Write records in order. The writer is closed (and the footer flushed)
 * even when an append fails.
 */
export async function writeParquet(dataset: Dataset, filePath: string): Promise<void> {
  const writer = await ParquetWriter.openFile(FNG_PARQUET_SCHEMA, filePath);
  try {
    for (const record of dataset) {
      const row: Record<string, Date | number> = { [DATE_COLUMN]: new Date(toTimestamp(record.date)) };
      if (record.score !== null) row[SCORE_COLUMN] = record.score;
      await writer.appendRow(row);
    }
  } finally {
    await writer.close();
  }
}

/**
 * Read every row, in file order.
 * Throws SchemaError when a column is missing or a value has the wrong type.
 */
export async function readParquet(filePath: string): Promise<SentimentRecord[]> {
  const reader = await ParquetReader.openFile(filePath);
  try {
    const { dateColumn, scoreColumn } = resolveColumns(Object.keys(reader.getSchema().fields), filePath);

    const records: SentimentRecord[] = [];
    const cursor = reader.getCursor();
    let rowNo = 0;

    while (true) {
      const row: unknown = await cursor.next();
      if (!row) break;
      rowNo++;
      if (typeof row !== 'object') {
        throw new SchemaError(`${filePath}: row ${rowNo} is not a record`);
      }

      const date = readDate(field(row, dateColumn));
      if (date === null) {
        throw new SchemaError(`${filePath}: row ${rowNo} has an invalid ${dateColumn}`);
      }

      const score = readScore(field(row, scoreColumn));
      if (score === undefined) {
        throw new SchemaError(`${filePath}: row ${rowNo} has an invalid ${scoreColumn}`);
      }

      records.push({ date, score });
    }

    return records;
  } finally {
    await reader.close();
  }
}

function resolveColumns(columns: string[], filePath: string): { dateColumn: string; scoreColumn: string } {
  if (!columns.includes(DATE_COLUMN) && !columns.includes(SCORE_COLUMN)
    && columns.includes(LEGACY_DATE_COLUMN) && columns.includes(LEGACY_SCORE_COLUMN)) {
    return { dateColumn: LEGACY_DATE_COLUMN, scoreColumn: LEGACY_SCORE_COLUMN };
  }

  const missing = [DATE_COLUMN, SCORE_COLUMN].filter(c => !columns.includes(c));
  if (missing.length > 0) {
    throw new SchemaError(`${filePath}: missing column(s) ${missing.join(', ')}`);
  }
  return { dateColumn: DATE_COLUMN, scoreColumn: SCORE_COLUMN };
}

function field(row: object, column: string): unknown {
  const entry = Object.entries(row).find(([key]) => key === column);
  return entry === undefined ? undefined : entry[1];
}

function readDate(value: unknown): IsoDate | null {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : toIsoDate(value.getTime());
  }
  if (typeof value === 'number' && Number.isInteger(value)) {
    return fromEpochDays(value);
  }
  if (typeof value === 'string' && isIsoDate(value)) {
    return value;
  }
  return null;
}

/** undefined means "present but invalid"; null means absent */
function readScore(value: unknown): number | null | undefined {
  if (value === null || value === undefined) return null;
  const score = typeof value === 'bigint' ? Number(value) : value;
  if (typeof score !== 'number' || !isValidScore(score)) return undefined;
  return score;
}
