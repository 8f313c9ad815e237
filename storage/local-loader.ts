/**
 * Local Loader
 * Reads a previously saved dataset (CSV or Parquet) back into records
 */

import * as fs from 'fs';
import * as path from 'path';
import type { Dataset, OutputFormat, SentimentRecord } from '../core/types';
import { compareByDate } from '../core/types';
import { FileNotFoundError, FngError, SchemaError } from '../core/errors';
import { createLogger } from '../core/logger';
import { parseCsv } from './csv';
import { readParquet } from './parquet';

const log = createLogger('LocalLoader');

/** `.parquet` files are Parquet; anything else is read as CSV */
export function detectFormat(filePath: string): OutputFormat {
  return path.extname(filePath).toLowerCase() === '.parquet' ? 'parquet' : 'csv';
}

/**
 * Load a dataset file. Duplicate dates keep the last row; the result is
 * sorted ascending by date.
 */
export async function loadDataset(filePath: string): Promise<Dataset> {
  if (!fs.existsSync(filePath)) {
    throw new FileNotFoundError(filePath);
  }

  const format = detectFormat(filePath);
  const rows = format === 'parquet'
    ? await readParquetFile(filePath)
    : parseCsv(readTextFile(filePath), filePath);

  const byDate = new Map<string, SentimentRecord>();
  for (const row of rows) {
    byDate.set(row.date, row);
  }
  if (byDate.size < rows.length) {
    log.warn('load.duplicates', { file: filePath, dropped: rows.length - byDate.size });
  }

  const records = Array.from(byDate.values()).sort(compareByDate);
  log.info('load.done', { file: filePath, format, records: records.length });
  return records;
}

function readTextFile(filePath: string): string {
  try {
    return fs.readFileSync(filePath, 'utf-8');
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new SchemaError(`${filePath}: cannot be read as text: ${reason}`);
  }
}

async function readParquetFile(filePath: string): Promise<SentimentRecord[]> {
  try {
    return await readParquet(filePath);
  } catch (err) {
    if (err instanceof FngError) throw err;
    const reason = err instanceof Error ? err.message : String(err);
    throw new SchemaError(`${filePath}: not a readable parquet file: ${reason}`);
  }
}
