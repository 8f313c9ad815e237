/**
 * Persister
 * Writes a reconciled dataset to disk as CSV or Parquet
 */

import * as fs from 'fs';
import * as path from 'path';
import type { Dataset, OutputFormat } from '../core/types';
import { OUTPUT_FORMATS } from '../core/types';
import { FngError, IOError, UnsupportedFormatError } from '../core/errors';
import { createLogger } from '../core/logger';
import { formatCsv } from './csv';
import { writeParquet } from './parquet';

const log = createLogger('Persister');

function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some(f => f === value);
}

/**
 * Case-insensitive format selector check.
 */
export function parseOutputFormat(value: string): OutputFormat {
  const normalized = value.trim().toLowerCase();
  if (!isOutputFormat(normalized)) {
    throw new UnsupportedFormatError(value);
  }
  return normalized;
}

/**
 * Replace the extension of `filePath` with the one matching `format`
 * (fng_data → fng_data.csv, out.parquet → out.csv).
 */
export function withFormatExtension(filePath: string, format: OutputFormat): string {
  const ext = `.${format}`;
  const current = path.extname(filePath);
  if (current.toLowerCase() === ext) return filePath;
  return current === '' ? filePath + ext : filePath.slice(0, -current.length) + ext;
}

/**
 * Write `dataset` to `filePath`, overwriting any existing file.
 * The parent directory must already exist.
 */
export async function saveDataset(dataset: Dataset, filePath: string, format: string): Promise<void> {
  const resolved = parseOutputFormat(format);

  const dir = path.dirname(path.resolve(filePath));
  if (!fs.existsSync(dir) || !fs.statSync(dir).isDirectory()) {
    throw new IOError(`Output directory does not exist: ${dir}`, filePath);
  }

  try {
    if (resolved === 'parquet') {
      await writeParquet(dataset, filePath);
    } else {
      fs.writeFileSync(filePath, formatCsv(dataset));
    }
  } catch (err) {
    if (err instanceof FngError) throw err;
    const reason = err instanceof Error ? err.message : String(err);
    throw new IOError(`Failed to write ${filePath}: ${reason}`, filePath);
  }

  log.info('save.done', { file: filePath, format: resolved, records: dataset.length });
}
