/**
 * Pipeline Errors
 *
 * Every failure the pipeline can report carries a string `kind` so the
 * front-end can render it without instanceof checks.
 */

import type { IsoDate } from './types';

export type FngErrorKind =
  | 'NetworkError'
  | 'ParseError'
  | 'SchemaError'
  | 'EmptyResultError'
  | 'EmptyDatasetError'
  | 'IOError'
  | 'UnsupportedFormatError'
  | 'InvalidDateRangeError'
  | 'FileNotFoundError'
  | 'UnresolvedDatesError'
  | 'ConfigError';

export class FngError extends Error {
  readonly kind: FngErrorKind;

  constructor(kind: FngErrorKind, message: string) {
    super(message);
    this.kind = kind;
    this.name = kind;
  }
}

/** Transport failure, timeout, or non-2xx status after retries */
export class NetworkError extends FngError {
  readonly status?: number;

  constructor(message: string, status?: number) {
    super('NetworkError', message);
    this.status = status;
  }
}

/** Upstream response body does not match the expected shape */
export class ParseError extends FngError {
  constructor(message: string) {
    super('ParseError', message);
  }
}

/** Local dataset has missing or mistyped columns */
export class SchemaError extends FngError {
  constructor(message: string) {
    super('SchemaError', message);
  }
}

export class EmptyResultError extends FngError {
  constructor(message: string) {
    super('EmptyResultError', message);
  }
}

export class EmptyDatasetError extends FngError {
  constructor(message: string = 'Dataset has no scored records') {
    super('EmptyDatasetError', message);
  }
}

export class IOError extends FngError {
  readonly path: string;

  constructor(message: string, path: string) {
    super('IOError', message);
    this.path = path;
  }
}

export class UnsupportedFormatError extends FngError {
  constructor(format: string) {
    super('UnsupportedFormatError', `Unsupported format: ${format} (expected parquet or csv)`);
  }
}

export class InvalidDateRangeError extends FngError {
  constructor(message: string) {
    super('InvalidDateRangeError', message);
  }
}

export class FileNotFoundError extends FngError {
  readonly path: string;

  constructor(path: string) {
    super('FileNotFoundError', `File not found: ${path}`);
    this.path = path;
  }
}

/** Backfill could not find a prior score for these dates */
export class UnresolvedDatesError extends FngError {
  readonly dates: IsoDate[];

  constructor(dates: IsoDate[]) {
    const preview = dates.length > 5
      ? `${dates.slice(0, 5).join(', ')} ... (${dates.length} total)`
      : dates.join(', ');
    super('UnresolvedDatesError', `No prior score to backfill: ${preview}`);
    this.dates = dates;
  }
}

/** Out-of-range configuration knob */
export class ConfigError extends FngError {
  constructor(message: string) {
    super('ConfigError', message);
  }
}

export function isFngError(err: unknown): err is FngError {
  return err instanceof FngError;
}
