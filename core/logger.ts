/**
 * Logger
 *
 * Leveled, timestamped, structured logging for the scraper pipeline.
 *
 * Env vars:
 *   LOG_LEVEL  = error | warn | info | debug | trace  (default: per mode)
 *   LOG_FORMAT = pretty | json                        (default: per mode)
 *   LOG_MODE   = dev | prod                           (default: dev)
 *
 * Usage:
 *   import { createLogger } from './core/logger';
 *   const log = createLogger('Fetcher');
 *   log.info('fetch.done', { records: 812, latencyMs: 340 });
 */

import * as crypto from 'crypto';
import axios from 'axios';

// =============================================================================
// TYPES
// =============================================================================

export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'trace';
export type LogFormat = 'pretty' | 'json';
export type LogMode = 'dev' | 'prod';

type LogData = Record<string, unknown>;
type LogFn = (event: string, data?: LogData) => void;

export interface Logger {
  error: LogFn;
  warn: LogFn;
  info: LogFn;
  debug: LogFn;
  trace: LogFn;
  isEnabled: (level: LogLevel) => boolean;
  /** Create a child logger with additional default fields */
  child: (fields: LogData) => Logger;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
  trace: 4,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

// =============================================================================
// REDACTION
// =============================================================================

const REDACT_KEYS = new Set(['authorization', 'cookie', 'apikey', 'secret', 'token', 'password']);

const MAX_STRING_LENGTH = 200;
const MAX_DEPTH = 3;
const MAX_ARRAY_ITEMS = 10;

function sanitizeValue(key: string, value: unknown, depth: number): unknown {
  if (REDACT_KEYS.has(key.toLowerCase())) return '[REDACTED]';
  if (value === null || value === undefined) return value;

  if (typeof value === 'string') {
    return value.length > MAX_STRING_LENGTH
      ? value.slice(0, MAX_STRING_LENGTH - 12) + ' [truncated]'
      : value;
  }

  if (typeof value === 'number' || typeof value === 'boolean') return value;

  if (depth >= MAX_DEPTH) return '[depth limit]';

  if (Array.isArray(value)) {
    const items = value.slice(0, MAX_ARRAY_ITEMS).map((v, i) => sanitizeValue(String(i), v, depth + 1));
    if (value.length > MAX_ARRAY_ITEMS) items.push(`... ${value.length - MAX_ARRAY_ITEMS} more`);
    return items;
  }

  if (typeof value === 'object') {
    const result: LogData = {};
    for (const [k, v] of Object.entries(value)) {
      result[k] = sanitizeValue(k, v, depth + 1);
    }
    return result;
  }

  return String(value);
}

function sanitizeData(data: LogData): LogData {
  const result: LogData = {};
  for (const [k, v] of Object.entries(data)) {
    result[k] = sanitizeValue(k, v, 0);
  }
  return result;
}

// =============================================================================
// CONFIGURATION
// =============================================================================

const MODE_PRESETS: Record<LogMode, { level: LogLevel; format: LogFormat }> = {
  dev:  { level: 'info', format: 'pretty' },
  prod: { level: 'info', format: 'json' },
};

function resolveMode(): LogMode {
  return process.env.LOG_MODE?.toLowerCase() === 'prod' ? 'prod' : 'dev';
}

function resolveLevel(mode: LogMode): LogLevel {
  const explicit = process.env.LOG_LEVEL?.toLowerCase();
  if (explicit && isLogLevel(explicit)) return explicit;
  return MODE_PRESETS[mode].level;
}

function resolveFormat(mode: LogMode): LogFormat {
  const explicit = process.env.LOG_FORMAT?.toLowerCase();
  if (explicit === 'pretty' || explicit === 'json') return explicit;
  return MODE_PRESETS[mode].format;
}

const mode = resolveMode();
let currentLevel: LogLevel = resolveLevel(mode);
const currentFormat: LogFormat = resolveFormat(mode);

/** Process-scoped run ID for correlation */
export const RUN_ID: string = crypto.randomUUID().slice(0, 8);

/**
 * Override the log level at runtime.
 * Returns the previous level.
 */
export function setLogLevel(level: LogLevel): LogLevel {
  const prev = currentLevel;
  currentLevel = level;
  return prev;
}

// =============================================================================
// FORMATTING
// =============================================================================

const LEVEL_TAG: Record<LogLevel, string> = {
  error: 'ERR ',
  warn:  'WARN',
  info:  'INFO',
  debug: 'DBG ',
  trace: 'TRC ',
};

export function formatPretty(
  ts: string,
  level: LogLevel,
  module: string,
  event: string,
  data: LogData,
): string {
  let line = `${ts} [${LEVEL_TAG[level]}] [${module}] ${event}`;

  const pairs: string[] = [];
  for (const [k, v] of Object.entries(data)) {
    if (v === undefined || v === null) continue;
    pairs.push(`${k}=${typeof v === 'object' ? JSON.stringify(v) : String(v)}`);
  }
  if (pairs.length > 0) {
    line += ' | ' + pairs.join(' ');
  }

  return line;
}

export function formatJson(
  ts: string,
  level: LogLevel,
  module: string,
  event: string,
  data: LogData,
): string {
  return JSON.stringify({ ts, level, module, event, ...data });
}

// =============================================================================
// CORE EMIT
// =============================================================================

function emit(level: LogLevel, module: string, event: string, baseFields: LogData, data?: LogData): void {
  if (LEVEL_ORDER[level] > LEVEL_ORDER[currentLevel]) return;

  const merged: LogData = data ? { ...baseFields, ...sanitizeData(data) } : { ...baseFields };
  if (currentFormat === 'json') merged.runId = RUN_ID;

  const ts = new Date().toISOString();
  const line = currentFormat === 'json'
    ? formatJson(ts, level, module, event, merged)
    : formatPretty(ts, level, module, event, merged);

  // stdout is reserved for the summary output; diagnostics go to stderr
  if (level === 'error') {
    console.error(line);
  } else {
    console.warn(line);
  }
}

function makeLogger(module: string, baseFields: LogData): Logger {
  const logFn = (level: LogLevel): LogFn =>
    (event, data) => emit(level, module, event, baseFields, data);

  return {
    error: logFn('error'),
    warn: logFn('warn'),
    info: logFn('info'),
    debug: logFn('debug'),
    trace: logFn('trace'),
    isEnabled: (level) => LEVEL_ORDER[level] <= LEVEL_ORDER[currentLevel],
    child: (fields) => makeLogger(module, { ...baseFields, ...fields }),
  };
}

/**
 * Create a logger scoped to a module name.
 */
export function createLogger(module: string, fields?: LogData): Logger {
  return makeLogger(module, fields ?? {});
}

// =============================================================================
// SAFE ERROR EXTRACTION
// =============================================================================

/**
 * Extract structured error info from an axios error or generic Error.
 * Never dumps raw response bodies.
 */
export function safeErrorData(err: unknown): LogData {
  if (err === null || err === undefined) return { error: 'unknown' };

  if (axios.isAxiosError(err)) {
    const result: LogData = { error: err.message.slice(0, MAX_STRING_LENGTH) };
    if (err.response) result.httpStatus = err.response.status;
    if (err.config?.url) result.url = err.config.url.slice(0, MAX_STRING_LENGTH);
    if (err.code) result.errorCode = err.code;
    return result;
  }

  if (err instanceof Error) {
    const result: LogData = { error: err.message.slice(0, MAX_STRING_LENGTH) };
    if ('kind' in err && typeof err.kind === 'string') result.kind = err.kind;
    return result;
  }

  return { error: String(err).slice(0, MAX_STRING_LENGTH) };
}
