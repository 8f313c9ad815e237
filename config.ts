/**
 * Fear & Greed Scraper - Configuration
 * Resolves defaults, environment (.env) and command-line overrides into one
 * explicit config object handed to the pipeline
 */

import type { IsoDate, MissingValuePolicy, OutputFormat } from './core/types';
import { isIsoDate, todayIso } from './core/dates';
import { ConfigError, InvalidDateRangeError } from './core/errors';
import { CNN_GRAPHDATA_URL, DEFAULT_USER_AGENT } from './fetchers';
import { parseOutputFormat, withFormatExtension } from './storage/persister';

export interface FngConfig {
  // Date range (inclusive)
  startDate: IsoDate;
  endDate: IsoDate;

  // Files
  inputPath?: string;           // Existing dataset to merge with (CSV or Parquet)
  outputPath: string;           // Extension always matches `format`
  format: OutputFormat;

  // Reconciliation
  policy: MissingValuePolicy;
  dropUnresolved: boolean;      // Drop leading dates backfill cannot fill instead of failing

  // Output
  showSummary: boolean;

  // Upstream API
  baseUrl: string;
  userAgent: string;
  timeoutMs: number;
  retries: number;
  retryDelayMs: number;
}

/** Command-line overrides; anything unset falls back to env, then defaults */
export interface FngOptions {
  startDate?: string;
  endDate?: string;
  inputPath?: string;
  outputPath?: string;
  format?: string;
  backfill?: boolean;
  showSummary?: boolean;
  dropUnresolved?: boolean;
}

// First day of CNN's published history
export const DEFAULT_START_DATE = '2020-09-19';
export const DEFAULT_OUTPUT_PATH = 'fng_data.parquet';

export function loadFngConfig(
  options: FngOptions = {},
  env: NodeJS.ProcessEnv = process.env
): FngConfig {
  const format = parseOutputFormat(options.format ?? env.FNG_FORMAT ?? 'parquet');
  const policy: MissingValuePolicy = options.backfill === undefined
    ? parsePolicy(env.FNG_POLICY)
    : options.backfill ? 'backfill' : 'zero';
  const inputPath = options.inputPath ?? (env.FNG_INPUT || undefined);

  const config: FngConfig = {
    startDate: options.startDate ?? env.FNG_START_DATE ?? DEFAULT_START_DATE,
    endDate: options.endDate ?? env.FNG_END_DATE ?? todayIso(),

    inputPath,
    outputPath: withFormatExtension(options.outputPath ?? env.FNG_OUTPUT ?? DEFAULT_OUTPUT_PATH, format),
    format,

    policy,
    dropUnresolved: options.dropUnresolved ?? parseBool(env.FNG_DROP_UNRESOLVED, false),

    showSummary: options.showSummary ?? parseBool(env.FNG_SUMMARY, true),

    baseUrl: env.FNG_BASE_URL || CNN_GRAPHDATA_URL,
    userAgent: env.FNG_USER_AGENT || DEFAULT_USER_AGENT,
    timeoutMs: parseInt(env.FNG_TIMEOUT_MS || '15000'),
    retries: parseInt(env.FNG_RETRIES || '3'),
    retryDelayMs: parseInt(env.FNG_RETRY_DELAY_MS || '1000'),
  };

  validateFngConfig(config);
  return config;
}

export function validateFngConfig(config: FngConfig): void {
  for (const [label, value] of [['start', config.startDate], ['end', config.endDate]]) {
    if (!isIsoDate(value)) {
      throw new InvalidDateRangeError(`Invalid ${label} date "${value}". Use YYYY-MM-DD`);
    }
  }
  if (config.startDate > config.endDate) {
    throw new InvalidDateRangeError(`Start date ${config.startDate} is after end date ${config.endDate}`);
  }

  if (!Number.isInteger(config.timeoutMs) || config.timeoutMs <= 0) {
    throw new ConfigError('FNG_TIMEOUT_MS must be a positive integer');
  }
  if (!Number.isInteger(config.retries) || config.retries < 0) {
    throw new ConfigError('FNG_RETRIES must be a non-negative integer');
  }
  if (!Number.isInteger(config.retryDelayMs) || config.retryDelayMs < 0) {
    throw new ConfigError('FNG_RETRY_DELAY_MS must be a non-negative integer');
  }
}

export function logFngConfig(config: FngConfig): void {
  console.log(`\n😨 Fear and Greed Index Scraper`);
  console.log(`   Date range: ${config.startDate} to ${config.endDate}`);
  if (config.inputPath) {
    console.log(`   Input: ${config.inputPath}`);
  }
  console.log(`   Output: ${config.outputPath} (${config.format.toUpperCase()})`);
  console.log(`   Backfill: ${config.policy === 'backfill' ? 'Enabled' : 'Disabled'}`);
  console.log();
}

function parsePolicy(value: string | undefined): MissingValuePolicy {
  if (value === undefined || value.trim() === '') return 'zero';
  const policy = value.trim().toLowerCase();
  if (policy === 'zero' || policy === 'backfill') return policy;
  throw new ConfigError(`FNG_POLICY must be zero or backfill, got "${value}"`);
}

function parseBool(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value === '') return fallback;
  return ['1', 'true', 'yes', 'on'].includes(value.toLowerCase());
}
