/**
 * CNN Fear & Greed Historical Fetcher
 * Fetches the daily Fear & Greed Index series from CNN's dataviz API
 *
 * API: GET https://production.dataviz.cnn.io/index/fearandgreed/graphdata/{YYYY-MM-DD}
 * Returns every point from the anchor date up to today in one response:
 *   {
 *     fear_and_greed: { score, rating, timestamp, ... },
 *     fear_and_greed_historical: { data: [{ x: epochMs, y: score, rating }, ...] },
 *     market_momentum_sp500: { ... }, ...
 *   }
 * Only fear_and_greed_historical.data is read; other sections are ignored.
 */

import axios from 'axios';
import type { Dataset, IsoDate, SentimentRecord } from '../core/types';
import { compareByDate, isValidScore } from '../core/types';
import { toIsoDate } from '../core/dates';
import { EmptyResultError, NetworkError, ParseError } from '../core/errors';
import { createLogger, safeErrorData } from '../core/logger';

export const CNN_GRAPHDATA_URL = 'https://production.dataviz.cnn.io/index/fearandgreed/graphdata/';

// The endpoint answers 418 to non-browser user agents
export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36';

export interface FetchOptions {
  baseUrl: string;
  userAgent: string;
  timeoutMs: number;
  /** Extra attempts after the first one */
  retries: number;
  /** Base delay; doubles on each retry */
  retryDelayMs: number;
}

export const DEFAULT_FETCH_OPTIONS: FetchOptions = {
  baseUrl: CNN_GRAPHDATA_URL,
  userAgent: DEFAULT_USER_AGENT,
  timeoutMs: 15000,
  retries: 3,
  retryDelayMs: 1000,
};

const log = createLogger('CnnFetcher');

/**
 * Fetch the Fear & Greed series for [start, end], one record per date.
 *
 * Points outside the range are dropped; when the API returns several points
 * for one date (today's intraday update), the last one wins. A range the
 * service has no points for (weekends, holidays) comes back empty; only an
 * empty series is an EmptyResultError.
 */
export async function fetchFearGreedHistory(
  start: IsoDate,
  end: IsoDate,
  options: Partial<FetchOptions> = {}
): Promise<Dataset> {
  const opts: FetchOptions = { ...DEFAULT_FETCH_OPTIONS, ...options };
  const url = `${opts.baseUrl}${start}`;

  log.info('fetch.start', { start, end, url });
  const startedAt = Date.now();

  const body = await getWithRetry(url, opts);
  const points = parseGraphData(body);
  if (points.length === 0) {
    throw new EmptyResultError(`Upstream returned no records from ${start}`);
  }

  const byDate = new Map<IsoDate, SentimentRecord>();
  for (const point of points) {
    if (point.date < start || point.date > end) continue;
    byDate.set(point.date, point);
  }

  const records = Array.from(byDate.values()).sort(compareByDate);
  log.info('fetch.done', {
    received: points.length,
    records: records.length,
    first: records.length > 0 ? records[0].date : null,
    last: records.length > 0 ? records[records.length - 1].date : null,
    latencyMs: Date.now() - startedAt,
  });

  return records;
}

/**
 * Parse the graphdata body into records (unordered, possibly with duplicate dates).
 * Throws ParseError when the historical section or a point's x/y is missing.
 */
export function parseGraphData(body: unknown): SentimentRecord[] {
  if (!isObject(body)) {
    throw new ParseError('Response body is not a JSON object');
  }

  const historical = body['fear_and_greed_historical'];
  if (!isObject(historical)) {
    throw new ParseError('Response is missing fear_and_greed_historical');
  }

  const data = historical['data'];
  if (!Array.isArray(data)) {
    throw new ParseError('fear_and_greed_historical.data is not an array');
  }

  return data.map((point: unknown, i: number): SentimentRecord => {
    if (!isObject(point)) {
      throw new ParseError(`Point ${i} is not an object`);
    }
    const x = point['x'];
    const y = point['y'];
    if (typeof x !== 'number' || !Number.isFinite(x)) {
      throw new ParseError(`Point ${i} has no numeric timestamp (x)`);
    }
    if (Number.isNaN(new Date(x).getTime())) {
      throw new ParseError(`Point ${i} timestamp ${x} is out of range`);
    }
    if (typeof y !== 'number') {
      throw new ParseError(`Point ${i} has no numeric score (y)`);
    }

    // Index values are reported as floats; store the integral score
    const score = Math.trunc(y);
    if (!isValidScore(score)) {
      throw new ParseError(`Point ${i} score ${y} is outside 0-100`);
    }

    return { date: toIsoDate(x), score };
  });
}

// =============================================================================
// HTTP
// =============================================================================

async function getWithRetry(url: string, opts: FetchOptions): Promise<unknown> {
  let attempt = 0;

  while (true) {
    try {
      const response = await axios.get<unknown>(url, {
        headers: {
          'User-Agent': opts.userAgent,
          Accept: 'application/json',
        },
        timeout: opts.timeoutMs,
        responseType: 'json',
      });
      return response.data;
    } catch (error) {
      const status = axios.isAxiosError(error) ? error.response?.status : undefined;
      // 4xx other than 429 will not change on retry
      const retryable = status === undefined || status === 429 || status >= 500;

      if (!retryable || attempt >= opts.retries) {
        log.error('fetch.failed', { attempts: attempt + 1, ...safeErrorData(error) });
        const reason = error instanceof Error ? error.message : String(error);
        throw new NetworkError(`Request to ${url} failed after ${attempt + 1} attempt(s): ${reason}`, status);
      }

      const delayMs = opts.retryDelayMs * 2 ** attempt;
      log.warn('fetch.retry', { attempt: attempt + 1, delayMs, ...safeErrorData(error) });
      await sleep(delayMs);
      attempt++;
    }
  }
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
