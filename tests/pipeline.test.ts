/**
 * Tests for the scrape pipeline: orchestration and tagged failures.
 *
 * The fetcher is a fake, or the real one over a mocked axios; no real API
 * calls. File I/O, when real, goes to os.tmpdir().
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

const { mockGet } = vi.hoisted(() => ({ mockGet: vi.fn() }));

vi.mock('axios', async (importOriginal) => {
  const actual = await importOriginal<typeof import('axios')>();
  return { ...actual, default: { ...actual.default, get: mockGet } };
});

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import type { FngConfig } from '../config';
import type { Dataset } from '../core/types';
import { runPipeline, toFailure, type PipelineDeps } from '../pipeline';
import { loadDataset } from '../storage/local-loader';
import {
  EmptyResultError,
  FileNotFoundError,
  NetworkError,
  SchemaError,
} from '../core/errors';

// =============================================================================
// HELPERS
// =============================================================================

function makeConfig(overrides: Partial<FngConfig> = {}): FngConfig {
  return {
    startDate: '2024-01-01',
    endDate: '2024-01-03',
    outputPath: 'out.csv',
    format: 'csv',
    policy: 'zero',
    dropUnresolved: false,
    showSummary: true,
    baseUrl: 'http://localhost/fng/',
    userAgent: 'test-agent',
    timeoutMs: 1000,
    retries: 0,
    retryDelayMs: 0,
    ...overrides,
  };
}

function makeDeps(remote: Dataset | Error, local: Dataset | Error = []) {
  return {
    fetchRemote: vi.fn<PipelineDeps['fetchRemote']>(async () => {
      if (remote instanceof Error) throw remote;
      return remote;
    }),
    loadLocal: vi.fn<PipelineDeps['loadLocal']>(async () => {
      if (local instanceof Error) throw local;
      return local;
    }),
    save: vi.fn<PipelineDeps['save']>(async () => undefined),
  };
}

// =============================================================================
// SUCCESS PATHS
// =============================================================================

describe('runPipeline', () => {
  it('zero-fills the gap, saves, and summarizes', async () => {
    const deps = makeDeps([
      { date: '2024-01-01', score: 45 },
      { date: '2024-01-03', score: 60 },
    ]);

    const result = await runPipeline(makeConfig(), deps);

    const expected = [
      { date: '2024-01-01', score: 45 },
      { date: '2024-01-02', score: 0 },
      { date: '2024-01-03', score: 60 },
    ];
    expect(result).toMatchObject({ ok: true, dataset: expected, outputPath: 'out.csv', unresolved: [] });
    expect(deps.save).toHaveBeenCalledWith(expected, 'out.csv', 'csv');
    expect(deps.loadLocal).not.toHaveBeenCalled();
    if (result.ok) {
      expect(result.summary?.count).toBe(3);
      expect(result.summary?.zeroCount).toBe(1);
    }
  });

  it('passes the fetch settings through to the fetcher', async () => {
    const deps = makeDeps([{ date: '2024-01-01', score: 45 }]);

    await runPipeline(makeConfig(), deps);

    expect(deps.fetchRemote).toHaveBeenCalledWith('2024-01-01', '2024-01-03', {
      baseUrl: 'http://localhost/fng/',
      userAgent: 'test-agent',
      timeoutMs: 1000,
      retries: 0,
      retryDelayMs: 0,
    });
  });

  it('merges local data with remote taking precedence', async () => {
    const deps = makeDeps(
      [{ date: '2024-01-01', score: 55 }],
      [{ date: '2024-01-01', score: 30 }, { date: '2024-01-02', score: 31 }]
    );

    const result = await runPipeline(makeConfig({ inputPath: 'history.csv' }), deps);

    expect(deps.loadLocal).toHaveBeenCalledWith('history.csv');
    expect(result.ok && result.dataset).toEqual([
      { date: '2024-01-01', score: 55 },
      { date: '2024-01-02', score: 31 },
      { date: '2024-01-03', score: 0 },
    ]);
  });

  it('continues without local data when the input file does not exist', async () => {
    const deps = makeDeps([{ date: '2024-01-01', score: 45 }], new FileNotFoundError('history.csv'));

    const result = await runPipeline(makeConfig({ inputPath: 'history.csv' }), deps);

    expect(result.ok).toBe(true);
  });

  it('passes local data through when the remote range is empty', async () => {
    const local = [
      { date: '2024-01-01', score: 11 },
      { date: '2024-01-02', score: 22 },
      { date: '2024-01-03', score: 33 },
    ];
    const deps = makeDeps(new EmptyResultError('nothing new'), local);

    const result = await runPipeline(makeConfig({ inputPath: 'history.csv' }), deps);

    expect(result.ok && result.dataset).toEqual(local);
  });

  it('skips the summary when disabled', async () => {
    const deps = makeDeps([{ date: '2024-01-01', score: 45 }]);

    const result = await runPipeline(makeConfig({ showSummary: false }), deps);

    expect(result.ok).toBe(true);
    expect(result.ok && result.summary).toBeUndefined();
  });

  it('drops unresolved leading dates when asked to', async () => {
    const deps = makeDeps([{ date: '2024-01-02', score: 40 }]);

    const result = await runPipeline(makeConfig({ policy: 'backfill', dropUnresolved: true }), deps);

    expect(result).toMatchObject({
      ok: true,
      dataset: [
        { date: '2024-01-02', score: 40 },
        { date: '2024-01-03', score: 40 },
      ],
      unresolved: ['2024-01-01'],
    });
  });
});

// =============================================================================
// FAILURES
// =============================================================================

describe('runPipeline failures', () => {
  it('fails with UnresolvedDatesError listing the leading gap under backfill', async () => {
    const deps = makeDeps([{ date: '2024-01-03', score: 60 }]);

    const result = await runPipeline(makeConfig({ policy: 'backfill' }), deps);

    expect(result).toEqual({
      ok: false,
      error: {
        kind: 'UnresolvedDatesError',
        message: 'No prior score to backfill: 2024-01-01, 2024-01-02',
        dates: ['2024-01-01', '2024-01-02'],
      },
    });
    expect(deps.save).not.toHaveBeenCalled();
  });

  it('fails with EmptyResultError when there is no local data to fall back on', async () => {
    const deps = makeDeps(new EmptyResultError('Upstream returned no records between 2024-01-01 and 2024-01-03'));

    const result = await runPipeline(makeConfig(), deps);

    expect(result).toEqual({
      ok: false,
      error: {
        kind: 'EmptyResultError',
        message: 'Upstream returned no records between 2024-01-01 and 2024-01-03',
      },
    });
  });

  it('reports network failures by kind', async () => {
    const deps = makeDeps(new NetworkError('Request failed: timeout of 1000ms exceeded'));

    const result = await runPipeline(makeConfig(), deps);

    expect(result.ok === false && result.error.kind).toBe('NetworkError');
  });

  it('reports a malformed local file', async () => {
    const deps = makeDeps([], new SchemaError('history.csv: missing column(s) date'));

    const result = await runPipeline(makeConfig({ inputPath: 'history.csv' }), deps);

    expect(result.ok === false && result.error).toEqual({
      kind: 'SchemaError',
      message: 'history.csv: missing column(s) date',
    });
    expect(deps.fetchRemote).not.toHaveBeenCalled();
  });

  it('rejects an inverted date range before fetching', async () => {
    const deps = makeDeps([]);

    const result = await runPipeline(makeConfig({ startDate: '2024-02-01', endDate: '2024-01-01' }), deps);

    expect(result.ok === false && result.error.kind).toBe('InvalidDateRangeError');
    expect(deps.fetchRemote).not.toHaveBeenCalled();
  });

  it('wraps unexpected exceptions as InternalError', async () => {
    const deps = makeDeps(new TypeError('boom'));

    const result = await runPipeline(makeConfig(), deps);

    expect(result).toEqual({ ok: false, error: { kind: 'InternalError', message: 'boom' } });
  });
});

describe('toFailure', () => {
  it('stringifies non-Error values', () => {
    expect(toFailure('bad')).toEqual({ kind: 'InternalError', message: 'bad' });
  });
});

// =============================================================================
// REAL PERSISTENCE
// =============================================================================

describe('runPipeline with real storage', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'fng-pipeline-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('writes a file that reloads to the returned dataset', async () => {
    const outputPath = path.join(tmpDir, 'fng.parquet');
    const { fetchRemote } = makeDeps([
      { date: '2024-01-01', score: 45 },
      { date: '2024-01-03', score: 60 },
    ]);

    const result = await runPipeline(makeConfig({ outputPath, format: 'parquet' }), { fetchRemote });

    expect(result.ok).toBe(true);
    expect(await loadDataset(outputPath)).toEqual(result.ok ? result.dataset : []);
  });

  it('merges a previous run read from disk', async () => {
    const inputPath = path.join(tmpDir, 'history.csv');
    fs.writeFileSync(inputPath, 'date,fear_greed_score\n2024-01-01,30\n2024-01-02,31\n');
    const { fetchRemote } = makeDeps([{ date: '2024-01-01', score: 55 }]);

    const result = await runPipeline(
      makeConfig({ inputPath, outputPath: path.join(tmpDir, 'out.csv') }),
      { fetchRemote }
    );

    expect(fs.readFileSync(path.join(tmpDir, 'out.csv'), 'utf-8')).toBe(
      'date,fear_greed_score\n2024-01-01,55\n2024-01-02,31\n2024-01-03,0\n'
    );
    expect(result.ok).toBe(true);
  });

  it('reports IOError when the output directory is missing', async () => {
    const { fetchRemote } = makeDeps([{ date: '2024-01-01', score: 45 }]);

    const result = await runPipeline(
      makeConfig({ outputPath: path.join(tmpDir, 'nope', 'out.csv') }),
      { fetchRemote }
    );

    expect(result.ok === false && result.error.kind).toBe('IOError');
  });
});

// =============================================================================
// REAL FETCHER
// =============================================================================

describe('runPipeline with the CNN fetcher', () => {
  beforeEach(() => {
    mockGet.mockReset();
  });

  it('zero-fills a weekend day the service has no point for', async () => {
    mockGet.mockResolvedValueOnce({
      data: {
        fear_and_greed_historical: {
          data: [
            { x: Date.UTC(2024, 0, 5), y: 41.2 },
            { x: Date.UTC(2024, 0, 8), y: 44.9 },
          ],
        },
      },
    });
    const save = vi.fn<PipelineDeps['save']>(async () => undefined);

    const result = await runPipeline(makeConfig({ startDate: '2024-01-06', endDate: '2024-01-06' }), { save });

    expect(result).toMatchObject({ ok: true, dataset: [{ date: '2024-01-06', score: 0 }], unresolved: [] });
    expect(save).toHaveBeenCalledWith([{ date: '2024-01-06', score: 0 }], 'out.csv', 'csv');
  });

  it('backfills a weekend day from the Friday before it', async () => {
    mockGet.mockResolvedValueOnce({
      data: {
        fear_and_greed_historical: {
          data: [
            { x: Date.UTC(2024, 0, 5), y: 41.2 },
            { x: Date.UTC(2024, 0, 8), y: 44.9 },
          ],
        },
      },
    });
    const local = [{ date: '2024-01-05', score: 41 }];
    const { loadLocal, save } = makeDeps([], local);

    const result = await runPipeline(
      makeConfig({ startDate: '2024-01-06', endDate: '2024-01-07', policy: 'backfill', inputPath: 'history.csv' }),
      { loadLocal, save }
    );

    expect(result.ok && result.dataset).toEqual([
      { date: '2024-01-06', score: 41 },
      { date: '2024-01-07', score: 41 },
    ]);
  });
});
