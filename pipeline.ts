/**
 * Scrape Pipeline
 *
 * fetch → load local → reconcile → validate → persist → summarize
 *
 * runPipeline never throws: every failure comes back as `{ ok: false }` with
 * the error kind, so the front-end only has to render it.
 */

import type { FngConfig } from './config';
import { validateFngConfig } from './config';
import type { Dataset, DateRange, IsoDate } from './core/types';
import {
  EmptyResultError,
  FileNotFoundError,
  UnresolvedDatesError,
  isFngError,
  type FngErrorKind,
} from './core/errors';
import { createLogger, safeErrorData } from './core/logger';
import { fetchFearGreedHistory, type FetchOptions } from './fetchers';
import { loadDataset } from './storage/local-loader';
import { saveDataset } from './storage/persister';
import { assertCompleteDataset, reconcile } from './engine/reconciler';
import { summarize, type DatasetSummary } from './output/summary';

// =============================================================================
// TYPES
// =============================================================================

export interface PipelineSuccess {
  ok: true;
  dataset: Dataset;
  outputPath: string;
  /** Leading dates dropped under backfill + dropUnresolved */
  unresolved: IsoDate[];
  summary?: DatasetSummary;
}

export interface PipelineFailure {
  ok: false;
  error: {
    kind: FngErrorKind | 'InternalError';
    message: string;
    /** Set for UnresolvedDatesError */
    dates?: IsoDate[];
  };
}

export type PipelineResult = PipelineSuccess | PipelineFailure;

/** Collaborators the pipeline calls out to; swapped for fakes in tests */
export interface PipelineDeps {
  fetchRemote: (start: IsoDate, end: IsoDate, options: Partial<FetchOptions>) => Promise<Dataset>;
  loadLocal: (filePath: string) => Promise<Dataset>;
  save: (dataset: Dataset, filePath: string, format: string) => Promise<void>;
}

const DEFAULT_DEPS: PipelineDeps = {
  fetchRemote: fetchFearGreedHistory,
  loadLocal: loadDataset,
  save: saveDataset,
};

const log = createLogger('Pipeline');

// =============================================================================
// PIPELINE
// =============================================================================

export async function runPipeline(
  config: FngConfig,
  deps: Partial<PipelineDeps> = {}
): Promise<PipelineResult> {
  const { fetchRemote, loadLocal, save }: PipelineDeps = { ...DEFAULT_DEPS, ...deps };

  try {
    validateFngConfig(config);
    const range: DateRange = { start: config.startDate, end: config.endDate };

    const local = config.inputPath ? await loadLocalOrSkip(config.inputPath, loadLocal) : null;

    let remote: Dataset;
    try {
      remote = await fetchRemote(range.start, range.end, {
        baseUrl: config.baseUrl,
        userAgent: config.userAgent,
        timeoutMs: config.timeoutMs,
        retries: config.retries,
        retryDelayMs: config.retryDelayMs,
      });
    } catch (err) {
      if (!(err instanceof EmptyResultError) || !local || local.length === 0) throw err;
      log.warn('remote.empty', { message: err.message, localRecords: local.length });
      remote = [];
    }

    const { records, unresolved } = reconcile(remote, local, range, config.policy);
    if (unresolved.length > 0) {
      if (!config.dropUnresolved) throw new UnresolvedDatesError(unresolved);
      log.warn('reconcile.dropped', { count: unresolved.length, first: unresolved[0], last: unresolved[unresolved.length - 1] });
    }

    assertCompleteDataset(records, range);
    log.info('reconcile.done', {
      policy: config.policy,
      remote: remote.length,
      local: local?.length ?? 0,
      records: records.length,
    });

    await save(records, config.outputPath, config.format);

    let summary: DatasetSummary | undefined;
    if (config.showSummary) {
      if (records.length > 0) {
        summary = summarize(records);
      } else {
        log.warn('summary.skipped', { reason: 'empty dataset' });
      }
    }

    return { ok: true, dataset: records, outputPath: config.outputPath, unresolved, summary };
  } catch (err) {
    log.error('pipeline.failed', safeErrorData(err));
    return { ok: false, error: toFailure(err) };
  }
}

/**
 * A missing input file is not fatal: first runs point --input at the file
 * the run is about to create.
 */
async function loadLocalOrSkip(
  filePath: string,
  loadLocal: PipelineDeps['loadLocal']
): Promise<Dataset | null> {
  try {
    return await loadLocal(filePath);
  } catch (err) {
    if (!(err instanceof FileNotFoundError)) throw err;
    log.warn('local.missing', { file: filePath });
    return null;
  }
}

export function toFailure(err: unknown): PipelineFailure['error'] {
  if (err instanceof UnresolvedDatesError) {
    return { kind: err.kind, message: err.message, dates: err.dates };
  }
  if (isFngError(err)) {
    return { kind: err.kind, message: err.message };
  }
  return {
    kind: 'InternalError',
    message: err instanceof Error ? err.message : String(err),
  };
}
