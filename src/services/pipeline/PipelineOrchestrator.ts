import pLimit from 'p-limit';
import type { BusinessSource, RawBusinessRecord } from '../../types/source.types.js';
import type {
  BatchRequest,
  BatchSummary,
  BatchTotals,
  FailedPair,
  RunCounts,
  RunPair,
  RunStatus,
  RunSummary,
  SearchRun,
} from '../../types/run.types.js';
import type { NormalizedBusiness } from '../../types/business.types.js';
import type { LeadStore } from '../store/LeadStore.js';
import { BusinessNormalizer } from '../normalizer/BusinessNormalizer.js';
import { LeadScorer } from '../scoring/LeadScorer.js';
import { BusinessDeduplicator } from '../business/BusinessDeduplicator.js';
import { DEFAULT_TARGET_CATEGORIES, DEFAULT_TARGET_LOCATIONS, expandPairs, type TargetLists } from '../../config/targets.js';
import { logger } from '../../config/logger.js';
import { withRetry, type RetryOptions } from '../../utils/retry.js';
import { withTimeout } from '../../utils/delay.js';
import {
  MalformedRecordError,
  SourceError,
  StoreError,
  ValidationError,
  isTransientSourceError,
  toErrorMessage,
} from '../../utils/errors.js';

export interface PipelineDependencies {
  source: BusinessSource;
  store: LeadStore;
  normalizer?: BusinessNormalizer;
  scorer?: LeadScorer;
  deduplicator?: BusinessDeduplicator;
}

export interface PipelineSettings {
  sourceTimeoutMs: number;
  retry: Partial<RetryOptions>;
  batchConcurrency: number;
  /** Used by runBatch when a request names no categories or locations */
  targets: TargetLists;
  now: () => Date;
}

export interface RunOptions {
  /** Overrides the orchestrator's scorer for this run only */
  scorer?: LeadScorer;
}

const DEFAULT_SETTINGS: PipelineSettings = {
  sourceTimeoutMs: 20000,
  retry: {},
  batchConcurrency: 1,
  targets: { categories: [...DEFAULT_TARGET_CATEGORIES], locations: [...DEFAULT_TARGET_LOCATIONS] },
  now: () => new Date(),
};

interface RunProgress {
  counts: RunCounts;
  fetched: number;
  newCount: number;
  updatedCount: number;
}

function emptyTotals(): BatchTotals {
  return {
    fetched: 0,
    resultCount: 0,
    qualifiedCount: 0,
    droppedCount: 0,
    failedCount: 0,
    newCount: 0,
    updatedCount: 0,
  };
}

/**
 * Runs the lead pipeline: source, normalizer, scorer, deduplicator, store.
 *
 * A record that fails to normalize is dropped; one that fails to persist is
 * counted as failed; neither stops the run. A source failure ends the run
 * as `failed` and still returns a summary.
 */
export class PipelineOrchestrator {
  private readonly source: BusinessSource;
  private readonly store: LeadStore;
  private readonly normalizer: BusinessNormalizer;
  private readonly scorer: LeadScorer;
  private readonly deduplicator: BusinessDeduplicator;
  private readonly settings: PipelineSettings;

  constructor(deps: PipelineDependencies, settings: Partial<PipelineSettings> = {}) {
    this.source = deps.source;
    this.store = deps.store;
    this.normalizer = deps.normalizer ?? new BusinessNormalizer();
    this.scorer = deps.scorer ?? new LeadScorer();
    this.deduplicator = deps.deduplicator ?? new BusinessDeduplicator();
    this.settings = { ...DEFAULT_SETTINGS, ...settings };
  }

  /**
   * Process one (category, location) pair. Rejects only when the search run
   * itself cannot be recorded.
   */
  async run(category: string, location: string, limit: number, options: RunOptions = {}): Promise<RunSummary> {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new ValidationError(`limit must be a positive integer, got ${limit}`);
    }

    const scorer = options.scorer ?? this.scorer;
    const startedAt = this.settings.now();
    const run = await this.store.recordSearchRun({ category, location, requestedLimit: limit, executedAt: startedAt });

    logger.info(`[PipelineOrchestrator] Run ${run.id} started: "${category}" in "${location}" (limit ${limit})`);

    const progress: RunProgress = {
      counts: { resultCount: 0, qualifiedCount: 0, droppedCount: 0, failedCount: 0 },
      fetched: 0,
      newCount: 0,
      updatedCount: 0,
    };

    let records: RawBusinessRecord[];
    try {
      records = await this.fetchRecords(category, location, limit);
    } catch (error: unknown) {
      const message = toErrorMessage(error);
      logger.error(`[PipelineOrchestrator] Run ${run.id} source failed: ${message}`);
      return this.finish(run, progress, 'failed', message, startedAt);
    }

    progress.fetched = records.length;

    for (const raw of records) {
      await this.processRecord(raw, run, scorer, progress);
      await this.writeProgress(run.id, progress.counts);
    }

    const status: RunStatus = progress.counts.failedCount > 0 ? 'partial' : 'completed';
    const message =
      status === 'partial' ? `${progress.counts.failedCount} record(s) could not be processed` : null;

    return this.finish(run, progress, status, message, startedAt);
  }

  /**
   * Run every pair. One failing pair never aborts the rest.
   */
  async runBatch(request: BatchRequest, options: RunOptions = {}): Promise<BatchSummary> {
    const startedAt = this.settings.now();
    const pairs = this.resolvePairs(request);
    const limiter = pLimit(this.settings.batchConcurrency);

    logger.info(
      `[PipelineOrchestrator] Batch started: ${pairs.length} pairs, concurrency ${this.settings.batchConcurrency}`,
    );

    const runs = await Promise.all(
      pairs.map((pair) => limiter(() => this.runSafely(pair, request.limit, options))),
    );

    const totals = emptyTotals();
    const failedPairs: FailedPair[] = [];

    for (const summary of runs) {
      totals.fetched += summary.fetched;
      totals.resultCount += summary.resultCount;
      totals.qualifiedCount += summary.qualifiedCount;
      totals.droppedCount += summary.droppedCount;
      totals.failedCount += summary.failedCount;
      totals.newCount += summary.newCount;
      totals.updatedCount += summary.updatedCount;

      if (summary.status === 'failed') {
        failedPairs.push({
          category: summary.category,
          location: summary.location,
          runId: summary.runId,
          error: summary.error,
        });
      }
    }

    const completedAt = this.settings.now();
    logger.info(
      `[PipelineOrchestrator] Batch finished: ${runs.length} pairs, ${totals.resultCount} stored, ` +
        `${totals.qualifiedCount} qualified, ${failedPairs.length} failed pairs`,
    );

    return { runs, pairsProcessed: runs.length, failedPairs, totals, startedAt, completedAt };
  }

  private resolvePairs(request: BatchRequest): RunPair[] {
    if (request.pairs && request.pairs.length > 0) {
      return request.pairs;
    }
    const categories = request.categories?.length ? request.categories : this.settings.targets.categories;
    const locations = request.locations?.length ? request.locations : this.settings.targets.locations;
    return expandPairs(categories, locations);
  }

  private async runSafely(pair: RunPair, limit: number, options: RunOptions): Promise<RunSummary> {
    const startedAt = this.settings.now();
    try {
      return await this.run(pair.category, pair.location, limit, options);
    } catch (error: unknown) {
      const message = toErrorMessage(error);
      logger.error(`[PipelineOrchestrator] "${pair.category}" in "${pair.location}" could not start: ${message}`);
      return {
        ...pair,
        runId: null,
        status: 'failed',
        fetched: 0,
        resultCount: 0,
        qualifiedCount: 0,
        droppedCount: 0,
        failedCount: 0,
        newCount: 0,
        updatedCount: 0,
        error: message,
        startedAt,
        completedAt: this.settings.now(),
      };
    }
  }

  private async fetchRecords(category: string, location: string, limit: number): Promise<RawBusinessRecord[]> {
    const { sourceTimeoutMs, retry } = this.settings;
    const sourceId = this.source.sourceId;

    return withRetry(
      () =>
        withTimeout(
          (signal) => this.source.search(category, location, limit, signal),
          sourceTimeoutMs,
          () => new SourceError(`${this.source.sourceName} timed out after ${sourceTimeoutMs}ms`, true, sourceId),
        ),
      `[PipelineOrchestrator] ${sourceId} "${category}" in "${location}"`,
      { ...retry, shouldRetry: isTransientSourceError },
    );
  }

  private async processRecord(
    raw: RawBusinessRecord,
    run: SearchRun,
    scorer: LeadScorer,
    progress: RunProgress,
  ): Promise<void> {
    let normalized: NormalizedBusiness;
    try {
      normalized = this.normalizer.normalize(raw, run);
    } catch (error: unknown) {
      if (error instanceof MalformedRecordError) {
        progress.counts.droppedCount++;
        logger.debug(`[PipelineOrchestrator] Dropped record: ${error.message}`);
      } else {
        progress.counts.failedCount++;
        logger.warn(`[PipelineOrchestrator] Record could not be normalized: ${toErrorMessage(error)}`);
      }
      return;
    }

    const result = scorer.score(normalized);

    try {
      const match = await this.deduplicator.resolve(
        { ...normalized, leadScore: result.score, qualifies: result.qualifies },
        this.store,
      );
      progress.counts.resultCount++;
      if (result.qualifies) progress.counts.qualifiedCount++;
      if (match.isNew) {
        progress.newCount++;
      } else {
        progress.updatedCount++;
      }
    } catch (error: unknown) {
      progress.counts.failedCount++;
      const kind = error instanceof StoreError ? 'Store failure' : 'Unexpected failure';
      logger.warn(`[PipelineOrchestrator] ${kind} for "${normalized.name}": ${toErrorMessage(error)}`);
    }
  }

  private async writeProgress(runId: string, counts: RunCounts): Promise<void> {
    try {
      await this.store.updateRunCounts(runId, counts, 'in_progress');
    } catch (error: unknown) {
      logger.warn(`[PipelineOrchestrator] Could not record progress for run ${runId}: ${toErrorMessage(error)}`);
    }
  }

  private async finish(
    run: SearchRun,
    progress: RunProgress,
    status: RunStatus,
    errorMessage: string | null,
    startedAt: Date,
  ): Promise<RunSummary> {
    let error = errorMessage;
    try {
      await this.store.updateRunCounts(run.id, progress.counts, status, errorMessage);
    } catch (storeError: unknown) {
      const message = toErrorMessage(storeError);
      logger.error(`[PipelineOrchestrator] Could not finalize run ${run.id}: ${message}`);
      error = error ? `${error}; ${message}` : message;
    }

    const { counts } = progress;
    logger.info(
      `[PipelineOrchestrator] Run ${run.id} ${status}: fetched ${progress.fetched}, stored ${counts.resultCount} ` +
        `(${progress.newCount} new), qualified ${counts.qualifiedCount}, dropped ${counts.droppedCount}, failed ${counts.failedCount}`,
    );

    return {
      runId: run.id,
      category: run.category,
      location: run.location,
      status,
      fetched: progress.fetched,
      ...counts,
      newCount: progress.newCount,
      updatedCount: progress.updatedCount,
      error,
      startedAt,
      completedAt: this.settings.now(),
    };
  }
}
