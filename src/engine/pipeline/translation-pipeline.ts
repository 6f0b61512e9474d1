/**
 * Translation Pipeline - orchestrates a resumable catalog translation run
 *
 * extract tasks -> batches -> worker pool -> merge -> periodic checkpoint
 * -> final checkpoint + cache flush
 *
 * Batches run strictly one after another, so at most `concurrency` backend
 * calls are in flight. Results are merged after every batch, which keeps
 * every checkpoint consistent up to the last merged batch.
 */

import type { ITranslationBackend } from '../interfaces/translation-backend.js';
import type { Catalog } from '../types/catalog.js';
import type { LanguagePair } from '../types/common.js';
import type {
  FinalSaveSummary,
  PipelineEvent,
  PipelineListener,
  PipelineOptions,
  PipelineReport,
  PipelineStatus,
  TranslationTask,
  BatchOutcome,
} from '../types/pipeline.js';
import type { CacheStore } from '../cache/cache-store.js';
import type { CheckpointManager, CheckpointReport } from '../checkpoint/checkpoint-manager.js';
import { CancellationCoordinator } from '../cancellation/cancellation-coordinator.js';
import { TaskQueue, ResultCollector } from '../workers/task-queue.js';
import { WorkerPool, DEFAULT_POLL_INTERVAL_MS, DEFAULT_REQUEST_DELAY_MS } from '../workers/worker-pool.js';
import { DEFAULT_FINAL_SAVE_TIMEOUT_MS } from '../checkpoint/checkpoint-manager.js';
import { ConfigError, PipelineError, errorMessage } from '../errors.js';
import { extractTasks, mergeResults, partition } from './extract.js';

export const DEFAULT_PIPELINE_OPTIONS: Required<PipelineOptions> = {
  batchSize: 10,
  concurrency: 3,
  checkpointInterval: 50,
  retranslateExisting: false,
  requestDelayMs: DEFAULT_REQUEST_DELAY_MS,
  pollIntervalMs: DEFAULT_POLL_INTERVAL_MS,
  finalSaveTimeoutMs: DEFAULT_FINAL_SAVE_TIMEOUT_MS,
};

export interface PipelineConfig {
  backend: ITranslationBackend;
  cache: CacheStore;
  checkpoints: CheckpointManager;
  languages: LanguagePair;
  coordinator?: CancellationCoordinator;
  onEvent?: PipelineListener;
}

interface RunCounters {
  translated: number;
  degraded: number;
  cacheHits: number;
  abandoned: number;
  batchesProcessed: number;
  checkpoints: number;
  lostCheckpoints: number;
}

export function resolvePipelineOptions(options: PipelineOptions = {}): Required<PipelineOptions> {
  const resolved = { ...DEFAULT_PIPELINE_OPTIONS };
  for (const [key, value] of Object.entries(options)) {
    if (value !== undefined && key in resolved) {
      Object.assign(resolved, { [key]: value });
    }
  }

  const issues: string[] = [];
  const positive: (keyof PipelineOptions)[] = ['batchSize', 'concurrency', 'checkpointInterval', 'pollIntervalMs', 'finalSaveTimeoutMs'];
  for (const key of positive) {
    const value = resolved[key];
    if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
      issues.push(`${key} must be a positive integer`);
    }
  }
  if (!Number.isFinite(resolved.requestDelayMs) || resolved.requestDelayMs < 0) {
    issues.push('requestDelayMs must be zero or more');
  }
  if (issues.length > 0) {
    throw new ConfigError(issues);
  }
  return resolved;
}

export class TranslationPipeline {
  private readonly backend: ITranslationBackend;
  private readonly cache: CacheStore;
  private readonly checkpoints: CheckpointManager;
  private readonly languages: LanguagePair;
  private readonly coordinator: CancellationCoordinator;
  private readonly onEvent?: PipelineListener;

  constructor(config: PipelineConfig) {
    this.backend = config.backend;
    this.cache = config.cache;
    this.checkpoints = config.checkpoints;
    this.languages = config.languages;
    this.coordinator = config.coordinator ?? new CancellationCoordinator();
    this.onEvent = config.onEvent;
  }

  getCoordinator(): CancellationCoordinator {
    return this.coordinator;
  }

  /**
   * Translate the catalog in place and persist it.
   *
   * Resolves with a report for completed, cancelled and empty runs; rejects
   * with PipelineError after an unexpected failure, once the final save and
   * cache flush were attempted.
   */
  async run(catalog: Catalog, options: PipelineOptions = {}): Promise<PipelineReport> {
    const opts = resolvePipelineOptions(options);
    const startTime = Date.now();
    const token = this.coordinator.token;

    const tasks = extractTasks(catalog, { retranslateExisting: opts.retranslateExisting });
    const counters: RunCounters = {
      translated: 0,
      degraded: 0,
      cacheHits: 0,
      abandoned: 0,
      batchesProcessed: 0,
      checkpoints: 0,
      lostCheckpoints: 0,
    };

    if (tasks.length === 0) {
      console.log('[Pipeline] No entries need translation. Saving file as is.');
      const finalSave = await this.finalSave(catalog, opts.finalSaveTimeoutMs);
      this.coordinator.markStopped();
      return this.buildReport('empty', tasks.length, counters, finalSave, startTime);
    }

    if ('Language' in catalog.headers) {
      catalog.headers.Language = this.languages.targetLang;
    }

    const batches = partition(tasks, opts.batchSize);
    console.log(`[Pipeline] Found ${tasks.length} entries that need translation (${batches.length} batches, ${opts.concurrency} workers)`);
    console.log(`[Pipeline] Progress will be saved every ${opts.checkpointInterval} translations`);
    this.emit({ type: 'start', totalTasks: tasks.length, batches: batches.length });

    let nextCheckpointAt = opts.checkpointInterval;

    try {
      for (let batchIndex = 0; batchIndex < batches.length; batchIndex++) {
        if (token.isCancellationRequested) break;

        const outcome = await this.runBatch(batches[batchIndex], opts);
        const merged = mergeResults(catalog, outcome.results);

        counters.translated += merged;
        counters.abandoned += outcome.abandoned.length;
        counters.batchesProcessed++;
        for (const result of outcome.results) {
          if (result.origin === 'cache') counters.cacheHits++;
          if (result.origin === 'degraded') counters.degraded++;
        }

        this.emit({
          type: 'batch',
          batchIndex,
          batches: batches.length,
          translated: counters.translated,
          totalTasks: tasks.length,
        });

        if (counters.translated >= nextCheckpointAt) {
          console.log(`[Pipeline] Saving progress after ${counters.translated} translations...`);
          const report = await this.checkpoints.checkpoint(catalog, false);
          this.recordCheckpoint(report, counters);
          nextCheckpointAt = (Math.floor(counters.translated / opts.checkpointInterval) + 1) * opts.checkpointInterval;
        }

        if (outcome.abandoned.length > 0) break;
      }
    } catch (error) {
      console.error(`[Pipeline] Error: ${errorMessage(error)}`);
      console.log('[Pipeline] Attempting to save progress after error...');

      const finalSave = await this.finalSave(catalog, opts.finalSaveTimeoutMs);
      await this.cache.flush();
      this.coordinator.markStopped();

      if (finalSave.status === 'saved' || finalSave.status === 'direct') {
        console.log('[Pipeline] Progress saved after error. You can resume with --ignore-translated.');
      }
      throw new PipelineError(
        `Translation failed after ${counters.translated} entries: ${errorMessage(error)}`,
        counters.translated,
        { cause: error, pendingSave: finalSave.pending }
      );
    }

    const cancelled = counters.batchesProcessed < batches.length || counters.abandoned > 0;
    if (cancelled && this.coordinator.phase === 'CANCEL_REQUESTED') {
      this.coordinator.beginDraining();
    }
    if (cancelled) {
      console.log('[Pipeline] Interrupted! Saving progress...');
      this.emit({ type: 'cancelled', translated: counters.translated });
    }

    const finalSave = await this.finalSave(catalog, opts.finalSaveTimeoutMs);
    await this.cache.flush();
    this.coordinator.markStopped();

    if (cancelled) {
      console.log(`[Pipeline] Translated ${counters.translated}/${tasks.length} entries before interruption.`);
      console.log('[Pipeline] You can resume by running again with --ignore-translated to keep existing translations.');
    } else {
      console.log(`[Pipeline] Translation completed. Translated ${counters.translated} entries. Saved to ${this.checkpoints.outputPath}`);
    }

    return this.buildReport(cancelled ? 'cancelled' : 'completed', tasks.length, counters, finalSave, startTime);
  }

  /**
   * Dispatch one batch to a fresh pool and wait until it drains
   */
  private async runBatch(batch: TranslationTask[], opts: Required<PipelineOptions>): Promise<BatchOutcome> {
    const token = this.coordinator.token;
    const disposeDrainHook = token.onCancellationRequested(() => {
      if (this.coordinator.phase === 'CANCEL_REQUESTED') {
        this.coordinator.beginDraining();
      }
    });

    try {
      const pool = new WorkerPool({
        source: new TaskQueue(batch),
        sink: new ResultCollector(),
        concurrency: Math.min(opts.concurrency, batch.length),
        backend: this.backend,
        sourceLang: this.languages.sourceLang,
        targetLang: this.languages.targetLang,
        cache: this.cache,
        token,
        requestDelayMs: opts.requestDelayMs,
        pollIntervalMs: opts.pollIntervalMs,
      });
      const outcome = await pool.drain();

      if (outcome.results.length + outcome.abandoned.length !== batch.length) {
        throw new Error(
          `Batch accounting mismatch: ${batch.length} dispatched, ${outcome.results.length} results, ${outcome.abandoned.length} abandoned`
        );
      }
      return outcome;
    } finally {
      disposeDrainHook();
    }
  }

  private async finalSave(catalog: Catalog, timeoutMs: number): Promise<FinalSaveSummary> {
    this.coordinator.beginFinalSave();

    const outcome = await this.checkpoints.finalize(catalog, timeoutMs);
    if (outcome.timedOut) {
      const pending = outcome.pending.finally(() => this.coordinator.endFinalSave());
      return { status: 'timeout', outputPath: this.checkpoints.outputPath, pending };
    }

    this.coordinator.endFinalSave();
    return this.summarizeFinal(outcome.report);
  }

  private summarizeFinal(report: CheckpointReport): FinalSaveSummary {
    switch (report.status) {
      case 'saved':
        return { status: 'saved', outputPath: report.outputPath, backupPath: report.backupPath };
      case 'direct':
        return { status: 'direct', outputPath: report.outputPath, error: report.error };
      case 'lost':
        return { status: 'lost', outputPath: report.outputPath, error: report.error.message };
    }
  }

  private recordCheckpoint(report: CheckpointReport, counters: RunCounters): void {
    const lost = report.status === 'lost';
    if (lost) {
      counters.lostCheckpoints++;
      console.warn(`[Pipeline] Checkpoint lost: ${report.error.message}`);
    } else {
      counters.checkpoints++;
    }
    this.emit({
      type: 'checkpoint',
      translated: counters.translated,
      lost,
      path: report.status === 'saved' ? report.backupPath : report.outputPath,
    });
  }

  private emit(event: PipelineEvent): void {
    if (!this.onEvent) return;
    try {
      this.onEvent(event);
    } catch (error) {
      console.warn(`[Pipeline] Progress listener failed: ${errorMessage(error)}`);
    }
  }

  private buildReport(
    status: PipelineStatus,
    totalTasks: number,
    counters: RunCounters,
    finalSave: FinalSaveSummary,
    startTime: number
  ): PipelineReport {
    return {
      status,
      totalTasks,
      translated: counters.translated,
      degraded: counters.degraded,
      cacheHits: counters.cacheHits,
      abandoned: counters.abandoned,
      batchesProcessed: counters.batchesProcessed,
      checkpoints: counters.checkpoints,
      lostCheckpoints: counters.lostCheckpoints,
      finalSave,
      duration: Date.now() - startTime,
    };
  }
}
