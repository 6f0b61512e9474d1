/**
 * Worker Pool - W concurrent workers pulling translation tasks
 *
 * Each worker: pull task -> cache lookup -> backend on miss -> cache store
 * on success -> emit result. Backend failures degrade to the source text and
 * are never cached. Cancellation is checked before every pull; a backend call
 * already in flight is allowed to finish.
 *
 * Tasks that share a source text share one backend call: later ones await the
 * call the first one started.
 */

import { setTimeout as sleep } from 'timers/promises';

import type { ITranslationBackend } from '../interfaces/translation-backend.js';
import type { LanguageCode } from '../types/common.js';
import type { BatchOutcome, TranslationResult, TranslationTask } from '../types/pipeline.js';
import type { CacheStore } from '../cache/cache-store.js';
import type { CancellationToken } from '../cancellation/cancellation-token.js';
import { formatEntryRef } from '../types/catalog.js';
import { errorMessage } from '../errors.js';
import { fingerprint, isBlank } from '../cache/fingerprint.js';
import { PULL_TIMEOUT, QUEUE_CLOSED, type ResultCollector, type TaskQueue } from './task-queue.js';

export const DEFAULT_REQUEST_DELAY_MS = 500;
export const DEFAULT_POLL_INTERVAL_MS = 100;

export interface WorkerPoolOptions {
  source: TaskQueue;
  sink: ResultCollector;
  concurrency: number;
  backend: ITranslationBackend;
  sourceLang: LanguageCode;
  targetLang: LanguageCode;
  cache: CacheStore;
  token: CancellationToken;
  requestDelayMs?: number;
  pollIntervalMs?: number;
}

type BackendOutcome = { ok: true; text: string } | { ok: false; error: string };

interface WorkerState {
  id: number;
  backendCalls: number;
}

export class WorkerPool {
  private readonly options: WorkerPoolOptions;
  private readonly requestDelayMs: number;
  private readonly pollIntervalMs: number;
  private workers: Promise<void>[] | null = null;
  private readonly requests = new Map<string, Promise<BackendOutcome>>();

  constructor(options: WorkerPoolOptions) {
    if (!Number.isInteger(options.concurrency) || options.concurrency < 1) {
      throw new Error(`WorkerPool: concurrency must be a positive integer, got ${options.concurrency}`);
    }
    this.options = options;
    this.requestDelayMs = Math.max(0, options.requestDelayMs ?? DEFAULT_REQUEST_DELAY_MS);
    this.pollIntervalMs = Math.max(1, options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS);
  }

  /**
   * Spawn the workers. Calling it again has no effect.
   */
  start(): void {
    if (this.workers) return;

    this.workers = [];
    for (let id = 1; id <= this.options.concurrency; id++) {
      this.workers.push(this.runWorker({ id, backendCalls: 0 }));
    }
  }

  /**
   * Close the task source and wait for every worker to exit. Tasks still
   * queued at that point were abandoned because of cancellation.
   */
  async drain(): Promise<BatchOutcome> {
    this.start();
    this.options.source.close();

    await Promise.all(this.workers ?? []);

    const abandoned = this.options.source.drainRemaining();
    if (abandoned.length > 0) {
      console.log(`[WorkerPool] ${abandoned.length} task(s) abandoned after cancellation`);
    }

    return {
      results: this.options.sink.take(),
      abandoned,
    };
  }

  private async runWorker(state: WorkerState): Promise<void> {
    const { source, sink, token } = this.options;

    while (!token.isCancellationRequested) {
      const next = await source.pull(this.pollIntervalMs);
      if (next === QUEUE_CLOSED) break;
      if (next === PULL_TIMEOUT) continue;

      let result: TranslationResult;
      try {
        result = await this.processTask(next, state);
      } catch (error) {
        console.error(`[WorkerPool] Worker ${state.id} failed on ${formatEntryRef(next)}: ${errorMessage(error)}`);
        result = this.degraded(next, errorMessage(error));
      }
      sink.emit(result);
    }
  }

  private async processTask(task: TranslationTask, state: WorkerState): Promise<TranslationResult> {
    const { cache, sourceLang, targetLang } = this.options;

    if (isBlank(task.sourceText)) {
      return this.resultFor(task, task.sourceText, 'passthrough');
    }

    const cached = cache.lookup(task.sourceText, sourceLang, targetLang);
    if (cached !== undefined) {
      return this.resultFor(task, cached, 'cache');
    }

    const key = fingerprint(task.sourceText, sourceLang, targetLang);
    const shared = this.requests.get(key);
    if (shared) {
      const outcome = await shared;
      return outcome.ok ? this.resultFor(task, outcome.text, 'backend') : this.degraded(task, outcome.error);
    }

    const request = this.callBackend(task, state);
    this.requests.set(key, request);
    const outcome = await request;

    if (!outcome.ok) {
      // Let a later task with this text try again
      this.requests.delete(key);
      return this.degraded(task, outcome.error);
    }
    cache.store(task.sourceText, outcome.text, sourceLang, targetLang);
    return this.resultFor(task, outcome.text, 'backend');
  }

  private async callBackend(task: TranslationTask, state: WorkerState): Promise<BackendOutcome> {
    const { backend, sourceLang, targetLang } = this.options;

    if (state.backendCalls > 0 && this.requestDelayMs > 0) {
      await sleep(this.requestDelayMs);
    }
    state.backendCalls++;

    let translated: string;
    try {
      translated = await backend.translate(task.sourceText, sourceLang, targetLang);
    } catch (error) {
      console.warn(`[WorkerPool] ${backend.name} failed on ${formatEntryRef(task)}: ${errorMessage(error)}`);
      return { ok: false, error: errorMessage(error) };
    }

    if (isBlank(translated)) {
      console.warn(`[WorkerPool] ${backend.name} returned an empty translation for ${formatEntryRef(task)}`);
      return { ok: false, error: 'empty translation' };
    }
    return { ok: true, text: translated };
  }

  private degraded(task: TranslationTask, error: string): TranslationResult {
    return { ...this.resultFor(task, task.sourceText, 'degraded'), error };
  }

  private resultFor(
    task: TranslationTask,
    translatedText: string,
    origin: TranslationResult['origin']
  ): TranslationResult {
    return {
      taskId: task.id,
      entryIndex: task.entryIndex,
      field: task.field,
      sourceText: task.sourceText,
      translatedText,
      origin,
    };
  }
}
