import path from 'path';
import os from 'os';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import type { ITranslationBackend } from '../../interfaces/translation-backend.js';
import type { BatchOutcome, TranslationTask } from '../../types/pipeline.js';
import { CacheStore } from '../../cache/cache-store.js';
import { CancellationToken } from '../../cancellation/cancellation-token.js';
import { BackendError } from '../../errors.js';
import { FakeBackend } from '../../__tests__/fixtures.js';
import { ResultCollector, TaskQueue } from '../task-queue.js';
import { WorkerPool } from '../worker-pool.js';

const tasksFor = (texts: string[]): TranslationTask[] =>
  texts.map((sourceText, id) => ({ id, entryIndex: id + 1, field: { kind: 'primary' }, sourceText }));

function newCache(): CacheStore {
  return new CacheStore({ filePath: path.join(os.tmpdir(), 'worker-pool-test-unused.json') });
}

interface RunOptions {
  backend: ITranslationBackend;
  cache?: CacheStore;
  token?: CancellationToken;
  concurrency?: number;
}

async function runPool(tasks: TranslationTask[], options: RunOptions): Promise<BatchOutcome> {
  const pool = new WorkerPool({
    source: new TaskQueue(tasks),
    sink: new ResultCollector(),
    concurrency: options.concurrency ?? 3,
    backend: options.backend,
    sourceLang: 'en',
    targetLang: 'fa',
    cache: options.cache ?? newCache(),
    token: options.token ?? new CancellationToken(),
    requestDelayMs: 0,
    pollIntervalMs: 5,
  });
  return pool.drain();
}

describe('WorkerPool', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('produces exactly one result per task', async () => {
    const backend = new FakeBackend();
    const tasks = tasksFor(['A', 'B', 'C', 'D', 'E', 'F', 'G', 'H', 'I']);

    const outcome = await runPool(tasks, { backend });

    expect(outcome.abandoned).toEqual([]);
    expect(outcome.results.map(r => r.taskId).sort((a, b) => a - b)).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8]);
    expect(backend.calls).toHaveLength(9);
    expect(outcome.results.every(r => r.translatedText === `[T] ${r.sourceText}` && r.origin === 'backend')).toBe(true);
  });

  it('never runs more backend calls at once than it has workers', async () => {
    const backend = new FakeBackend();
    const tasks = tasksFor(['A', 'B', 'C', 'D', 'E', 'F', 'G', 'H', 'I', 'J']);

    await runPool(tasks, { backend, concurrency: 3 });

    expect(backend.maxInFlight).toBeGreaterThan(1);
    expect(backend.maxInFlight).toBeLessThanOrEqual(3);
  });

  it('serves cached translations without calling the backend', async () => {
    const backend = new FakeBackend();
    const cache = newCache();
    cache.store('Hello', 'سلام', 'en', 'fa');

    const outcome = await runPool(tasksFor(['Hello']), { backend, cache });

    expect(backend.calls).toEqual([]);
    expect(outcome.results).toEqual([
      {
        taskId: 0,
        entryIndex: 1,
        field: { kind: 'primary' },
        sourceText: 'Hello',
        translatedText: 'سلام',
        origin: 'cache',
      },
    ]);
  });

  it('caches fresh translations', async () => {
    const cache = newCache();

    await runPool(tasksFor(['Open file']), { backend: new FakeBackend(), cache });

    expect(cache.lookup('Open file', 'en', 'fa')).toBe('[T] Open file');
  });

  it('falls back to the source text when the backend fails, without caching', async () => {
    const cache = newCache();
    const backend = new FakeBackend(async () => {
      throw new BackendError('fake', 'service unavailable');
    });

    const outcome = await runPool(tasksFor(['Print']), { backend, cache });

    expect(outcome.results).toHaveLength(1);
    expect(outcome.results[0]).toMatchObject({
      translatedText: 'Print',
      origin: 'degraded',
      error: '[fake] service unavailable',
    });
    expect(cache.lookup('Print', 'en', 'fa')).toBeUndefined();
  });

  it('treats an empty translation as a failure', async () => {
    const cache = newCache();
    const backend = new FakeBackend(async () => '  ');

    const outcome = await runPool(tasksFor(['Print']), { backend, cache });

    expect(outcome.results[0]).toMatchObject({ translatedText: 'Print', origin: 'degraded', error: 'empty translation' });
    expect(cache.size).toBe(0);
  });

  it('makes one backend call for tasks that share a text', async () => {
    const backend = new FakeBackend();
    const tasks = tasksFor(['Save', 'Save', 'Close', 'Save']);

    const outcome = await runPool(tasks, { backend, cache: CacheStore.disabled(), concurrency: 3 });

    expect([...backend.calls].sort()).toEqual(['Close', 'Save']);
    expect(outcome.results).toHaveLength(4);
    expect(outcome.results.filter(r => r.sourceText === 'Save').map(r => r.translatedText)).toEqual([
      '[T] Save',
      '[T] Save',
      '[T] Save',
    ]);
  });

  it('degrades every task waiting on a failed shared call', async () => {
    const backend = new FakeBackend(async () => {
      throw new BackendError('fake', 'service unavailable');
    });

    const outcome = await runPool(tasksFor(['Print', 'Print']), { backend, concurrency: 2 });

    expect(backend.calls).toEqual(['Print']);
    expect(outcome.results.map(r => r.origin)).toEqual(['degraded', 'degraded']);
    expect(outcome.results.every(r => r.error === '[fake] service unavailable')).toBe(true);
  });

  it('passes blank text through untouched', async () => {
    const backend = new FakeBackend();

    const outcome = await runPool(tasksFor([' \n']), { backend });

    expect(backend.calls).toEqual([]);
    expect(outcome.results[0]).toMatchObject({ translatedText: ' \n', origin: 'passthrough' });
  });

  it('degrades a task when processing throws unexpectedly', async () => {
    class BrokenCache extends CacheStore {
      lookup(): string | undefined {
        throw new Error('corrupted index');
      }
    }
    const cache = new BrokenCache({ filePath: path.join(os.tmpdir(), 'worker-pool-test-unused.json') });

    const outcome = await runPool(tasksFor(['Quit', 'Help']), { backend: new FakeBackend(), cache });

    expect(outcome.results).toHaveLength(2);
    expect(outcome.results.every(r => r.origin === 'degraded' && r.error === 'corrupted index')).toBe(true);
  });

  it('abandons every task when cancelled before starting', async () => {
    const backend = new FakeBackend();
    const token = new CancellationToken();
    token.cancel();
    const tasks = tasksFor(['A', 'B', 'C']);

    const outcome = await runPool(tasks, { backend, token });

    expect(outcome.results).toEqual([]);
    expect(outcome.abandoned).toEqual(tasks);
    expect(backend.calls).toEqual([]);
  });

  it('lets an in-flight call finish and abandons the rest on cancellation', async () => {
    const token = new CancellationToken();
    const backend = new FakeBackend(async text => {
      token.cancel();
      return `[T] ${text}`;
    });
    const tasks = tasksFor(['A', 'B', 'C', 'D', 'E']);

    const outcome = await runPool(tasks, { backend, token, concurrency: 1 });

    expect(outcome.results).toHaveLength(1);
    expect(outcome.results[0]).toMatchObject({ taskId: 0, translatedText: '[T] A', origin: 'backend' });
    expect(outcome.abandoned.map(t => t.id)).toEqual([1, 2, 3, 4]);
  });

  it('rejects a non-positive worker count', () => {
    expect(
      () =>
        new WorkerPool({
          source: new TaskQueue(),
          sink: new ResultCollector(),
          concurrency: 0,
          backend: new FakeBackend(),
          sourceLang: 'en',
          targetLang: 'fa',
          cache: newCache(),
          token: new CancellationToken(),
        })
    ).toThrow('WorkerPool: concurrency must be a positive integer, got 0');
  });
});
