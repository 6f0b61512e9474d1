import fs from 'fs';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import type { Catalog } from '../../types/catalog.js';
import type { CatalogIO } from '../../interfaces/catalog-io.js';
import type { PipelineEvent, PipelineOptions } from '../../types/pipeline.js';
import { countTranslatedFields } from '../../types/catalog.js';
import { CacheStore } from '../../cache/cache-store.js';
import { CancellationCoordinator } from '../../cancellation/cancellation-coordinator.js';
import { CheckpointManager, type CheckpointReport } from '../../checkpoint/checkpoint-manager.js';
import { BackendError, ConfigError, PipelineError } from '../../errors.js';
import { PoCatalogIO } from '../../../services/catalog/po.js';
import { FakeBackend, entry, headerEntry, makeCatalog, makeTempDir, removeDir } from '../../__tests__/fixtures.js';
import { TranslationPipeline, resolvePipelineOptions } from '../translation-pipeline.js';

const FAST: PipelineOptions = { requestDelayMs: 0, pollIntervalMs: 5 };

/** Records the number of translated fields in every checkpoint it is asked for */
class RecordingCheckpoints extends CheckpointManager {
  readonly taken: { isFinal: boolean; translated: number }[] = [];

  checkpoint(catalog: Catalog, isFinal = false): Promise<CheckpointReport> {
    this.taken.push({ isFinal, translated: countTranslatedFields(catalog) });
    return super.checkpoint(catalog, isFinal);
  }
}

class FailingProgressCheckpoints extends CheckpointManager {
  checkpoint(catalog: Catalog, isFinal = false): Promise<CheckpointReport> {
    if (!isFinal) {
      throw new Error('checkpoint bookkeeping broke');
    }
    return super.checkpoint(catalog, isFinal);
  }
}

/** PO writer whose saves wait until `release` is called */
function gatedIO(inner: CatalogIO): { io: CatalogIO; release: () => void } {
  let release: () => void = () => undefined;
  const gate = new Promise<void>(resolve => {
    release = resolve;
  });
  return {
    io: {
      load: target => inner.load(target),
      save: async (catalog, target) => {
        await gate;
        await inner.save(catalog, target);
      },
    },
    release: () => release(),
  };
}

describe('TranslationPipeline', () => {
  let dir: string;
  let outputPath: string;
  let cachePath: string;
  const io = new PoCatalogIO();

  beforeEach(async () => {
    dir = await makeTempDir();
    outputPath = path.join(dir, 'messages.fa.po');
    cachePath = path.join(dir, 'cache', 'messages.fa.json');
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await removeDir(dir);
  });

  it('translates every entry, checkpoints on cadence and fills the cache', async () => {
    const backend = new FakeBackend();
    const cache = new CacheStore({ filePath: cachePath });
    const checkpoints = new RecordingCheckpoints({ io, outputPath });
    const events: PipelineEvent[] = [];
    const pipeline = new TranslationPipeline({
      backend,
      cache,
      checkpoints,
      languages: { sourceLang: 'en', targetLang: 'fa' },
      onEvent: event => events.push(event),
    });
    const catalog = makeCatalog(25);

    const report = await pipeline.run(catalog, { ...FAST, batchSize: 10, concurrency: 3, checkpointInterval: 10 });

    expect(report).toMatchObject({
      status: 'completed',
      totalTasks: 25,
      translated: 25,
      degraded: 0,
      cacheHits: 0,
      abandoned: 0,
      batchesProcessed: 3,
      checkpoints: 2,
      lostCheckpoints: 0,
      finalSave: { status: 'saved', outputPath },
    });
    expect(checkpoints.taken).toEqual([
      { isFinal: false, translated: 10 },
      { isFinal: false, translated: 20 },
      { isFinal: true, translated: 25 },
    ]);
    expect(backend.calls).toHaveLength(25);
    expect(backend.maxInFlight).toBeLessThanOrEqual(3);
    expect(cache.size).toBe(25);
    expect(pipeline.getCoordinator().phase).toBe('STOPPED');
    expect(events.filter(e => e.type === 'batch')).toHaveLength(3);

    const saved = await io.load(outputPath);
    expect(saved.headers.Language).toBe('fa');
    expect(countTranslatedFields(saved)).toBe(25);
    expect(saved.entries.find(e => e.msgid === 'Message 17')?.msgstr).toBe('[T] Message 17');

    const reloaded = new CacheStore({ filePath: cachePath });
    expect(await reloaded.load()).toBe(25);
  });

  it('stops after the current batch when cancelled and resumes from the saved file', async () => {
    const coordinator = new CancellationCoordinator();
    const cache = new CacheStore({ filePath: cachePath });
    const first = new TranslationPipeline({
      backend: new FakeBackend(),
      cache,
      checkpoints: new CheckpointManager({ io, outputPath }),
      languages: { sourceLang: 'en', targetLang: 'fa' },
      coordinator,
      onEvent: event => {
        if (event.type === 'batch' && event.batchIndex === 0) {
          coordinator.requestCancel('test');
        }
      },
    });

    const report = await first.run(makeCatalog(25), { ...FAST, batchSize: 10, checkpointInterval: 50 });

    expect(report).toMatchObject({ status: 'cancelled', translated: 10, batchesProcessed: 1, abandoned: 0 });
    expect(coordinator.phase).toBe('STOPPED');
    const partial = await io.load(outputPath);
    expect(countTranslatedFields(partial)).toBe(10);
    expect(partial.entries.filter(e => e.msgid && !e.msgstr)).toHaveLength(15);

    const backend = new FakeBackend();
    const second = new TranslationPipeline({
      backend,
      cache,
      checkpoints: new CheckpointManager({ io, outputPath }),
      languages: { sourceLang: 'en', targetLang: 'fa' },
    });
    const resumed = await second.run(partial, { ...FAST, batchSize: 10 });

    expect(resumed).toMatchObject({ status: 'completed', totalTasks: 15, translated: 15 });
    expect(backend.calls).toHaveLength(15);
    expect(countTranslatedFields(await io.load(outputPath))).toBe(25);
  });

  it('serves a repeated run from the cache', async () => {
    const cache = new CacheStore({ filePath: cachePath });
    const languages = { sourceLang: 'en', targetLang: 'fa' };
    await new TranslationPipeline({
      backend: new FakeBackend(),
      cache,
      checkpoints: new CheckpointManager({ io, outputPath }),
      languages,
    }).run(makeCatalog(5), FAST);

    const backend = new FakeBackend();
    const report = await new TranslationPipeline({
      backend,
      cache,
      checkpoints: new CheckpointManager({ io, outputPath }),
      languages,
    }).run(makeCatalog(5), FAST);

    expect(report).toMatchObject({ status: 'completed', translated: 5, cacheHits: 5 });
    expect(backend.calls).toEqual([]);
  });

  it('abandons the rest of the batch when cancelled mid-batch', async () => {
    const coordinator = new CancellationCoordinator();
    const backend = new FakeBackend(async text => {
      coordinator.requestCancel('test');
      return `[T] ${text}`;
    });
    const pipeline = new TranslationPipeline({
      backend,
      cache: CacheStore.disabled(),
      checkpoints: new CheckpointManager({ io, outputPath }),
      languages: { sourceLang: 'en', targetLang: 'fa' },
      coordinator,
    });

    const report = await pipeline.run(makeCatalog(25), { ...FAST, batchSize: 10, concurrency: 3 });

    expect(report).toMatchObject({ status: 'cancelled', translated: 3, abandoned: 7, batchesProcessed: 1 });
    expect(coordinator.phase).toBe('STOPPED');
    expect(countTranslatedFields(await io.load(outputPath))).toBe(3);
  });

  it('saves the untouched catalog when cancelled before the first batch', async () => {
    const coordinator = new CancellationCoordinator();
    coordinator.requestCancel('test');
    const backend = new FakeBackend();
    const pipeline = new TranslationPipeline({
      backend,
      cache: CacheStore.disabled(),
      checkpoints: new CheckpointManager({ io, outputPath }),
      languages: { sourceLang: 'en', targetLang: 'fa' },
      coordinator,
    });

    const report = await pipeline.run(makeCatalog(5), FAST);

    expect(report).toMatchObject({ status: 'cancelled', translated: 0, batchesProcessed: 0 });
    expect(backend.calls).toEqual([]);
    expect(fs.existsSync(outputPath)).toBe(true);
  });

  it('keeps the source text when the backend always fails', async () => {
    const cache = new CacheStore({ filePath: cachePath });
    const pipeline = new TranslationPipeline({
      backend: new FakeBackend(async () => {
        throw new BackendError('fake', 'quota exceeded');
      }),
      cache,
      checkpoints: new CheckpointManager({ io, outputPath }),
      languages: { sourceLang: 'en', targetLang: 'fa' },
    });

    const report = await pipeline.run(makeCatalog(4), FAST);

    expect(report).toMatchObject({ status: 'completed', translated: 4, degraded: 4 });
    expect(cache.size).toBe(0);
    const saved = await io.load(outputPath);
    expect(saved.entries.find(e => e.msgid === 'Message 2')?.msgstr).toBe('Message 2');
  });

  it('saves the catalog as is when nothing needs translation', async () => {
    const backend = new FakeBackend();
    const catalog: Catalog = {
      charset: 'utf-8',
      headers: { 'Content-Type': 'text/plain; charset=utf-8', Language: 'en' },
      entries: [headerEntry(), entry('Yes', 'بله')],
    };
    const pipeline = new TranslationPipeline({
      backend,
      cache: CacheStore.disabled(),
      checkpoints: new CheckpointManager({ io, outputPath }),
      languages: { sourceLang: 'en', targetLang: 'fa' },
    });

    const report = await pipeline.run(catalog, FAST);

    expect(report).toMatchObject({ status: 'empty', totalTasks: 0, translated: 0, finalSave: { status: 'saved' } });
    expect(backend.calls).toEqual([]);
    expect(pipeline.getCoordinator().phase).toBe('STOPPED');
    const saved = await io.load(outputPath);
    expect(saved.headers.Language).toBe('en');
    expect(saved.entries.find(e => e.msgid === 'Yes')?.msgstr).toBe('بله');
  });

  it('saves progress before failing on an unexpected error', async () => {
    const cache = new CacheStore({ filePath: cachePath });
    const pipeline = new TranslationPipeline({
      backend: new FakeBackend(),
      cache,
      checkpoints: new FailingProgressCheckpoints({ io, outputPath }),
      languages: { sourceLang: 'en', targetLang: 'fa' },
    });

    const run = pipeline.run(makeCatalog(25), { ...FAST, batchSize: 10, checkpointInterval: 10 });

    await expect(run).rejects.toBeInstanceOf(PipelineError);
    await expect(run).rejects.toMatchObject({
      translatedCount: 10,
      message: 'Translation failed after 10 entries: checkpoint bookkeeping broke',
    });
    expect(pipeline.getCoordinator().phase).toBe('STOPPED');
    expect(countTranslatedFields(await io.load(outputPath))).toBe(10);
    expect(fs.existsSync(cachePath)).toBe(true);
  });

  it('hands back a final save that outlasts its timeout', async () => {
    const gated = gatedIO(io);
    const pipeline = new TranslationPipeline({
      backend: new FakeBackend(),
      cache: CacheStore.disabled(),
      checkpoints: new CheckpointManager({ io: gated.io, outputPath }),
      languages: { sourceLang: 'en', targetLang: 'fa' },
    });
    const coordinator = pipeline.getCoordinator();

    const report = await pipeline.run(makeCatalog(3), { ...FAST, finalSaveTimeoutMs: 10 });

    expect(report).toMatchObject({ status: 'completed', translated: 3, finalSave: { status: 'timeout', outputPath } });
    expect(coordinator.isFinalSaveInProgress).toBe(true);
    expect(fs.existsSync(outputPath)).toBe(false);

    gated.release();
    await report.finalSave.pending;

    expect(coordinator.isFinalSaveInProgress).toBe(false);
    expect(countTranslatedFields(await io.load(outputPath))).toBe(3);
  });

  it('attaches a still-running final save to the failure', async () => {
    const gated = gatedIO(io);
    const pipeline = new TranslationPipeline({
      backend: new FakeBackend(),
      cache: CacheStore.disabled(),
      checkpoints: new FailingProgressCheckpoints({ io: gated.io, outputPath }),
      languages: { sourceLang: 'en', targetLang: 'fa' },
    });

    const failure = await pipeline
      .run(makeCatalog(25), { ...FAST, batchSize: 10, checkpointInterval: 10, finalSaveTimeoutMs: 10 })
      .then(
        () => undefined,
        (error: unknown) => error
      );

    expect(failure).toBeInstanceOf(PipelineError);
    expect(console.log).not.toHaveBeenCalledWith(
      '[Pipeline] Progress saved after error. You can resume with --ignore-translated.'
    );
    const pendingSave = failure instanceof PipelineError ? failure.pendingSave : undefined;
    expect(pendingSave).toBeInstanceOf(Promise);

    gated.release();
    await pendingSave;

    expect(countTranslatedFields(await io.load(outputPath))).toBe(10);
  });

  it('keeps going when checkpoints cannot be written', async () => {
    const failing: CatalogIO = {
      load: target => io.load(target),
      save: async () => {
        throw new Error('read-only file system');
      },
    };
    const pipeline = new TranslationPipeline({
      backend: new FakeBackend(),
      cache: CacheStore.disabled(),
      checkpoints: new CheckpointManager({ io: failing, outputPath }),
      languages: { sourceLang: 'en', targetLang: 'fa' },
    });

    const report = await pipeline.run(makeCatalog(20), { ...FAST, batchSize: 10, checkpointInterval: 10 });

    expect(report).toMatchObject({
      status: 'completed',
      translated: 20,
      checkpoints: 0,
      lostCheckpoints: 2,
      finalSave: { status: 'lost' },
    });
  });

  it('translates plural forms separately', async () => {
    const catalog: Catalog = {
      charset: 'utf-8',
      headers: { 'Plural-Forms': 'nplurals=2; plural=(n != 1);' },
      entries: [headerEntry(), entry('%d file', '', { msgidPlural: '%d files', msgstrPlural: ['', ''] })],
    };
    const pipeline = new TranslationPipeline({
      backend: new FakeBackend(),
      cache: CacheStore.disabled(),
      checkpoints: new CheckpointManager({ io, outputPath }),
      languages: { sourceLang: 'en', targetLang: 'fa' },
    });

    const report = await pipeline.run(catalog, FAST);

    expect(report.translated).toBe(2);
    expect(catalog.entries[1].msgstrPlural).toEqual(['[T] %d file', '[T] %d files']);
  });

  it('translates the plural text once for every form that uses it', async () => {
    const backend = new FakeBackend();
    const catalog: Catalog = {
      charset: 'utf-8',
      headers: {
        'Plural-Forms': 'nplurals=3; plural=(n%10==1 && n%100!=11 ? 0 : n%10>=2 && n%10<=4 && (n%100<10 || n%100>=20) ? 1 : 2);',
      },
      entries: [headerEntry(), entry('%d file', '', { msgidPlural: '%d files', msgstrPlural: ['', '', ''] })],
    };
    const pipeline = new TranslationPipeline({
      backend,
      cache: CacheStore.disabled(),
      checkpoints: new CheckpointManager({ io, outputPath }),
      languages: { sourceLang: 'en', targetLang: 'ru' },
    });

    const report = await pipeline.run(catalog, FAST);

    expect(report.translated).toBe(3);
    expect(backend.calls.filter(text => text === '%d files')).toHaveLength(1);
    expect(backend.calls).toHaveLength(2);
    expect(catalog.entries[1].msgstrPlural).toEqual(['[T] %d file', '[T] %d files', '[T] %d files']);
  });
});

describe('resolvePipelineOptions', () => {
  it('fills in defaults', () => {
    expect(resolvePipelineOptions({ batchSize: 5 })).toEqual({
      batchSize: 5,
      concurrency: 3,
      checkpointInterval: 50,
      retranslateExisting: false,
      requestDelayMs: 500,
      pollIntervalMs: 100,
      finalSaveTimeoutMs: 30000,
    });
  });

  it('rejects invalid values', () => {
    expect(() => resolvePipelineOptions({ concurrency: 0, requestDelayMs: -1 })).toThrow(ConfigError);
    expect(() => resolvePipelineOptions({ concurrency: 0, requestDelayMs: -1 })).toThrow(
      'Invalid configuration: concurrency must be a positive integer; requestDelayMs must be zero or more'
    );
  });
});
