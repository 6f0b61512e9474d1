/**
 * Catalog translation engine
 *
 * Resumable, cached, concurrent translation of message catalogs:
 * 1. Extract: untranslated fields become tasks
 * 2. Translate: a worker pool serves tasks from the cache or a backend
 * 3. Persist: results are merged per batch and checkpointed with backups
 *
 * @module catalog-translator
 */

// Types
export type { KnownLanguage, LanguageCode, LanguagePair } from './types/common.js';
export { LANGUAGE_NAMES, getLanguageName, isKnownLanguage } from './types/common.js';
export type { Catalog, CatalogEntry, EntryField, EntryRef } from './types/catalog.js';
export { countTranslatedFields, cloneCatalog, formatEntryRef, isPluralEntry } from './types/catalog.js';
export type {
  TranslationTask,
  TranslationResult,
  ResultOrigin,
  BatchOutcome,
  PipelineOptions,
  PipelineStatus,
  PipelineReport,
  PipelineEvent,
  PipelineListener,
  FinalSaveSummary,
} from './types/pipeline.js';

// Errors
export {
  CatalogTranslatorError,
  BackendError,
  CacheIOError,
  CheckpointIOError,
  CatalogIOError,
  ConfigError,
  PipelineError,
  errorMessage,
  type ErrorCode,
} from './errors.js';

// Interfaces
export type { ITranslationBackend, BackendConfig, BackendName } from './interfaces/translation-backend.js';
export { BACKEND_NAMES } from './interfaces/translation-backend.js';
export type { CatalogIO } from './interfaces/catalog-io.js';

// Backends
export {
  createBackend,
  GoogleBackend,
  LibreTranslateBackend,
  MyMemoryBackend,
  OpenAIBackend,
  DEFAULT_LIBRETRANSLATE_URL,
} from './providers/index.js';

// Cache
export { CacheStore, DEFAULT_FLUSH_EVERY, type CacheStoreOptions, type CacheStats } from './cache/cache-store.js';
export { fingerprint, cacheFilePath, normalizeText } from './cache/fingerprint.js';

// Cancellation
export { CancellationToken } from './cancellation/cancellation-token.js';
export {
  CancellationCoordinator,
  type CancellationPhase,
  type SignalSource,
} from './cancellation/cancellation-coordinator.js';

// Workers
export { TaskQueue, ResultCollector, QUEUE_CLOSED, PULL_TIMEOUT } from './workers/task-queue.js';
export { WorkerPool, type WorkerPoolOptions } from './workers/worker-pool.js';

// Checkpoints
export {
  CheckpointManager,
  DEFAULT_FINAL_SAVE_TIMEOUT_MS,
  type CheckpointReport,
  type FinalizeOutcome,
} from './checkpoint/checkpoint-manager.js';

// Pipeline
export {
  TranslationPipeline,
  DEFAULT_PIPELINE_OPTIONS,
  resolvePipelineOptions,
  type PipelineConfig,
} from './pipeline/translation-pipeline.js';
export { extractTasks, mergeResults, partition } from './pipeline/extract.js';

// Prompts
export { TRANSLATOR_SYSTEM_PROMPT, createTranslatorPrompt } from './prompts/system/translator.js';
