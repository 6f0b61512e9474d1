/**
 * Translation pipeline types
 */

import type { EntryField, EntryRef } from './catalog.js';

export interface TranslationTask extends EntryRef {
  readonly id: number;
  readonly entryIndex: number;
  readonly field: EntryField;
  readonly sourceText: string;
}

/**
 * - cache: served from the cache store
 * - backend: fresh translation from the backend
 * - degraded: backend failed, source text returned
 * - passthrough: blank text, returned unchanged
 */
export type ResultOrigin = 'cache' | 'backend' | 'degraded' | 'passthrough';

export interface TranslationResult extends EntryRef {
  taskId: number;
  sourceText: string;
  translatedText: string;
  origin: ResultOrigin;
  error?: string;
}

export interface BatchOutcome {
  results: TranslationResult[];
  /** Tasks left unprocessed because cancellation was requested */
  abandoned: TranslationTask[];
}

export interface PipelineOptions {
  batchSize?: number;            // Tasks per batch (default 10)
  concurrency?: number;          // Worker count (default 3)
  checkpointInterval?: number;   // Non-final checkpoint every K merged results (default 50)
  retranslateExisting?: boolean; // Also translate entries that already have a translation
  requestDelayMs?: number;       // Per-worker pause between backend calls (default 500)
  pollIntervalMs?: number;       // Queue pull timeout (default 100)
  finalSaveTimeoutMs?: number;   // Bound on the final save (default 30000)
}

export type PipelineStatus = 'completed' | 'cancelled' | 'empty';

export interface FinalSaveSummary {
  status: 'saved' | 'direct' | 'lost' | 'timeout';
  outputPath: string;
  backupPath?: string;
  error?: string;
  /** Still-running save when the timeout elapsed; await it before exiting */
  pending?: Promise<unknown>;
}

export interface PipelineReport {
  status: PipelineStatus;
  totalTasks: number;
  translated: number;
  degraded: number;
  cacheHits: number;
  abandoned: number;
  batchesProcessed: number;
  checkpoints: number;
  lostCheckpoints: number;
  finalSave: FinalSaveSummary;
  duration: number; // ms
}

export type PipelineEvent =
  | { type: 'start'; totalTasks: number; batches: number }
  | { type: 'batch'; batchIndex: number; batches: number; translated: number; totalTasks: number }
  | { type: 'checkpoint'; translated: number; lost: boolean; path?: string }
  | { type: 'cancelled'; translated: number };

export type PipelineListener = (event: PipelineEvent) => void;
