/**
 * Error taxonomy for the translation engine
 */

export type ErrorCode =
  | 'BACKEND_ERROR'
  | 'CACHE_IO_ERROR'
  | 'CHECKPOINT_IO_ERROR'
  | 'CATALOG_IO_ERROR'
  | 'CONFIG_ERROR'
  | 'PIPELINE_ERROR';

export class CatalogTranslatorError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** A single translation attempt failed. Recoverable per task. */
export class BackendError extends CatalogTranslatorError {
  readonly backend: string;
  readonly status?: number;

  constructor(backend: string, message: string, options?: { cause?: unknown; status?: number }) {
    super('BACKEND_ERROR', `[${backend}] ${message}`, options);
    this.backend = backend;
    this.status = options?.status;
  }
}

/** Cache load or flush failed. The run continues with what is in memory. */
export class CacheIOError extends CatalogTranslatorError {
  readonly path: string;

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super('CACHE_IO_ERROR', message, options);
    this.path = path;
  }
}

/** Writing a checkpoint failed, including the direct-write fallback. */
export class CheckpointIOError extends CatalogTranslatorError {
  readonly path: string;

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super('CHECKPOINT_IO_ERROR', message, options);
    this.path = path;
  }
}

export class CatalogIOError extends CatalogTranslatorError {
  readonly path: string;

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super('CATALOG_IO_ERROR', message, options);
    this.path = path;
  }
}

export class ConfigError extends CatalogTranslatorError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('CONFIG_ERROR', `Invalid configuration: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

/** Unexpected failure during orchestration. Fatal to the run, not to saved data. */
export class PipelineError extends CatalogTranslatorError {
  readonly translatedCount: number;
  /** Final save still running when the error was raised */
  readonly pendingSave?: Promise<unknown>;

  constructor(
    message: string,
    translatedCount: number,
    options?: { cause?: unknown; pendingSave?: Promise<unknown> }
  ) {
    super('PIPELINE_ERROR', message, options);
    this.translatedCount = translatedCount;
    this.pendingSave = options?.pendingSave;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
