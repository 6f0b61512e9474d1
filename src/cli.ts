#!/usr/bin/env node
/**
 * catalog-translator CLI
 *
 * Translates a PO catalog, saving progress as it goes. Ctrl+C stops after the
 * in-flight requests finish and saves what was translated so far.
 */

import 'dotenv/config';
import { Command, InvalidArgumentError, Option } from 'commander';
import path from 'path';
import fs from 'fs';
import { fileURLToPath } from 'url';

import {
  BACKEND_NAMES,
  CacheStore,
  CancellationCoordinator,
  CheckpointManager,
  TranslationPipeline,
  cacheFilePath,
  createBackend,
  errorMessage,
  getLanguageName,
  LANGUAGE_NAMES,
  PipelineError,
  type PipelineEvent,
  type PipelineReport,
} from './engine/index.js';
import { PoCatalogIO, detectSourceLanguage } from './services/catalog/index.js';
import { loadConfig, validateConfig, toBackendConfig, type AppConfig } from './config.js';

export interface CliOptions {
  output?: string;
  batchSize?: number;
  service?: AppConfig['service'];
  source?: string;
  target?: string;
  libretranslateUrl?: string;
  email?: string;
  ignoreTranslated?: boolean;
  saveInterval?: number;
  workers?: number;
  delay?: number;
  cacheDir?: string;
  cache: boolean;
  listLanguages?: boolean;
}

function positiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

function nonNegativeInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Must be zero or a positive integer.');
  }
  return parsed;
}

export function buildProgram(): Command {
  return new Command()
    .name('catalog-translator')
    .description('Translate PO files to any language')
    .argument('[input]', 'path to the input PO file')
    .option('-o, --output <path>', 'path to the output PO file (default: <input>.<target>.po)')
    .option('-b, --batch-size <n>', 'number of entries to translate in each batch', positiveInt)
    .addOption(new Option('-s, --service <name>', 'translation service to use').choices([...BACKEND_NAMES]))
    .option('--source <lang>', 'source language code (auto-detected when omitted)')
    .option('-t, --target <lang>', 'target language code')
    .option('--libretranslate-url <url>', 'URL of the LibreTranslate API')
    .option('--email <email>', 'email for the MyMemory API (raises the daily limit)')
    .option('-i, --ignore-translated', 'keep existing translations and only fill in missing ones')
    .option('--save-interval <n>', 'save progress after this many translations', positiveInt)
    .option('-w, --workers <n>', 'number of concurrent translation workers', positiveInt)
    .option('--delay <ms>', 'pause between requests of one worker', nonNegativeInt)
    .option('--cache-dir <dir>', 'directory for translation cache files')
    .option('--no-cache', 'do not read or write the translation cache')
    .option('--list-languages', 'list available languages and exit');
}

/**
 * Overlay CLI flags on the environment configuration
 */
export function applyCliOptions(base: AppConfig, options: CliOptions): AppConfig {
  return {
    ...base,
    service: options.service ?? base.service,
    sourceLang: options.source ?? base.sourceLang,
    targetLang: options.target ?? base.targetLang,
    libretranslate: {
      ...base.libretranslate,
      url: options.libretranslateUrl ?? base.libretranslate.url,
    },
    mymemory: {
      email: options.email ?? base.mymemory.email,
    },
    pipeline: {
      ...base.pipeline,
      batchSize: options.batchSize ?? base.pipeline.batchSize,
      concurrency: options.workers ?? base.pipeline.concurrency,
      checkpointInterval: options.saveInterval ?? base.pipeline.checkpointInterval,
      requestDelayMs: options.delay ?? base.pipeline.requestDelayMs,
      keepExisting: options.ignoreTranslated ?? base.pipeline.keepExisting,
    },
    cache: {
      ...base.cache,
      enabled: base.cache.enabled && options.cache,
      dir: options.cacheDir ?? base.cache.dir,
    },
  };
}

export function defaultOutputPath(inputPath: string, targetLang: string): string {
  const ext = path.extname(inputPath);
  const base = inputPath.slice(0, inputPath.length - ext.length);
  return `${base}.${targetLang}${ext}`;
}

export function formatLanguageList(): string {
  const lines = Object.entries(LANGUAGE_NAMES)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([code, name]) => `${code}: ${name}`);
  return [
    '',
    'Available languages:',
    '--------------------',
    ...lines,
    '',
    "Use the language code (e.g., 'fa' for Persian) when specifying the target language.",
  ].join('\n');
}

function logProgress(event: PipelineEvent): void {
  if (event.type === 'batch' && ((event.batchIndex + 1) % 10 === 0 || event.batchIndex + 1 === event.batches)) {
    const percent = Math.min(100, Math.floor((event.translated / event.totalTasks) * 100));
    console.log(`[CLI] Progress: ${percent}% (${event.translated}/${event.totalTasks})`);
  }
}

function exitCodeFor(report: PipelineReport): number {
  if (report.finalSave.status === 'lost') return 1;
  return report.status === 'cancelled' ? 130 : 0;
}

export async function main(argv: string[] = process.argv): Promise<number> {
  const program = buildProgram();
  program.parse(argv);
  const options = program.opts<CliOptions>();
  const [input] = program.args;

  if (options.listLanguages) {
    console.log(formatLanguageList());
    return 0;
  }

  if (!input) {
    program.error('missing required argument: input');
  }

  let config: AppConfig;
  try {
    config = applyCliOptions(loadConfig(), options);
  } catch (error) {
    console.error(`[CLI] ${errorMessage(error)}`);
    return 1;
  }
  const validation = validateConfig(config);
  if (!validation.valid) {
    for (const error of validation.errors) {
      console.error(`[CLI] ${error}`);
    }
    return 1;
  }

  if (!fs.existsSync(input) || !fs.statSync(input).isFile()) {
    console.error(`[CLI] Error: Input file '${input}' does not exist.`);
    return 1;
  }

  const outputPath = options.output ?? defaultOutputPath(input, config.targetLang);
  const io = new PoCatalogIO();
  const catalog = await io.load(input);
  console.log(`[CLI] Loaded ${catalog.entries.length} entries from ${input}`);

  const sourceLang = config.sourceLang ?? detectSourceLanguage(catalog);
  console.log(`[CLI] Source language: ${sourceLang} (${getLanguageName(sourceLang)})`);
  console.log(`[CLI] Target language: ${config.targetLang} (${getLanguageName(config.targetLang)})`);
  console.log(`[CLI] Using translation service: ${config.service}`);
  if (config.pipeline.keepExisting) {
    console.log('[CLI] Keeping already translated entries');
  }

  const cache = config.cache.enabled
    ? new CacheStore({
        filePath: cacheFilePath(config.cache.dir, input, config.targetLang),
        flushEvery: config.cache.flushEvery,
      })
    : CacheStore.disabled();
  await cache.load();

  const coordinator = new CancellationCoordinator();
  const unbindSignals = coordinator.bindSignals();

  const pipeline = new TranslationPipeline({
    backend: createBackend(toBackendConfig(config)),
    cache,
    checkpoints: new CheckpointManager({ io, outputPath }),
    languages: { sourceLang, targetLang: config.targetLang },
    coordinator,
    onEvent: logProgress,
  });

  try {
    const report = await pipeline.run(catalog, {
      batchSize: config.pipeline.batchSize,
      concurrency: config.pipeline.concurrency,
      checkpointInterval: config.pipeline.checkpointInterval,
      requestDelayMs: config.pipeline.requestDelayMs,
      finalSaveTimeoutMs: config.pipeline.finalSaveTimeoutMs,
      retranslateExisting: !config.pipeline.keepExisting,
    });

    if (report.finalSave.pending) {
      console.log('[CLI] Waiting for the final save to finish...');
      await report.finalSave.pending;
    }
    if (report.degraded > 0) {
      console.warn(`[CLI] ${report.degraded} entries could not be translated and kept their source text`);
    }
    console.log(`[CLI] Done in ${(report.duration / 1000).toFixed(1)}s (${report.cacheHits} from cache)`);
    return exitCodeFor(report);
  } catch (error) {
    console.error(`[CLI] Error: ${errorMessage(error)}`);
    if (error instanceof PipelineError && error.pendingSave) {
      console.log('[CLI] Waiting for the final save to finish...');
      await error.pendingSave;
    }
    return 1;
  } finally {
    unbindSignals();
  }
}

function isEntryPoint(): boolean {
  const invoked = process.argv[1];
  if (!invoked) return false;
  try {
    return fs.realpathSync(invoked) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  main().then(
    code => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error(`[CLI] Fatal: ${errorMessage(error)}`);
      process.exitCode = 1;
    }
  );
}
