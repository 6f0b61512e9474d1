/**
 * Configuration management for catalog-translator
 *
 * Environment variables supply defaults; CLI flags override them.
 */

import { z } from 'zod';

import type { BackendConfig, BackendName } from './engine/interfaces/translation-backend.js';
import type { PipelineOptions } from './engine/types/pipeline.js';
import { BACKEND_NAMES } from './engine/interfaces/translation-backend.js';
import { DEFAULT_LIBRETRANSLATE_URL } from './engine/providers/libretranslate.js';
import { ConfigError } from './engine/errors.js';

export interface AppConfig {
  // Translation service
  service: BackendName;
  sourceLang?: string;
  targetLang: string;

  openai: {
    apiKey: string;
    model: string;
    baseUrl?: string;
  };
  libretranslate: {
    url: string;
    apiKey?: string;
  };
  mymemory: {
    email?: string;
  };
  backendTimeoutMs: number;

  // Pipeline
  pipeline: Required<Pick<PipelineOptions,
    'batchSize' | 'concurrency' | 'checkpointInterval' | 'requestDelayMs' | 'finalSaveTimeoutMs'>> & {
    keepExisting: boolean;
  };

  // Cache
  cache: {
    enabled: boolean;
    dir: string;
    flushEvery: number;
  };
}

export const DEFAULT_TARGET_LANG = 'fa';

const booleanFlag = z
  .string()
  .optional()
  .transform(value => value === 'true' || value === '1');

const intWithDefault = (fallback: number) =>
  z.coerce.number().int().optional().transform(value => value ?? fallback);

const envSchema = z.object({
  TRANSLATION_SERVICE: z.enum(['google', 'libretranslate', 'mymemory', 'openai']).default('google'),
  SOURCE_LANG: z.string().optional(),
  TARGET_LANG: z.string().default(DEFAULT_TARGET_LANG),

  OPENAI_API_KEY: z.string().default(''),
  OPENAI_MODEL: z.string().default('gpt-4o-mini'),
  OPENAI_BASE_URL: z.string().optional(),
  LIBRETRANSLATE_URL: z.string().default(DEFAULT_LIBRETRANSLATE_URL),
  LIBRETRANSLATE_API_KEY: z.string().optional(),
  MYMEMORY_EMAIL: z.string().optional(),
  BACKEND_TIMEOUT_MS: intWithDefault(30000),

  BATCH_SIZE: intWithDefault(10),
  WORKERS: intWithDefault(3),
  SAVE_INTERVAL: intWithDefault(50),
  REQUEST_DELAY_MS: intWithDefault(500),
  FINAL_SAVE_TIMEOUT_MS: intWithDefault(30000),
  KEEP_EXISTING: booleanFlag,

  CACHE_DIR: z.string().default('./.translation-cache'),
  CACHE_FLUSH_EVERY: intWithDefault(100),
  CACHE_DISABLED: booleanFlag,
});

// Empty strings in .env files mean "not set"
function withoutEmpty(env: NodeJS.ProcessEnv): Record<string, string> {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      cleaned[key] = value.trim();
    }
  }
  return cleaned;
}

/**
 * Load configuration from environment variables.
 * Throws ConfigError when a variable cannot be parsed.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(withoutEmpty(env));
  if (!result.success) {
    throw new ConfigError(result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`));
  }
  const parsed = result.data;

  return {
    service: parsed.TRANSLATION_SERVICE,
    sourceLang: parsed.SOURCE_LANG,
    targetLang: parsed.TARGET_LANG,

    openai: {
      apiKey: parsed.OPENAI_API_KEY,
      model: parsed.OPENAI_MODEL,
      baseUrl: parsed.OPENAI_BASE_URL,
    },
    libretranslate: {
      url: parsed.LIBRETRANSLATE_URL,
      apiKey: parsed.LIBRETRANSLATE_API_KEY,
    },
    mymemory: {
      email: parsed.MYMEMORY_EMAIL,
    },
    backendTimeoutMs: parsed.BACKEND_TIMEOUT_MS,

    pipeline: {
      batchSize: parsed.BATCH_SIZE,
      concurrency: parsed.WORKERS,
      checkpointInterval: parsed.SAVE_INTERVAL,
      requestDelayMs: parsed.REQUEST_DELAY_MS,
      finalSaveTimeoutMs: parsed.FINAL_SAVE_TIMEOUT_MS,
      keepExisting: parsed.KEEP_EXISTING,
    },

    cache: {
      enabled: !parsed.CACHE_DISABLED,
      dir: parsed.CACHE_DIR,
      flushEvery: parsed.CACHE_FLUSH_EVERY,
    },
  };
}

/**
 * Validate configuration
 */
export function validateConfig(config: AppConfig): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  if (!BACKEND_NAMES.includes(config.service)) {
    errors.push(`Unknown translation service: ${config.service}`);
  }

  if (config.service === 'openai' && !config.openai.apiKey) {
    errors.push('OPENAI_API_KEY is required for the openai service');
  }

  if (!config.targetLang || config.targetLang === 'auto') {
    errors.push('A concrete target language is required');
  }

  const positive: [string, number][] = [
    ['batch size', config.pipeline.batchSize],
    ['workers', config.pipeline.concurrency],
    ['save interval', config.pipeline.checkpointInterval],
    ['final save timeout', config.pipeline.finalSaveTimeoutMs],
    ['cache flush interval', config.cache.flushEvery],
    ['backend timeout', config.backendTimeoutMs],
  ];
  for (const [label, value] of positive) {
    if (!Number.isInteger(value) || value < 1) {
      errors.push(`${label} must be a positive integer (got ${value})`);
    }
  }

  if (config.pipeline.requestDelayMs < 0) {
    errors.push('request delay cannot be negative');
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}

export function toBackendConfig(config: AppConfig): BackendConfig {
  return {
    service: config.service,
    timeout: config.backendTimeoutMs,
    openai: {
      apiKey: config.openai.apiKey,
      model: config.openai.model,
      baseUrl: config.openai.baseUrl,
    },
    libretranslate: config.libretranslate,
    mymemory: config.mymemory,
  };
}
