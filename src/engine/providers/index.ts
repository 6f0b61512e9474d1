/**
 * Backend factory
 */

import type { BackendConfig, ITranslationBackend } from '../interfaces/translation-backend.js';
import { ConfigError } from '../errors.js';
import { GoogleBackend } from './google.js';
import { LibreTranslateBackend } from './libretranslate.js';
import { MyMemoryBackend } from './mymemory.js';
import { OpenAIBackend } from './openai.js';

export function createBackend(config: BackendConfig): ITranslationBackend {
  switch (config.service) {
    case 'google':
      return new GoogleBackend({ timeout: config.timeout });
    case 'libretranslate':
      return new LibreTranslateBackend({
        url: config.libretranslate?.url,
        apiKey: config.libretranslate?.apiKey,
        timeout: config.timeout,
      });
    case 'mymemory':
      return new MyMemoryBackend({ email: config.mymemory?.email, timeout: config.timeout });
    case 'openai':
      if (!config.openai?.apiKey) {
        throw new ConfigError(['OPENAI_API_KEY is required for the openai service']);
      }
      return new OpenAIBackend({
        apiKey: config.openai.apiKey,
        model: config.openai.model,
        baseUrl: config.openai.baseUrl,
        maxRetries: config.openai.maxRetries,
        timeout: config.timeout,
      });
  }
}

export { GoogleBackend } from './google.js';
export { LibreTranslateBackend, DEFAULT_LIBRETRANSLATE_URL } from './libretranslate.js';
export { MyMemoryBackend } from './mymemory.js';
export { OpenAIBackend } from './openai.js';
