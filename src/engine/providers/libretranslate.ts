/**
 * LibreTranslate backend (self-hosted or public instance)
 */

import { z } from 'zod';

import type { ITranslationBackend } from '../interfaces/translation-backend.js';
import type { LanguageCode } from '../types/common.js';
import { requestJson } from './http.js';

export const DEFAULT_LIBRETRANSLATE_URL = 'https://libretranslate.com/translate';

const responseSchema = z.object({
  translatedText: z.string().min(1),
});

export interface LibreTranslateBackendConfig {
  url?: string;
  apiKey?: string;
  timeout?: number;
}

export class LibreTranslateBackend implements ITranslationBackend {
  readonly name = 'libretranslate';
  readonly url: string;
  private apiKey?: string;
  private timeout?: number;

  constructor(config: LibreTranslateBackendConfig = {}) {
    this.url = config.url ?? DEFAULT_LIBRETRANSLATE_URL;
    this.apiKey = config.apiKey;
    this.timeout = config.timeout;
  }

  async translate(text: string, sourceLang: LanguageCode, targetLang: LanguageCode): Promise<string> {
    const { translatedText } = await requestJson({
      backend: this.name,
      url: this.url,
      method: 'POST',
      body: {
        q: text,
        source: sourceLang,
        target: targetLang,
        format: 'text',
        ...(this.apiKey ? { api_key: this.apiKey } : {}),
      },
      schema: responseSchema,
      timeoutMs: this.timeout,
    });
    return translatedText;
  }
}
