/**
 * MyMemory backend (free tier, about 5000 words/day; more with an email)
 */

import { z } from 'zod';

import type { ITranslationBackend } from '../interfaces/translation-backend.js';
import type { LanguageCode } from '../types/common.js';
import { BackendError } from '../errors.js';
import { requestJson } from './http.js';

const ENDPOINT = 'https://api.mymemory.translated.net/get';

const responseSchema = z.object({
  responseStatus: z.union([z.number(), z.string()]),
  responseDetails: z.string().optional().nullable(),
  responseData: z.object({
    translatedText: z.string().nullable(),
  }),
});

export interface MyMemoryBackendConfig {
  email?: string;
  timeout?: number;
}

export class MyMemoryBackend implements ITranslationBackend {
  readonly name = 'mymemory';
  private email?: string;
  private timeout?: number;

  constructor(config: MyMemoryBackendConfig = {}) {
    this.email = config.email;
    this.timeout = config.timeout;
  }

  buildUrl(text: string, sourceLang: LanguageCode, targetLang: LanguageCode): string {
    // MyMemory has no source auto-detection
    const source = sourceLang === 'auto' ? 'en' : sourceLang;
    const params = new URLSearchParams({ q: text, langpair: `${source}|${targetLang}` });
    if (this.email) {
      params.set('de', this.email);
    }
    return `${ENDPOINT}?${params.toString()}`;
  }

  async translate(text: string, sourceLang: LanguageCode, targetLang: LanguageCode): Promise<string> {
    const data = await requestJson({
      backend: this.name,
      url: this.buildUrl(text, sourceLang, targetLang),
      schema: responseSchema,
      timeoutMs: this.timeout,
    });

    if (Number(data.responseStatus) !== 200) {
      throw new BackendError(this.name, data.responseDetails || 'Unknown error', {
        status: Number(data.responseStatus),
      });
    }
    if (!data.responseData.translatedText) {
      throw new BackendError(this.name, 'Empty translation in response');
    }
    return data.responseData.translatedText;
  }
}
