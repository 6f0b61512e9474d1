/**
 * Google Translate public web endpoint (no API key)
 */

import { z } from 'zod';

import type { ITranslationBackend } from '../interfaces/translation-backend.js';
import type { LanguageCode } from '../types/common.js';
import { BackendError } from '../errors.js';
import { requestJson } from './http.js';

const ENDPOINT = 'https://translate.googleapis.com/translate_a/single';

// [[["translated", "original", ...], ...], ...]
const responseSchema = z
  .tuple([z.array(z.array(z.unknown()).min(1))])
  .rest(z.unknown());

export interface GoogleBackendConfig {
  timeout?: number;
}

export class GoogleBackend implements ITranslationBackend {
  readonly name = 'google';
  private timeout?: number;

  constructor(config: GoogleBackendConfig = {}) {
    this.timeout = config.timeout;
  }

  buildUrl(text: string, sourceLang: LanguageCode, targetLang: LanguageCode): string {
    const params = new URLSearchParams({
      client: 'gtx',
      sl: sourceLang,
      tl: targetLang,
      dt: 't',
      q: text,
    });
    return `${ENDPOINT}?${params.toString()}`;
  }

  async translate(text: string, sourceLang: LanguageCode, targetLang: LanguageCode): Promise<string> {
    const [sentences] = await requestJson({
      backend: this.name,
      url: this.buildUrl(text, sourceLang, targetLang),
      schema: responseSchema,
      timeoutMs: this.timeout,
    });

    const translated = sentences
      .map(sentence => (typeof sentence[0] === 'string' ? sentence[0] : ''))
      .join('');

    if (!translated) {
      throw new BackendError(this.name, 'Empty translation in response');
    }
    return translated;
  }
}
