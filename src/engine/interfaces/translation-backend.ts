/**
 * Translation backend interface - abstraction for different translation services
 */

import type { LanguageCode } from '../types/common.js';

export interface ITranslationBackend {
  readonly name: string;

  /**
   * Translate a single text. Rejects with a BackendError on network or parse failure.
   */
  translate(
    text: string,
    sourceLang: LanguageCode,
    targetLang: LanguageCode
  ): Promise<string>;
}

export type BackendName = 'google' | 'libretranslate' | 'mymemory' | 'openai';

export const BACKEND_NAMES: readonly BackendName[] = ['google', 'libretranslate', 'mymemory', 'openai'];

export interface BackendConfig {
  service: BackendName;
  timeout?: number;
  openai?: {
    apiKey: string;
    model?: string;
    baseUrl?: string;
    maxRetries?: number;
  };
  libretranslate?: {
    url: string;
    apiKey?: string;
  };
  mymemory?: {
    email?: string;
  };
}
