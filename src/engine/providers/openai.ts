/**
 * OpenAI translation backend
 */

import OpenAI from 'openai';

import type { ITranslationBackend } from '../interfaces/translation-backend.js';
import type { LanguageCode } from '../types/common.js';
import { TRANSLATOR_SYSTEM_PROMPT, createTranslatorPrompt } from '../prompts/system/translator.js';
import { BackendError, errorMessage } from '../errors.js';

export interface OpenAIBackendConfig {
  apiKey: string;
  model?: string;
  baseUrl?: string;
  timeout?: number;
  maxRetries?: number;
  temperature?: number;
}

export class OpenAIBackend implements ITranslationBackend {
  readonly name = 'openai';
  readonly model: string;

  private client: OpenAI;
  private temperature: number;

  constructor(config: OpenAIBackendConfig) {
    this.model = config.model ?? 'gpt-4o-mini';
    this.temperature = config.temperature ?? 0.3;

    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseUrl,
      timeout: config.timeout ?? 60000,
      maxRetries: config.maxRetries ?? 3,
    });
  }

  async translate(text: string, sourceLang: LanguageCode, targetLang: LanguageCode): Promise<string> {
    let content: string | null | undefined;
    let finishReason: string | null | undefined;

    try {
      const response = await this.client.chat.completions.create({
        model: this.model,
        messages: [
          { role: 'system', content: TRANSLATOR_SYSTEM_PROMPT },
          { role: 'user', content: createTranslatorPrompt(text, sourceLang, targetLang) },
        ],
        temperature: this.temperature,
      });
      const choice = response.choices[0];
      content = choice?.message.content;
      finishReason = choice?.finish_reason;
    } catch (error) {
      const status = error instanceof OpenAI.APIError ? error.status : undefined;
      throw new BackendError(this.name, errorMessage(error), { cause: error, status });
    }

    if (finishReason !== 'stop' || !content) {
      throw new BackendError(this.name, `Unusable completion (finish reason: ${finishReason ?? 'none'})`);
    }

    return content;
  }
}
