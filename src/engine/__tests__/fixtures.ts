import fs from 'fs';
import os from 'os';
import path from 'path';

import type { ITranslationBackend } from '../interfaces/translation-backend.js';
import type { LanguageCode } from '../types/common.js';
import type { Catalog, CatalogEntry } from '../types/catalog.js';

export function entry(msgid: string, msgstr = '', extra: Partial<CatalogEntry> = {}): CatalogEntry {
  return { msgid, msgstr, msgstrPlural: [], obsolete: false, ...extra };
}

export function headerEntry(): CatalogEntry {
  return entry('', 'Content-Type: text/plain; charset=utf-8\n');
}

/** Header entry followed by `count` untranslated "Message N" entries */
export function makeCatalog(count: number): Catalog {
  const entries = [headerEntry()];
  for (let i = 1; i <= count; i++) {
    entries.push(entry(`Message ${i}`));
  }
  return {
    charset: 'utf-8',
    headers: { 'Content-Type': 'text/plain; charset=utf-8', Language: 'en' },
    entries,
  };
}

export async function makeTempDir(): Promise<string> {
  return fs.promises.mkdtemp(path.join(os.tmpdir(), 'catalog-translator-'));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.promises.rm(dir, { recursive: true, force: true });
}

type TranslateFn = (text: string, sourceLang: LanguageCode, targetLang: LanguageCode) => Promise<string>;

/**
 * Backend stand-in that records every call
 */
export class FakeBackend implements ITranslationBackend {
  readonly name = 'fake';
  readonly calls: string[] = [];
  inFlight = 0;
  maxInFlight = 0;

  constructor(private readonly impl: TranslateFn = async text => `[T] ${text}`) {}

  async translate(text: string, sourceLang: LanguageCode, targetLang: LanguageCode): Promise<string> {
    this.calls.push(text);
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      await new Promise(resolve => setImmediate(resolve));
      return await this.impl(text, sourceLang, targetLang);
    } finally {
      this.inFlight--;
    }
  }
}
