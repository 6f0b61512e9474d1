import { createHash } from 'crypto';
import path from 'path';

import type { LanguageCode } from '../types/common.js';

export function normalizeText(text: string): string {
  return text.normalize('NFC');
}

export function isBlank(text: string): boolean {
  return text.trim().length === 0;
}

/**
 * Cache key: SHA-256 over the language pair and the normalized text.
 * Fields are NUL-separated so the pair can never bleed into the text.
 */
export function fingerprint(text: string, sourceLang: LanguageCode, targetLang: LanguageCode): string {
  return createHash('sha256')
    .update(sourceLang)
    .update('\u0000')
    .update(targetLang)
    .update('\u0000')
    .update(normalizeText(text))
    .digest('hex');
}

/**
 * One cache file per (catalog, target language):
 * <cacheDir>/<catalog-name>-<path hash>.<target>.json
 */
export function cacheFilePath(cacheDir: string, catalogPath: string, targetLang: LanguageCode): string {
  const absolute = path.resolve(catalogPath);
  const base = path.basename(absolute, path.extname(absolute));
  const pathHash = createHash('sha256').update(absolute).digest('hex').slice(0, 8);
  return path.join(cacheDir, `${base}-${pathHash}.${targetLang}.json`);
}
