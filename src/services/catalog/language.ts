/**
 * Source language detection for catalogs
 *
 * Order: Language header, Language-Team header, then script heuristics over
 * a few sample messages.
 */

import type { Catalog } from '../../engine/types/catalog.js';
import type { LanguageCode } from '../../engine/types/common.js';
import { LANGUAGE_NAMES, isKnownLanguage } from '../../engine/types/common.js';

const SAMPLE_ENTRIES = 10;
const MIN_SAMPLE_LENGTH = 10;

const SCRIPT_PATTERNS: { pattern: RegExp; language: LanguageCode }[] = [
  { pattern: /[а-яА-Я]/, language: 'ru' },
  { pattern: /[ا-ي]/, language: 'ar' },
  { pattern: /[一-龯]/, language: 'zh' },
  { pattern: /[あ-んア-ン]/, language: 'ja' },
  { pattern: /[가-힣]/, language: 'ko' },
];

function fromLanguageHeader(headers: Record<string, string>): LanguageCode | null {
  const value = headers.Language;
  if (!value) return null;
  const code = value.split('_')[0].trim().toLowerCase();
  return isKnownLanguage(code) ? code : null;
}

function fromLanguageTeam(headers: Record<string, string>): LanguageCode | null {
  const team = headers['Language-Team']?.toLowerCase();
  if (!team) return null;

  for (const [code, name] of Object.entries(LANGUAGE_NAMES)) {
    if (team.includes(name.toLowerCase())) {
      return code;
    }
  }
  return null;
}

/**
 * Guess a language from the scripts used in sample text. Latin script maps to English.
 */
export function detectFromText(text: string): LanguageCode {
  for (const { pattern, language } of SCRIPT_PATTERNS) {
    if (pattern.test(text)) {
      return language;
    }
  }
  return 'en';
}

export function detectSourceLanguage(catalog: Catalog): LanguageCode {
  const fromHeader = fromLanguageHeader(catalog.headers) ?? fromLanguageTeam(catalog.headers);
  if (fromHeader) return fromHeader;

  const samples = catalog.entries
    .slice(0, SAMPLE_ENTRIES)
    .map(entry => entry.msgid)
    .filter(msgid => msgid.length > MIN_SAMPLE_LENGTH);

  if (samples.length === 0) {
    return 'auto';
  }
  return detectFromText(samples.join(' '));
}
