/**
 * Common types used across the translation engine
 */

/** Language codes with a known display name. Any other code is passed through as-is. */
export type KnownLanguage =
  | 'en'  // English
  | 'fa'  // Persian/Farsi
  | 'ar'  // Arabic
  | 'zh'  // Chinese
  | 'fr'  // French
  | 'de'  // German
  | 'hi'  // Hindi
  | 'id'  // Indonesian
  | 'it'  // Italian
  | 'ja'  // Japanese
  | 'ko'  // Korean
  | 'pt'  // Portuguese
  | 'ru'  // Russian
  | 'es'  // Spanish
  | 'tr'; // Turkish

/** `auto` asks the backend to detect the source language itself */
export type LanguageCode = KnownLanguage | 'auto' | (string & {});

export const LANGUAGE_NAMES: Record<KnownLanguage, string> = {
  en: 'English',
  fa: 'Persian/Farsi',
  ar: 'Arabic',
  zh: 'Chinese',
  fr: 'French',
  de: 'German',
  hi: 'Hindi',
  id: 'Indonesian',
  it: 'Italian',
  ja: 'Japanese',
  ko: 'Korean',
  pt: 'Portuguese',
  ru: 'Russian',
  es: 'Spanish',
  tr: 'Turkish',
};

export function isKnownLanguage(code: string): code is KnownLanguage {
  return Object.prototype.hasOwnProperty.call(LANGUAGE_NAMES, code);
}

export function getLanguageName(code: LanguageCode): string {
  return isKnownLanguage(code) ? LANGUAGE_NAMES[code] : code;
}

export interface LanguagePair {
  sourceLang: LanguageCode;
  targetLang: LanguageCode;
}
