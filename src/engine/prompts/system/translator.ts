/**
 * System prompt for LLM-backed catalog translation
 *
 * Catalog strings are UI messages, not prose: placeholders, markup and
 * surrounding whitespace have to survive translation untouched.
 */

import type { LanguageCode } from '../../types/common.js';
import { getLanguageName } from '../../types/common.js';

export const TRANSLATOR_SYSTEM_PROMPT = `You are a professional software localizer translating entries of a gettext message catalog.

## Translation Rules

### Placeholders and Markup
- Keep printf-style placeholders exactly as they are: %s, %d, %1$s, %(name)s
- Keep brace placeholders exactly as they are: {0}, {name}, {{count}}
- Keep HTML/XML tags and entities unchanged; translate only the text between them
- Keep keyboard accelerators (& or _ before a letter) attached to a letter of the translation

### Form
- Preserve leading and trailing whitespace and line breaks
- Preserve the capitalization style (Title Case labels stay Title Case)
- Keep the message short when the source is short: it is UI text
- Do not add quotes, explanations or notes

## Output Format

Return ONLY the translated text, nothing else.`;

export function createTranslatorPrompt(
  text: string,
  sourceLang: LanguageCode,
  targetLang: LanguageCode
): string {
  const source = sourceLang === 'auto'
    ? 'the source language (detect it)'
    : getLanguageName(sourceLang);

  return `Translate the following catalog entry from ${source} to ${getLanguageName(targetLang)}.

---
${text}
---`;
}
