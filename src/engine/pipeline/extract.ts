/**
 * Task extraction from a catalog, and merging results back into it
 */

import type { Catalog, CatalogEntry, EntryField } from '../types/catalog.js';
import type { TranslationResult, TranslationTask } from '../types/pipeline.js';
import { isPluralEntry } from '../types/catalog.js';

export interface ExtractOptions {
  /** Include fields that already hold a translation */
  retranslateExisting?: boolean;
}

/** gettext plural entries carry at least a singular and a plural form */
const MIN_PLURAL_FORMS = 2;

function isTranslatable(entry: CatalogEntry): boolean {
  return entry.msgid.length > 0 && !entry.obsolete;
}

/**
 * Source text for a plural form: form 0 is the singular msgid, every other
 * form translates msgid_plural.
 */
export function pluralSourceText(entry: CatalogEntry, form: number): string {
  return form === 0 ? entry.msgid : entry.msgidPlural ?? entry.msgid;
}

export function pluralFormCount(entry: CatalogEntry): number {
  return Math.max(MIN_PLURAL_FORMS, entry.msgstrPlural.length);
}

/**
 * Build the task list in catalog order. Header and obsolete entries are skipped.
 */
export function extractTasks(catalog: Catalog, options: ExtractOptions = {}): TranslationTask[] {
  const retranslate = options.retranslateExisting ?? false;
  const tasks: TranslationTask[] = [];

  const add = (entryIndex: number, field: EntryField, sourceText: string) => {
    tasks.push({ id: tasks.length, entryIndex, field, sourceText });
  };

  catalog.entries.forEach((entry, entryIndex) => {
    if (!isTranslatable(entry)) return;

    if (!isPluralEntry(entry)) {
      if (!entry.msgstr || retranslate) {
        add(entryIndex, { kind: 'primary' }, entry.msgid);
      }
      return;
    }

    const forms = pluralFormCount(entry);
    for (let form = 0; form < forms; form++) {
      const current = entry.msgstrPlural[form] ?? '';
      if (!current || retranslate) {
        add(entryIndex, { kind: 'plural', form }, pluralSourceText(entry, form));
      }
    }
  });

  return tasks;
}

/**
 * Write results into the catalog by entry identity. Order of results does not matter.
 * Returns the number of results applied.
 */
export function mergeResults(catalog: Catalog, results: readonly TranslationResult[]): number {
  let applied = 0;

  for (const result of results) {
    const entry = catalog.entries[result.entryIndex];
    if (!entry) {
      throw new Error(`Result references missing entry ${result.entryIndex}`);
    }

    if (result.field.kind === 'primary') {
      entry.msgstr = result.translatedText;
    } else {
      const forms = pluralFormCount(entry);
      while (entry.msgstrPlural.length < forms) {
        entry.msgstrPlural.push('');
      }
      entry.msgstrPlural[result.field.form] = result.translatedText;
    }
    applied++;
  }

  return applied;
}

/**
 * Split tasks into consecutive batches, preserving order
 */
export function partition<T>(items: readonly T[], size: number): T[][] {
  if (!Number.isInteger(size) || size < 1) {
    throw new Error(`Batch size must be a positive integer, got ${size}`);
  }
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
}
