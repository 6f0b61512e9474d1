/**
 * In-memory model of a message catalog
 */

export interface CatalogEntry {
  msgctxt?: string;
  msgid: string;
  msgidPlural?: string;
  /** Translation of a non-plural entry */
  msgstr: string;
  /** One translation per plural form; empty for non-plural entries */
  msgstrPlural: string[];
  obsolete: boolean;
  /** Comments and flags carried through untouched */
  comments?: Record<string, string>;
}

export interface Catalog {
  charset: string;
  headers: Record<string, string>;
  entries: CatalogEntry[];
}

/** Which translatable field of an entry a task or result targets */
export type EntryField =
  | { kind: 'primary' }
  | { kind: 'plural'; form: number };

export interface EntryRef {
  entryIndex: number;
  field: EntryField;
}

export function formatEntryRef(ref: EntryRef): string {
  return ref.field.kind === 'primary'
    ? `${ref.entryIndex}:primary`
    : `${ref.entryIndex}:plural[${ref.field.form}]`;
}

export function isPluralEntry(entry: CatalogEntry): boolean {
  return entry.msgidPlural !== undefined && entry.msgidPlural !== '';
}

/**
 * Count non-empty translations (primary or per plural form) over translatable entries
 */
export function countTranslatedFields(catalog: Catalog): number {
  let count = 0;
  for (const entry of catalog.entries) {
    if (!entry.msgid || entry.obsolete) continue;
    if (isPluralEntry(entry)) {
      count += entry.msgstrPlural.filter(s => s.length > 0).length;
    } else if (entry.msgstr.length > 0) {
      count++;
    }
  }
  return count;
}

export function cloneCatalog(catalog: Catalog): Catalog {
  return {
    charset: catalog.charset,
    headers: { ...catalog.headers },
    entries: catalog.entries.map(entry => ({
      ...entry,
      msgstrPlural: [...entry.msgstrPlural],
      comments: entry.comments ? { ...entry.comments } : undefined,
    })),
  };
}
