/**
 * gettext PO catalog I/O
 */

import fs from 'fs';
import gettextParser from 'gettext-parser';
import type { GetTextTranslation, GetTextTranslations } from 'gettext-parser';
import { z } from 'zod';

import type { Catalog, CatalogEntry } from '../../engine/types/catalog.js';
import type { CatalogIO } from '../../engine/interfaces/catalog-io.js';
import { isPluralEntry } from '../../engine/types/catalog.js';
import { CatalogIOError, errorMessage } from '../../engine/errors.js';

interface RawTranslation {
  msgctxt?: string;
  msgid: string;
  msgid_plural?: unknown;
  msgstr: string[];
  comments?: object;
}

type RawTable = Record<string, Record<string, RawTranslation>>;

// Obsolete (#~) entries are not part of the published typings
const obsoleteTableSchema = z.record(
  z.record(
    z.object({
      msgctxt: z.string().optional(),
      msgid: z.string(),
      msgid_plural: z.unknown().optional(),
      msgstr: z.array(z.string()),
      comments: z.record(z.string()).optional(),
    })
  )
);

/**
 * nplurals from a Plural-Forms header, e.g. "nplurals=3; plural=(n%10==1 ...)"
 */
export function parseNPlurals(headers: Record<string, string>): number | undefined {
  const pluralForms = headers['Plural-Forms'];
  const match = pluralForms?.match(/nplurals\s*=\s*(\d+)/);
  if (!match) return undefined;
  const count = Number(match[1]);
  return count > 0 ? count : undefined;
}

function readComments(raw: object | undefined): Record<string, string> | undefined {
  if (!raw) return undefined;
  const comments: Record<string, string> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (typeof value === 'string' && value.length > 0) {
      comments[key] = value;
    }
  }
  return Object.keys(comments).length > 0 ? comments : undefined;
}

function toEntry(raw: RawTranslation, obsolete: boolean, nplurals: number | undefined): CatalogEntry {
  const msgidPlural = typeof raw.msgid_plural === 'string' && raw.msgid_plural !== ''
    ? raw.msgid_plural
    : undefined;

  const entry: CatalogEntry = {
    msgid: raw.msgid,
    msgstr: '',
    msgstrPlural: [],
    obsolete,
  };
  if (raw.msgctxt !== undefined) entry.msgctxt = raw.msgctxt;
  const comments = readComments(raw.comments);
  if (comments) entry.comments = comments;

  if (msgidPlural !== undefined) {
    entry.msgidPlural = msgidPlural;
    entry.msgstrPlural = [...raw.msgstr];
    while (nplurals !== undefined && entry.msgstrPlural.length < nplurals) {
      entry.msgstrPlural.push('');
    }
  } else {
    entry.msgstr = raw.msgstr[0] ?? '';
  }
  return entry;
}

function collect(table: RawTable, obsolete: boolean, nplurals: number | undefined, into: CatalogEntry[]): void {
  for (const context of Object.values(table)) {
    for (const raw of Object.values(context)) {
      into.push(toEntry(raw, obsolete, nplurals));
    }
  }
}

export function parsePo(content: Buffer | string): Catalog {
  const parsed = gettextParser.po.parse(content);
  const nplurals = parseNPlurals(parsed.headers);
  const entries: CatalogEntry[] = [];

  collect(parsed.translations, false, nplurals, entries);

  if ('obsolete' in parsed) {
    const obsolete = obsoleteTableSchema.safeParse(parsed.obsolete);
    if (obsolete.success) {
      collect(obsolete.data, true, nplurals, entries);
    }
  }

  return {
    charset: parsed.charset || 'utf-8',
    headers: { ...parsed.headers },
    entries,
  };
}

function toRaw(entry: CatalogEntry): GetTextTranslation {
  const raw: GetTextTranslation = {
    msgid: entry.msgid,
    msgstr: isPluralEntry(entry) ? [...entry.msgstrPlural] : [entry.msgstr],
  };
  if (entry.msgctxt !== undefined) raw.msgctxt = entry.msgctxt;
  if (isPluralEntry(entry)) raw.msgid_plural = entry.msgidPlural;
  if (entry.comments) Object.assign(raw, { comments: { ...entry.comments } });
  return raw;
}

export function serializePo(catalog: Catalog): Buffer {
  const translations: GetTextTranslations['translations'] = {};
  const obsolete: GetTextTranslations['translations'] = {};

  for (const entry of catalog.entries) {
    const target = entry.obsolete ? obsolete : translations;
    const context = entry.msgctxt ?? '';
    target[context] ??= {};
    target[context][entry.msgid] = toRaw(entry);
  }

  const table: GetTextTranslations = {
    charset: catalog.charset,
    headers: { ...catalog.headers },
    translations,
  };
  if (Object.keys(obsolete).length > 0) {
    Object.assign(table, { obsolete });
  }

  return gettextParser.po.compile(table);
}

export class PoCatalogIO implements CatalogIO {
  async load(path: string): Promise<Catalog> {
    let content: Buffer;
    try {
      content = await fs.promises.readFile(path);
    } catch (error) {
      throw new CatalogIOError(path, `Cannot read catalog: ${errorMessage(error)}`, { cause: error });
    }

    try {
      return parsePo(content);
    } catch (error) {
      throw new CatalogIOError(path, `Cannot parse catalog: ${errorMessage(error)}`, { cause: error });
    }
  }

  async save(catalog: Catalog, path: string): Promise<void> {
    let content: Buffer;
    try {
      content = serializePo(catalog);
    } catch (error) {
      throw new CatalogIOError(path, `Cannot serialize catalog: ${errorMessage(error)}`, { cause: error });
    }

    try {
      await fs.promises.writeFile(path, content);
    } catch (error) {
      throw new CatalogIOError(path, `Cannot write catalog: ${errorMessage(error)}`, { cause: error });
    }
  }
}
