/**
 * Translation cache backed by a LowDB JSON file
 *
 * Lookups and stores are synchronous, so each one is a single critical
 * section on the event loop. Flushes snapshot the map before writing and
 * run one at a time.
 */

import { Low } from 'lowdb';
import { JSONFile } from 'lowdb/node';
import path from 'path';
import fs from 'fs';
import { z } from 'zod';

import type { LanguageCode } from '../types/common.js';
import { CacheIOError, errorMessage } from '../errors.js';
import { fingerprint, isBlank } from './fingerprint.js';

export interface CacheFileData {
  version: 1;
  sourceLang?: string;
  targetLang?: string;
  updatedAt?: string;
  entries: Record<string, string>;
}

const cacheFileSchema = z.object({
  version: z.literal(1),
  sourceLang: z.string().optional(),
  targetLang: z.string().optional(),
  updatedAt: z.string().optional(),
  entries: z.record(z.string()),
});

export interface CacheStoreOptions {
  filePath: string;
  /** Flush after this many new insertions (default 100) */
  flushEvery?: number;
  /** When false, nothing is looked up, stored or written */
  enabled?: boolean;
}

export interface CacheStats {
  size: number;
  hits: number;
  misses: number;
  inserts: number;
  flushes: number;
  failedFlushes: number;
}

export const DEFAULT_FLUSH_EVERY = 100;

export class CacheStore {
  readonly filePath: string;
  readonly enabled: boolean;
  private readonly flushEvery: number;
  private readonly entries = new Map<string, string>();
  private db: Low<CacheFileData> | null = null;
  private insertsSinceFlush = 0;
  private flushChain: Promise<boolean> = Promise.resolve(true);
  private stats = { hits: 0, misses: 0, inserts: 0, flushes: 0, failedFlushes: 0 };

  constructor(options: CacheStoreOptions) {
    this.filePath = options.filePath;
    this.enabled = options.enabled ?? true;
    this.flushEvery = Math.max(1, options.flushEvery ?? DEFAULT_FLUSH_EVERY);
  }

  static disabled(): CacheStore {
    return new CacheStore({ filePath: '', enabled: false });
  }

  /**
   * Read the cache file. A missing file is an empty cache; a broken one is
   * logged and the run continues with an empty cache.
   */
  async load(): Promise<number> {
    if (!this.enabled) return 0;

    try {
      const adapter = new JSONFile<CacheFileData>(this.filePath);
      this.db = new Low(adapter, { version: 1, entries: {} });
      await this.db.read();

      const parsed = cacheFileSchema.safeParse(this.db.data);
      if (!parsed.success) {
        throw new CacheIOError(this.filePath, `Malformed cache file: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`);
      }

      for (const [key, value] of Object.entries(parsed.data.entries)) {
        this.entries.set(key, value);
      }
      console.log(`[CacheStore] Loaded ${this.entries.size} cached translations from ${this.filePath}`);
    } catch (error) {
      const cacheError = error instanceof CacheIOError
        ? error
        : new CacheIOError(this.filePath, `Failed to load cache: ${errorMessage(error)}`, { cause: error });
      console.warn(`[CacheStore] ${cacheError.message}. Starting with an empty cache.`);
      this.entries.clear();
    }

    return this.entries.size;
  }

  lookup(text: string, sourceLang: LanguageCode, targetLang: LanguageCode): string | undefined {
    if (!this.enabled || isBlank(text)) return undefined;

    const value = this.entries.get(fingerprint(text, sourceLang, targetLang));
    if (value === undefined) {
      this.stats.misses++;
    } else {
      this.stats.hits++;
    }
    return value;
  }

  /**
   * Insert a translation. Re-storing an existing key is a no-op; the first
   * value written for a key wins.
   */
  store(text: string, translation: string, sourceLang: LanguageCode, targetLang: LanguageCode): boolean {
    if (!this.enabled || isBlank(text)) return false;

    const key = fingerprint(text, sourceLang, targetLang);
    const existing = this.entries.get(key);
    if (existing !== undefined) {
      if (existing !== translation) {
        console.warn(`[CacheStore] Ignoring conflicting translation for cached key ${key.slice(0, 12)}`);
      }
      return false;
    }

    this.entries.set(key, translation);
    this.stats.inserts++;
    this.insertsSinceFlush++;

    if (this.insertsSinceFlush >= this.flushEvery) {
      this.insertsSinceFlush = 0;
      this.flushChain = this.enqueueFlush();
    }
    return true;
  }

  /**
   * Persist the whole cache. Never rejects; resolves false if the write failed.
   */
  flush(): Promise<boolean> {
    if (!this.enabled) return Promise.resolve(true);

    this.insertsSinceFlush = 0;
    this.flushChain = this.enqueueFlush();
    return this.flushChain;
  }

  get size(): number {
    return this.entries.size;
  }

  getStats(): CacheStats {
    return { size: this.entries.size, ...this.stats };
  }

  private enqueueFlush(): Promise<boolean> {
    return this.flushChain.then(() => this.writeSnapshot());
  }

  private async writeSnapshot(): Promise<boolean> {
    const snapshot: CacheFileData = {
      version: 1,
      updatedAt: new Date().toISOString(),
      entries: Object.fromEntries(this.entries),
    };

    try {
      await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
      if (!this.db) {
        this.db = new Low(new JSONFile<CacheFileData>(this.filePath), snapshot);
      }
      this.db.data = snapshot;
      await this.db.write();
      this.stats.flushes++;
      return true;
    } catch (error) {
      const cacheError = new CacheIOError(this.filePath, `Failed to flush cache: ${errorMessage(error)}`, { cause: error });
      console.error(`[CacheStore] ${cacheError.message}`);
      this.stats.failedFlushes++;
      return false;
    }
  }
}
