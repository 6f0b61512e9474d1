import type { Catalog } from '../types/catalog.js';

/**
 * Catalog persistence. Both operations reject with CatalogIOError.
 *
 * `save` must take its snapshot of the catalog before its first await, so a
 * caller that keeps mutating the catalog afterwards does not affect the write.
 */
export interface CatalogIO {
  load(path: string): Promise<Catalog>;
  save(catalog: Catalog, path: string): Promise<void>;
}
