/**
 * Persistence contract for the technique catalog.
 *
 * All operations are synchronous; the pipeline is single-threaded and
 * better-sqlite3 is synchronous too.
 */

import type { CatalogRecord, EnrichableFields } from '../types/catalog.js';
import type { TacticId } from '../knowledge/mitre-attack/tactics.js';

export const POPULATED_SETTING = 'catalog_populated';

export interface CatalogStore {
  /** Insert unless `(techniqueId, tacticId)` exists. Returns true when inserted. */
  insertIfAbsent(record: CatalogRecord): boolean;
  find(techniqueId: string, tacticId: TacticId): CatalogRecord | undefined;
  update(techniqueId: string, tacticId: TacticId, fields: EnrichableFields): void;
  list(): CatalogRecord[];
  count(): number;
  getSetting(key: string): string | undefined;
  setSetting(key: string, value: string): void;
  /** Run `fn` atomically; a thrown error rolls back the writes made inside it. */
  transaction<T>(fn: () => T): T;
}

/** Wraps any failure of the persistence layer during an import pass. */
export class CatalogWriteError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'CatalogWriteError';
  }
}

export function isCatalogPopulated(store: CatalogStore): boolean {
  return store.getSetting(POPULATED_SETTING) === '1';
}

export function markCatalogPopulated(store: CatalogStore): void {
  store.setSetting(POPULATED_SETTING, '1');
}
