/**
 * Catalog merger: insert-if-absent, enrich-if-incomplete.
 *
 * A stored name or description that carries real data is never replaced;
 * incoming data only fills gaps and placeholders.
 */

import type { CatalogRecord, EnrichableFields, NormalizedRecord } from '../types/catalog.js';
import { CatalogWriteError, type CatalogStore } from './store.js';

export interface Resolution {
  fields: EnrichableFields;
  changed: boolean;
}

export type ConflictResolver = (existing: CatalogRecord, incoming: NormalizedRecord) => Resolution;

export interface MergeStats {
  inserted: number;
  enriched: number;
  unchanged: number;
  /** inserted + enriched */
  changes: number;
}

export interface MergeOptions {
  resolve?: ConflictResolver;
  /** Clock for `createdAt`; defaults to the current time. */
  now?: () => Date;
}

/** True when a stored name still needs enrichment. */
export function isPlaceholderName(name: string, techniqueId: string): boolean {
  const trimmed = name.trim();
  return trimmed === '' || trimmed === techniqueId;
}

/**
 * Default conflict resolution. `name` is replaced only while it is empty or
 * the technique id; `description` and `references` only while empty.
 */
export const resolveEnrichment: ConflictResolver = (existing, incoming) => {
  let { name, description, references } = existing;

  if (
    incoming.name !== '' &&
    incoming.name !== existing.name &&
    isPlaceholderName(existing.name, existing.techniqueId)
  ) {
    name = incoming.name;
  }
  if (incoming.description !== '' && existing.description.trim() === '') {
    description = incoming.description;
  }
  if (incoming.references !== '' && existing.references.trim() === '') {
    references = incoming.references;
  }

  const changed =
    name !== existing.name ||
    description !== existing.description ||
    references !== existing.references;

  return { fields: { name, description, references }, changed };
};

/**
 * Apply a batch of normalized records in one transaction. Any store failure
 * is rethrown as a CatalogWriteError after the transaction rolls back.
 */
export function mergeRecords(
  store: CatalogStore,
  records: readonly NormalizedRecord[],
  options: MergeOptions = {},
): MergeStats {
  const resolve = options.resolve ?? resolveEnrichment;
  const now = options.now ?? (() => new Date());

  try {
    return store.transaction(() => {
      const stats: MergeStats = { inserted: 0, enriched: 0, unchanged: 0, changes: 0 };
      const createdAt = now().toISOString();

      for (const record of records) {
        if (store.insertIfAbsent({ ...record, createdAt })) {
          stats.inserted++;
          continue;
        }

        const existing = store.find(record.techniqueId, record.tacticId);
        if (!existing) {
          throw new Error(`Record ${record.techniqueId}/${record.tacticId} vanished during merge`);
        }

        const resolution = resolve(existing, record);
        if (resolution.changed) {
          store.update(record.techniqueId, record.tacticId, resolution.fields);
          stats.enriched++;
        } else {
          stats.unchanged++;
        }
      }

      stats.changes = stats.inserted + stats.enriched;
      return stats;
    });
  } catch (err) {
    if (err instanceof CatalogWriteError) throw err;
    throw new CatalogWriteError(
      `Catalog write failed: ${err instanceof Error ? err.message : String(err)}`,
      err,
    );
  }
}
