/**
 * First-run seeding of an empty catalog.
 */

import { DEFAULT_TECHNIQUES } from '../knowledge/mitre-attack/seed.js';
import type { NormalizedRecord } from '../types/catalog.js';
import { mergeRecords } from './merge.js';
import type { CatalogStore } from './store.js';

/**
 * Insert baseline techniques when the catalog holds no records. Does not set
 * the populated flag. Returns the number of records inserted.
 */
export function seedDefaultTechniques(
  store: CatalogStore,
  techniques: readonly NormalizedRecord[] = DEFAULT_TECHNIQUES,
): number {
  if (store.count() > 0) return 0;
  return mergeRecords(store, techniques).inserted;
}
