/**
 * Read contract over the catalog: grouped listing and status.
 */

import type { CatalogRecord, CatalogStatus, TacticGroup } from '../types/catalog.js';
import { TACTIC_ORDER, TACTIC_TITLES, type TacticId } from '../knowledge/mitre-attack/tactics.js';
import { isCatalogPopulated, type CatalogStore } from './store.js';

export interface ListCatalogOptions {
  /** Case-insensitive substring matched against name, technique id and tactic id. */
  query?: string;
}

/**
 * Every tactic in kill-chain order, including those with no records. Records
 * within a tactic are sorted by name, then technique id.
 */
export function listCatalog(store: CatalogStore, options: ListCatalogOptions = {}): TacticGroup[] {
  const query = (options.query ?? '').trim().toLowerCase();
  const records = query
    ? store.list().filter((r) => matchesQuery(r, query))
    : store.list();

  return groupByTactic(records);
}

export function matchesQuery(record: CatalogRecord, query: string): boolean {
  return (
    record.name.toLowerCase().includes(query) ||
    record.techniqueId.toLowerCase().includes(query) ||
    record.tacticId.includes(query)
  );
}

export function groupByTactic(records: readonly CatalogRecord[]): TacticGroup[] {
  const byTactic = new Map<TacticId, CatalogRecord[]>();
  for (const record of records) {
    const bucket = byTactic.get(record.tacticId);
    if (bucket) {
      bucket.push(record);
    } else {
      byTactic.set(record.tacticId, [record]);
    }
  }

  return TACTIC_ORDER.map((tactic) => ({
    tactic,
    title: TACTIC_TITLES[tactic],
    records: (byTactic.get(tactic) ?? []).sort(compareRecords),
  }));
}

function compareRecords(a: CatalogRecord, b: CatalogRecord): number {
  if (a.name !== b.name) return a.name < b.name ? -1 : 1;
  if (a.techniqueId !== b.techniqueId) return a.techniqueId < b.techniqueId ? -1 : 1;
  return 0;
}

export function getCatalogStatus(store: CatalogStore): CatalogStatus {
  const counts = new Map<TacticId, number>();
  const records = store.list();
  for (const record of records) {
    counts.set(record.tacticId, (counts.get(record.tacticId) ?? 0) + 1);
  }

  return {
    populated: isCatalogPopulated(store),
    totalRecords: records.length,
    byTactic: TACTIC_ORDER.map((tactic) => ({
      tactic,
      title: TACTIC_TITLES[tactic],
      count: counts.get(tactic) ?? 0,
    })),
  };
}
