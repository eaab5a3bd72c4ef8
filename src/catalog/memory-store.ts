/**
 * In-process catalog store. Used by tests and by callers that do not need
 * persistence.
 */

import type { CatalogRecord, EnrichableFields } from '../types/catalog.js';
import type { TacticId } from '../knowledge/mitre-attack/tactics.js';
import type { CatalogStore } from './store.js';

function keyOf(techniqueId: string, tacticId: string): string {
  return `${techniqueId}\u0000${tacticId}`;
}

export class MemoryCatalogStore implements CatalogStore {
  private records = new Map<string, CatalogRecord>();
  private settings = new Map<string, string>();

  insertIfAbsent(record: CatalogRecord): boolean {
    const key = keyOf(record.techniqueId, record.tacticId);
    if (this.records.has(key)) return false;
    this.records.set(key, { ...record });
    return true;
  }

  find(techniqueId: string, tacticId: TacticId): CatalogRecord | undefined {
    const record = this.records.get(keyOf(techniqueId, tacticId));
    return record ? { ...record } : undefined;
  }

  update(techniqueId: string, tacticId: TacticId, fields: EnrichableFields): void {
    const key = keyOf(techniqueId, tacticId);
    const record = this.records.get(key);
    if (!record) return;
    this.records.set(key, { ...record, ...fields });
  }

  list(): CatalogRecord[] {
    return [...this.records.values()].map((r) => ({ ...r }));
  }

  count(): number {
    return this.records.size;
  }

  getSetting(key: string): string | undefined {
    return this.settings.get(key);
  }

  setSetting(key: string, value: string): void {
    this.settings.set(key, value);
  }

  transaction<T>(fn: () => T): T {
    const records = new Map(this.records);
    const settings = new Map(this.settings);
    try {
      return fn();
    } catch (err) {
      this.records = records;
      this.settings = settings;
      throw err;
    }
  }
}
