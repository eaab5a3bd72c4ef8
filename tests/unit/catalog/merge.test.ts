/**
 * Tests for the catalog merger and its conflict resolution.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { MemoryCatalogStore } from '@/catalog/memory-store.js';
import { isPlaceholderName, mergeRecords, resolveEnrichment } from '@/catalog/merge.js';
import { CatalogWriteError } from '@/catalog/store.js';
import { TACTIC_ORDER } from '@/knowledge/mitre-attack/tactics.js';
import type { CatalogRecord, NormalizedRecord } from '@/types/catalog.js';

// ---------------------------------------------------------------------------
// Fixture Builders
// ---------------------------------------------------------------------------

const FIXED_NOW = () => new Date('2025-03-01T12:00:00.000Z');

function makeRecord(overrides?: Partial<NormalizedRecord>): NormalizedRecord {
  return {
    techniqueId: 'T1059',
    tacticId: 'execution',
    name: 'Command and Scripting Interpreter',
    description: 'Adversaries may abuse interpreters.',
    references: '',
    ...overrides,
  };
}

function stored(overrides?: Partial<CatalogRecord>): CatalogRecord {
  return { ...makeRecord(), createdAt: '2025-01-01T00:00:00.000Z', ...overrides };
}

// ---------------------------------------------------------------------------
// resolveEnrichment
// ---------------------------------------------------------------------------

describe('isPlaceholderName', () => {
  it('should treat empty and id-valued names as placeholders', () => {
    expect(isPlaceholderName('', 'T1059')).toBe(true);
    expect(isPlaceholderName('  ', 'T1059')).toBe(true);
    expect(isPlaceholderName('T1059', 'T1059')).toBe(true);
    expect(isPlaceholderName('T1059.001', 'T1059')).toBe(false);
    expect(isPlaceholderName('PowerShell', 'T1059')).toBe(false);
  });
});

describe('resolveEnrichment', () => {
  it('should replace a placeholder name', () => {
    const result = resolveEnrichment(stored({ name: 'T1059' }), makeRecord({ name: 'Interpreter' }));
    expect(result).toEqual({
      fields: { name: 'Interpreter', description: 'Adversaries may abuse interpreters.', references: '' },
      changed: true,
    });
  });

  it('should replace an empty name', () => {
    const result = resolveEnrichment(stored({ name: '' }), makeRecord({ name: 'Interpreter' }));
    expect(result.fields.name).toBe('Interpreter');
    expect(result.changed).toBe(true);
  });

  it('should never replace a genuine name', () => {
    const result = resolveEnrichment(stored({ name: 'Original' }), makeRecord({ name: 'Different' }));
    expect(result.fields.name).toBe('Original');
    expect(result.changed).toBe(false);
  });

  it('should never blank a field', () => {
    const result = resolveEnrichment(
      stored({ references: 'https://attack.mitre.org/techniques/T1059' }),
      makeRecord({ name: '', description: '', references: '' }),
    );
    expect(result.fields).toEqual({
      name: 'Command and Scripting Interpreter',
      description: 'Adversaries may abuse interpreters.',
      references: 'https://attack.mitre.org/techniques/T1059',
    });
    expect(result.changed).toBe(false);
  });

  it('should fill an empty description but not overwrite one', () => {
    expect(resolveEnrichment(stored({ description: '' }), makeRecord({ description: 'New' })).fields.description).toBe(
      'New',
    );
    expect(resolveEnrichment(stored({ description: 'Old' }), makeRecord({ description: 'New' })).fields.description).toBe(
      'Old',
    );
  });

  it('should not report a change when the placeholder is re-applied', () => {
    const result = resolveEnrichment(stored({ name: 'T1059' }), makeRecord({ name: 'T1059', description: '' }));
    expect(result.changed).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// mergeRecords
// ---------------------------------------------------------------------------

describe('mergeRecords', () => {
  let store: MemoryCatalogStore;

  beforeEach(() => {
    store = new MemoryCatalogStore();
  });

  it('should insert new records and stamp createdAt', () => {
    const stats = mergeRecords(store, [makeRecord()], { now: FIXED_NOW });

    expect(stats).toEqual({ inserted: 1, enriched: 0, unchanged: 0, changes: 1 });
    expect(store.find('T1059', 'execution')?.createdAt).toBe('2025-03-01T12:00:00.000Z');
  });

  it('should be idempotent for every tactic and id shape', () => {
    const batch = TACTIC_ORDER.flatMap((tacticId) => [
      makeRecord({ techniqueId: 'T1001', tacticId, name: 'Alpha' }),
      makeRecord({ techniqueId: 'T1001.002', tacticId, name: 'Beta' }),
    ]);

    const first = mergeRecords(store, batch, { now: FIXED_NOW });
    const snapshot = store.list();
    const second = mergeRecords(store, batch, { now: () => new Date('2030-01-01T00:00:00.000Z') });

    expect(first.changes).toBe(28);
    expect(second).toEqual({ inserted: 0, enriched: 0, unchanged: 28, changes: 0 });
    expect(store.list()).toEqual(snapshot);
  });

  it('should keep a technique under several tactics as separate records', () => {
    mergeRecords(store, [
      makeRecord({ techniqueId: 'T1078', tacticId: 'persistence', name: 'Valid Accounts' }),
      makeRecord({ techniqueId: 'T1078', tacticId: 'defense-evasion', name: 'Valid Accounts' }),
    ]);
    expect(store.count()).toBe(2);
  });

  it('should enrich a placeholder and count it once', () => {
    mergeRecords(store, [makeRecord({ name: 'T1059', description: '' })]);
    const stats = mergeRecords(store, [makeRecord({ name: 'Command and Scripting Interpreter', description: 'desc...' })]);

    expect(stats).toEqual({ inserted: 0, enriched: 1, unchanged: 0, changes: 1 });
    expect(store.find('T1059', 'execution')).toMatchObject({
      name: 'Command and Scripting Interpreter',
      description: 'desc...',
    });
    expect(store.count()).toBe(1);
  });

  it('should not change a genuine name on a later pass', () => {
    mergeRecords(store, [makeRecord({ name: 'Original' })]);
    const stats = mergeRecords(store, [makeRecord({ name: 'Replacement' })]);

    expect(stats.changes).toBe(0);
    expect(store.find('T1059', 'execution')?.name).toBe('Original');
  });

  it('should let the first non-empty name in a batch win', () => {
    const stats = mergeRecords(store, [
      makeRecord({ name: '', description: '' }),
      makeRecord({ name: 'First', description: '' }),
      makeRecord({ name: 'Second', description: '' }),
    ]);

    expect(stats).toEqual({ inserted: 1, enriched: 1, unchanged: 1, changes: 2 });
    expect(store.find('T1059', 'execution')?.name).toBe('First');
  });

  it('should use a custom resolver', () => {
    mergeRecords(store, [makeRecord({ name: 'Original' })]);
    const stats = mergeRecords(store, [makeRecord({ name: 'Replacement' })], {
      resolve: (_existing, incoming) => ({
        fields: { name: incoming.name, description: incoming.description, references: incoming.references },
        changed: true,
      }),
    });

    expect(stats.enriched).toBe(1);
    expect(store.find('T1059', 'execution')?.name).toBe('Replacement');
  });

  it('should roll back the batch and raise CatalogWriteError when the store fails', () => {
    class FailingStore extends MemoryCatalogStore {
      private inserts = 0;
      override insertIfAbsent(record: CatalogRecord): boolean {
        if (++this.inserts > 1) throw new Error('disk I/O error');
        return super.insertIfAbsent(record);
      }
    }
    const failing = new FailingStore();

    expect(() =>
      mergeRecords(failing, [makeRecord({ techniqueId: 'T1001' }), makeRecord({ techniqueId: 'T1002' })]),
    ).toThrow(CatalogWriteError);
    expect(failing.count()).toBe(0);
  });
});
