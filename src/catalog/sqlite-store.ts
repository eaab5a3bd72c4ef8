/**
 * SQLite-backed catalog store (better-sqlite3, prepared statements).
 *
 * The UNIQUE(technique_id, tactic) constraint plus ON CONFLICT DO NOTHING
 * makes every insert idempotent.
 */

import Database from 'better-sqlite3';

import type { CatalogRecord, EnrichableFields } from '../types/catalog.js';
import { isTacticId, type TacticId } from '../knowledge/mitre-attack/tactics.js';
import type { CatalogStore } from './store.js';

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS ttps (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    technique_id TEXT NOT NULL,
    tactic TEXT NOT NULL,
    name TEXT NOT NULL DEFAULT '',
    description TEXT NOT NULL DEFAULT '',
    refs TEXT NOT NULL DEFAULT '',
    created_at TEXT NOT NULL,
    UNIQUE(technique_id, tactic)
  );
  CREATE TABLE IF NOT EXISTS settings (
    key TEXT PRIMARY KEY,
    value TEXT
  );
`;

// ---------------------------------------------------------------------------
// Internal Row Types
// ---------------------------------------------------------------------------

interface TtpRow {
  readonly technique_id: string;
  readonly tactic: string;
  readonly name: string | null;
  readonly description: string | null;
  readonly refs: string | null;
  readonly created_at: string;
}

interface SettingRow {
  readonly value: string | null;
}

interface CountRow {
  readonly count: number;
}

interface UpdateParams extends EnrichableFields {
  techniqueId: string;
  tacticId: TacticId;
}

// ---------------------------------------------------------------------------
// SqliteCatalogStore
// ---------------------------------------------------------------------------

export class SqliteCatalogStore implements CatalogStore {
  private readonly db: Database.Database;

  private readonly stmtInsert: Database.Statement<[CatalogRecord]>;
  private readonly stmtFind: Database.Statement<[string, string], TtpRow>;
  private readonly stmtUpdate: Database.Statement<[UpdateParams]>;
  private readonly stmtList: Database.Statement<[], TtpRow>;
  private readonly stmtCount: Database.Statement<[], CountRow>;
  private readonly stmtGetSetting: Database.Statement<[string], SettingRow>;
  private readonly stmtSetSetting: Database.Statement<[string, string]>;

  constructor(db: Database.Database) {
    this.db = db;
    db.exec(SCHEMA);

    this.stmtInsert = db.prepare<[CatalogRecord]>(`
      INSERT INTO ttps (technique_id, tactic, name, description, refs, created_at)
      VALUES (@techniqueId, @tacticId, @name, @description, @references, @createdAt)
      ON CONFLICT(technique_id, tactic) DO NOTHING
    `);

    this.stmtFind = db.prepare<[string, string], TtpRow>(`
      SELECT technique_id, tactic, name, description, refs, created_at
      FROM ttps
      WHERE technique_id = ? AND tactic = ?
    `);

    this.stmtUpdate = db.prepare<[UpdateParams]>(`
      UPDATE ttps
      SET name = @name, description = @description, refs = @references
      WHERE technique_id = @techniqueId AND tactic = @tacticId
    `);

    this.stmtList = db.prepare<[], TtpRow>(`
      SELECT technique_id, tactic, name, description, refs, created_at
      FROM ttps
      ORDER BY tactic, name, technique_id
    `);

    this.stmtCount = db.prepare<[], CountRow>('SELECT COUNT(*) AS count FROM ttps');
    this.stmtGetSetting = db.prepare<[string], SettingRow>('SELECT value FROM settings WHERE key = ?');
    this.stmtSetSetting = db.prepare<[string, string]>(
      'INSERT INTO settings (key, value) VALUES (?, ?) ON CONFLICT(key) DO UPDATE SET value = excluded.value',
    );
  }

  /** Open (creating if needed) a database file, or `:memory:`. */
  static open(path: string): SqliteCatalogStore {
    return new SqliteCatalogStore(new Database(path));
  }

  close(): void {
    this.db.close();
  }

  insertIfAbsent(record: CatalogRecord): boolean {
    return this.stmtInsert.run(record).changes > 0;
  }

  find(techniqueId: string, tacticId: TacticId): CatalogRecord | undefined {
    const row = this.stmtFind.get(techniqueId, tacticId);
    return row ? toRecord(row) : undefined;
  }

  update(techniqueId: string, tacticId: TacticId, fields: EnrichableFields): void {
    this.stmtUpdate.run({ techniqueId, tacticId, ...fields });
  }

  list(): CatalogRecord[] {
    const rows = this.stmtList.all();
    const records: CatalogRecord[] = [];
    for (const row of rows) {
      const record = toRecord(row);
      if (record) records.push(record);
    }
    return records;
  }

  count(): number {
    return this.stmtCount.get()?.count ?? 0;
  }

  getSetting(key: string): string | undefined {
    const row = this.stmtGetSetting.get(key);
    return row?.value ?? undefined;
  }

  setSetting(key: string, value: string): void {
    this.stmtSetSetting.run(key, value);
  }

  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }
}

// Rows written by older versions may carry tactics outside the registry;
// they are not surfaced.
function toRecord(row: TtpRow): CatalogRecord | undefined {
  if (!isTacticId(row.tactic)) return undefined;
  return {
    techniqueId: row.technique_id,
    tacticId: row.tactic,
    name: row.name ?? '',
    description: row.description ?? '',
    references: row.refs ?? '',
    createdAt: row.created_at,
  };
}
