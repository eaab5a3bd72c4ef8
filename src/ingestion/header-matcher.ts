/**
 * Fuzzy header matching for technique spreadsheets.
 *
 * ATT&CK exports (and hand-edited copies of them) do not agree on column
 * names, so each logical column is located by case-insensitive substring
 * match against a list of synonyms.
 */

export type LogicalColumn = 'id' | 'name' | 'description' | 'tactics';

/** Synonyms per logical column. A header matches when it contains any of them. */
export const HEADER_SYNONYMS: Readonly<Record<LogicalColumn, readonly string[]>> = {
  id: ['technique id', 'external id', 'external_id', 'id'],
  name: ['technique name', 'technique', 'name'],
  description: ['description', 'technique description'],
  tactics: ['tactics', 'tactic', 'domain tactics'],
};

/**
 * Columns are claimed in this order. `name` goes last because its synonyms
 * ("technique", "name") are the broadest.
 */
export const RESOLUTION_ORDER: readonly LogicalColumn[] = ['id', 'tactics', 'description', 'name'];

export type ColumnMap = Partial<Record<LogicalColumn, number>>;

export interface TechniqueColumns {
  id: number;
  name: number;
  tactics: number;
  description?: number;
}

/**
 * Match header cells to logical columns. Returns zero-based column indexes;
 * a logical column without a match is absent from the result.
 *
 * @example matchHeaderColumns(['ID', 'name', 'tactics']) => { id: 0, tactics: 2, name: 1 }
 */
export function matchHeaderColumns(
  headers: readonly unknown[],
  synonyms: Readonly<Record<LogicalColumn, readonly string[]>> = HEADER_SYNONYMS,
): ColumnMap {
  const normalized = headers.map((h) =>
    h === null || h === undefined ? '' : String(h).trim().toLowerCase(),
  );
  const claimed = new Set<number>();
  const columns: ColumnMap = {};

  for (const logical of RESOLUTION_ORDER) {
    const index = findColumn(normalized, synonyms[logical], claimed);
    if (index !== undefined) {
      columns[logical] = index;
      claimed.add(index);
    }
  }

  return columns;
}

/**
 * Narrow a column map to one that describes technique data, or undefined
 * when any required column is missing.
 */
export function toTechniqueColumns(columns: ColumnMap): TechniqueColumns | undefined {
  const { id, name, tactics, description } = columns;
  if (id === undefined || name === undefined || tactics === undefined) {
    return undefined;
  }
  return description === undefined ? { id, name, tactics } : { id, name, tactics, description };
}

/** Leftmost unclaimed header containing any of the keys. */
function findColumn(
  headers: readonly string[],
  keys: readonly string[],
  claimed: ReadonlySet<number>,
): number | undefined {
  const index = headers.findIndex(
    (h, i) => h !== '' && !claimed.has(i) && keys.some((key) => h.includes(key)),
  );
  return index === -1 ? undefined : index;
}
