/**
 * Spreadsheet parser for ATT&CK-style workbooks.
 *
 * Any sheet may or may not hold technique data; sheets are recognised by
 * their header row (see header-matcher.ts). Rows are scanned top to bottom.
 */

import * as XLSX from 'xlsx';

import type { RawCandidate } from '../../types/catalog.js';
import type { CellValue, SheetTable, WorkbookTable } from '../../types/sources.js';
import { toTacticId, type TacticId } from '../../knowledge/mitre-attack/tactics.js';
import {
  matchHeaderColumns,
  toTechniqueColumns,
  type TechniqueColumns,
} from '../header-matcher.js';

// ---------------------------------------------------------------------------
// Workbook reading
// ---------------------------------------------------------------------------

/**
 * Read an .xlsx (or any SheetJS-readable) buffer into plain row tables.
 * Throws when the buffer is not a workbook.
 */
export function readWorkbook(data: Buffer): WorkbookTable {
  const workbook = XLSX.read(data, { type: 'buffer', cellDates: true });

  return {
    sheets: workbook.SheetNames.map((name) => {
      const sheet = workbook.Sheets[name];
      const rows = sheet
        ? XLSX.utils.sheet_to_json<CellValue[]>(sheet, { header: 1, defval: null, blankrows: true })
        : [];
      return { name, rows };
    }),
  };
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

export function parseSpreadsheet(workbook: WorkbookTable): RawCandidate[] {
  return workbook.sheets.flatMap((sheet) => parseSheet(sheet));
}

/**
 * Parse a single sheet. Returns no candidates when the header row does not
 * name id, name and tactics columns.
 */
export function parseSheet(sheet: SheetTable): RawCandidate[] {
  const [header, ...rows] = sheet.rows;
  if (!header) return [];

  const columns = toTechniqueColumns(matchHeaderColumns(header));
  if (!columns) return [];

  return rows.flatMap((row) => parseRow(row, columns));
}

function parseRow(row: readonly CellValue[], columns: TechniqueColumns): RawCandidate[] {
  const techniqueId = cellText(row[columns.id]);
  if (!techniqueId.startsWith('T')) return [];

  const tactics = splitTactics(cellText(row[columns.tactics]));
  if (tactics.length === 0) return [];

  const name = cellText(row[columns.name]);
  const description = columns.description === undefined ? '' : cellText(row[columns.description]);

  return tactics.map((tacticId) => ({ techniqueId, tacticId, name, description }));
}

/**
 * Split a tactics cell into registry tactic ids, in order, without
 * duplicates. Commas and slashes always separate. Within a chunk, "and" /
 * "&" separate unless the words around them form a tactic name
 * ("Command and Control"); the longest such run wins.
 *
 * @example splitTactics('Initial Access, Execution') => ['initial-access', 'execution']
 * @example splitTactics('Command and Control and Impact') => ['command-and-control', 'impact']
 */
export function splitTactics(cell: string): TacticId[] {
  const tactics: TacticId[] = [];

  for (const chunk of cell.split(/[,/]/)) {
    for (const tactic of matchConjoinedTactics(chunk.split(/\band\b|&/i))) {
      if (!tactics.includes(tactic)) {
        tactics.push(tactic);
      }
    }
  }

  return tactics;
}

/** Greedy left-to-right match of "and"-joined words against the registry. */
function matchConjoinedTactics(words: readonly string[]): TacticId[] {
  const matched: TacticId[] = [];
  let start = 0;

  while (start < words.length) {
    let end = words.length;
    let tactic: TacticId | undefined;
    for (; end > start; end--) {
      tactic = toTacticId(words.slice(start, end).join(' and '));
      if (tactic) break;
    }

    if (tactic) {
      matched.push(tactic);
      start = end;
    } else {
      start++;
    }
  }

  return matched;
}

function cellText(value: CellValue | undefined): string {
  if (value === null || value === undefined) return '';
  if (value instanceof Date) return value.toISOString();
  return String(value).trim();
}
