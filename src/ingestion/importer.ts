/**
 * Import orchestrator.
 *
 * Bundle/layer sources run first: they establish identifiers and tactic
 * membership. Spreadsheets run second and mostly enrich names and
 * descriptions, though they may add records too. A source that is missing
 * or fails to parse never stops the pass; a catalog write failure does.
 */

import { existsSync } from 'node:fs';

import type { RawCandidate } from '../types/catalog.js';
import type { ParsedSource, SourceKind } from '../types/sources.js';
import { mergeRecords, type MergeOptions } from '../catalog/merge.js';
import {
  CatalogWriteError,
  isCatalogPopulated,
  markCatalogPopulated,
  type CatalogStore,
} from '../catalog/store.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { normalizeCandidates } from './normalizer.js';
import { extractCandidates, loadJsonSource, loadSpreadsheetSource } from './source.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ImportSources {
  /** STIX bundles or Navigator layers, tried first. */
  bundlePaths: readonly string[];
  /** ATT&CK workbooks, tried second. */
  spreadsheetPaths: readonly string[];
}

export type SourceOutcome =
  | { path: string; status: 'missing' }
  | { path: string; status: 'failed'; error: string }
  | {
      path: string;
      status: 'imported';
      kind: SourceKind;
      candidates: number;
      accepted: number;
      rejected: number;
      inserted: number;
      enriched: number;
      changes: number;
    };

export interface ImportReport {
  /** Records inserted or enriched across all sources. */
  changes: number;
  /** Value of the populated flag after the pass. */
  populated: boolean;
  /** True when this pass set the flag for the first time. */
  populatedTransitioned: boolean;
  sources: SourceOutcome[];
  message: string;
}

export interface ImportOptions extends MergeOptions {
  logger?: Logger;
}

export const NO_DATA_MESSAGE = 'No data imported: files missing or unrecognized.';

export function formatImportMessage(changes: number): string {
  return changes > 0 ? `Imported/updated ${changes} rows.` : NO_DATA_MESSAGE;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Run one import pass over every candidate path. Throws CatalogWriteError
 * when the store fails; sources committed before the failure stay committed
 * and the populated flag is left untouched.
 */
export async function importCatalog(
  store: CatalogStore,
  sources: ImportSources,
  options: ImportOptions = {},
): Promise<ImportReport> {
  const log = options.logger ?? createLogger('importer');

  const plan: Array<{ path: string; load: (path: string) => Promise<ParsedSource> }> = [
    ...sources.bundlePaths.map((path) => ({ path, load: loadJsonSource })),
    ...sources.spreadsheetPaths.map((path) => ({ path, load: loadSpreadsheetSource })),
  ];

  const outcomes: SourceOutcome[] = [];
  let changes = 0;

  for (const { path, load } of plan) {
    const outcome = await importSource(store, path, load, options, log);
    outcomes.push(outcome);
    if (outcome.status === 'imported') {
      changes += outcome.changes;
    }
  }

  const wasPopulated = isCatalogPopulated(store);
  if (changes > 0 && !wasPopulated) {
    try {
      markCatalogPopulated(store);
    } catch (err) {
      throw new CatalogWriteError(
        `Could not record populated flag: ${err instanceof Error ? err.message : String(err)}`,
        err,
      );
    }
  }

  const populated = wasPopulated || changes > 0;
  const message = formatImportMessage(changes);
  log.info(message);

  return {
    changes,
    populated,
    populatedTransitioned: populated && !wasPopulated,
    sources: outcomes,
    message,
  };
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

async function importSource(
  store: CatalogStore,
  path: string,
  load: (path: string) => Promise<ParsedSource>,
  options: MergeOptions,
  log: Logger,
): Promise<SourceOutcome> {
  if (!existsSync(path)) {
    log.debug(`Skipping missing source ${path}`);
    return { path, status: 'missing' };
  }

  let source: ParsedSource;
  let candidates: RawCandidate[];
  try {
    source = await load(path);
    candidates = extractCandidates(source);
  } catch (err) {
    const error = err instanceof Error ? err.message : String(err);
    log.warn(`Skipping unreadable source ${path}: ${error}`);
    return { path, status: 'failed', error };
  }

  const { records, rejected } = normalizeCandidates(candidates);
  if (rejected > 0) {
    log.debug(`${path}: dropped ${rejected} invalid candidates`);
  }

  // CatalogWriteError propagates: the pass is over
  const stats = mergeRecords(store, records, options);

  log.info(
    `${path} (${source.kind}): ${records.length} records, ` +
      `${stats.inserted} inserted, ${stats.enriched} enriched`,
  );

  return {
    path,
    status: 'imported',
    kind: source.kind,
    candidates: candidates.length,
    accepted: records.length,
    rejected,
    inserted: stats.inserted,
    enriched: stats.enriched,
    changes: stats.changes,
  };
}
