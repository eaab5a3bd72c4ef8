/**
 * Catalog types for the ATT&CK technique/tactic table.
 */

import type { TacticId } from '../knowledge/mitre-attack/tactics.js';

export interface CatalogRecord {
  techniqueId: string;           // e.g., "T1059.001"
  tacticId: TacticId;            // e.g., "execution"
  name: string;                  // empty or equal to techniqueId until enriched
  description: string;
  references: string;            // e.g., "https://attack.mitre.org/techniques/T1059/001"
  createdAt: string;             // ISO-8601, set at first insertion
}

/** A catalog record before the store stamps `createdAt`. */
export type NormalizedRecord = Omit<CatalogRecord, 'createdAt'>;

/** The fields an import pass may fill in on an existing record. */
export type EnrichableFields = Pick<CatalogRecord, 'name' | 'description' | 'references'>;

/**
 * A candidate emitted by a source parser, before normalization.
 * Nothing here has been validated against the tactic registry yet.
 */
export interface RawCandidate {
  techniqueId: string;
  tacticId: string;
  name?: string;
  description?: string;
  references?: string;
}

export interface TacticGroup {
  tactic: TacticId;
  title: string;
  records: CatalogRecord[];
}

export interface TacticCount {
  tactic: TacticId;
  title: string;
  count: number;
}

export interface CatalogStatus {
  populated: boolean;
  totalRecords: number;
  byTactic: TacticCount[];     // kill-chain order
}
