/**
 * Machine-readable JSON export of the catalog, grouped by tactic.
 */

import { writeFileSync, mkdirSync } from 'fs';
import { dirname } from 'path';

import type { TacticGroup } from '../types/catalog.js';

// ---------------------------------------------------------------------------
// Public Types
// ---------------------------------------------------------------------------

export interface CatalogExport {
  metadata: {
    generatedAt: string;
    populated: boolean;
    totalRecords: number;
    query?: string;
  };
  tactics: Array<{
    tactic: string;
    title: string;
    techniques: Array<{
      techniqueId: string;
      name: string;
      description: string;
      references: string;
      createdAt: string;
    }>;
  }>;
}

export interface CatalogExportOptions {
  populated: boolean;
  query?: string;
  generatedAt?: Date;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export function buildCatalogExport(
  groups: readonly TacticGroup[],
  options: CatalogExportOptions,
): CatalogExport {
  const totalRecords = groups.reduce((sum, g) => sum + g.records.length, 0);

  return {
    metadata: {
      generatedAt: (options.generatedAt ?? new Date()).toISOString(),
      populated: options.populated,
      totalRecords,
      ...(options.query ? { query: options.query } : {}),
    },
    tactics: groups.map((group) => ({
      tactic: group.tactic,
      title: group.title,
      techniques: group.records.map((r) => ({
        techniqueId: r.techniqueId,
        name: r.name,
        description: r.description,
        references: r.references,
        createdAt: r.createdAt,
      })),
    })),
  };
}

/**
 * Pretty-printed with 2-space indentation.
 */
export function generateCatalogJson(
  groups: readonly TacticGroup[],
  options: CatalogExportOptions,
): string {
  return JSON.stringify(buildCatalogExport(groups, options), null, 2);
}

/**
 * Write the export to disk, creating parent directories as needed.
 */
export function writeCatalogJson(
  groups: readonly TacticGroup[],
  options: CatalogExportOptions,
  outputPath: string,
): void {
  mkdirSync(dirname(outputPath), { recursive: true });
  writeFileSync(outputPath, generateCatalogJson(groups, options), 'utf-8');
}
