/**
 * ATT&CK Navigator layer parser.
 *
 * Layers only carry technique ids and tactic short-names, so every candidate
 * gets the technique id as a placeholder name for a later pass to enrich.
 */

import type { RawCandidate } from '../../types/catalog.js';
import type { NavigatorTechniqueEntry } from '../../types/sources.js';

export function parseNavigatorLayer(entries: readonly unknown[]): RawCandidate[] {
  const candidates: RawCandidate[] = [];

  for (const entry of entries) {
    const { techniqueID, tactic } = readEntry(entry);
    if (!techniqueID || !tactic) continue;

    candidates.push({
      techniqueId: techniqueID,
      tacticId: tactic.toLowerCase(),
      name: techniqueID,
      description: '',
    });
  }

  return candidates;
}

function readEntry(entry: unknown): NavigatorTechniqueEntry {
  if (typeof entry !== 'object' || entry === null) return {};
  const techniqueID = 'techniqueID' in entry ? entry.techniqueID : undefined;
  const tactic = 'tactic' in entry ? entry.tactic : undefined;
  return {
    ...(typeof techniqueID === 'string' ? { techniqueID } : {}),
    ...(typeof tactic === 'string' ? { tactic } : {}),
  };
}
