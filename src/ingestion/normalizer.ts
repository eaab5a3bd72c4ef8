/**
 * Record normalizer: raw parser candidates to catalog-shaped records.
 */

import type { NormalizedRecord, RawCandidate } from '../types/catalog.js';
import { TECHNIQUE_ID_PATTERN, isTacticId } from '../knowledge/mitre-attack/tactics.js';

export interface NormalizeResult {
  records: NormalizedRecord[];
  rejected: number;
}

/**
 * Trim every field and validate id and tactic. Returns null for a candidate
 * that cannot be cataloged.
 */
export function normalizeCandidate(raw: RawCandidate): NormalizedRecord | null {
  const techniqueId = raw.techniqueId.trim();
  const tacticId = raw.tacticId.trim();

  if (!TECHNIQUE_ID_PATTERN.test(techniqueId)) return null;
  if (!isTacticId(tacticId)) return null;

  return {
    techniqueId,
    tacticId,
    name: (raw.name ?? '').trim(),
    description: (raw.description ?? '').trim(),
    references: (raw.references ?? '').trim(),
  };
}

export function normalizeCandidates(candidates: readonly RawCandidate[]): NormalizeResult {
  const records: NormalizedRecord[] = [];
  let rejected = 0;

  for (const candidate of candidates) {
    const record = normalizeCandidate(candidate);
    if (record) {
      records.push(record);
    } else {
      rejected++;
    }
  }

  return { records, rejected };
}
