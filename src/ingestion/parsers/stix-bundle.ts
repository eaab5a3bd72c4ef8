/**
 * STIX bundle parser.
 *
 * Emits one raw candidate per (attack-pattern, mitre-attack kill-chain phase)
 * pair. The technique id lives in the external references, not on the object.
 */

import { z } from 'zod';

import type { RawCandidate } from '../../types/catalog.js';
import type { StixObject } from '../../types/sources.js';

export const ATTACK_SOURCE_NAME = 'mitre-attack';
export const ATTACK_KILL_CHAIN = 'mitre-attack';

const StixObjectSchema = z
  .object({
    type: z.string(),
    id: z.string().optional(),
    name: z.string().optional(),
    description: z.string().optional(),
    external_references: z
      .array(
        z
          .object({
            source_name: z.string().optional(),
            external_id: z.string().optional(),
            url: z.string().optional(),
          })
          .passthrough(),
      )
      .optional(),
    kill_chain_phases: z
      .array(
        z
          .object({
            kill_chain_name: z.string().optional(),
            phase_name: z.string().optional(),
          })
          .passthrough(),
      )
      .optional(),
    revoked: z.boolean().optional(),
    x_mitre_deprecated: z.boolean().optional(),
  })
  .passthrough();

/**
 * Parse the `objects` array of a STIX bundle. Objects that do not validate
 * are skipped rather than failing the whole bundle.
 */
export function parseStixBundle(objects: readonly unknown[]): RawCandidate[] {
  const candidates: RawCandidate[] = [];

  for (const raw of objects) {
    const parsed = StixObjectSchema.safeParse(raw);
    if (!parsed.success) continue;

    const obj: StixObject = parsed.data;
    if (obj.type !== 'attack-pattern') continue;
    if (obj.revoked || obj.x_mitre_deprecated) continue;

    const reference = findAttackReference(obj);
    if (!reference) continue;

    const tactics = getAttackPhases(obj);
    for (const tacticId of tactics) {
      candidates.push({
        techniqueId: reference.externalId,
        tacticId,
        name: obj.name ?? '',
        description: obj.description ?? '',
        references: reference.url,
      });
    }
  }

  return candidates;
}

/**
 * First external reference from the ATT&CK source whose id looks like a
 * technique id.
 */
export function findAttackReference(
  obj: StixObject,
): { externalId: string; url: string } | undefined {
  for (const ref of obj.external_references ?? []) {
    const source = (ref.source_name ?? '').toLowerCase();
    const externalId = ref.external_id ?? '';
    if (source === ATTACK_SOURCE_NAME && externalId.startsWith('T')) {
      return { externalId, url: ref.url ?? '' };
    }
  }
  return undefined;
}

/** Lower-cased phase names from the ATT&CK kill chain only. */
export function getAttackPhases(obj: StixObject): string[] {
  return (obj.kill_chain_phases ?? [])
    .filter((kc) => kc.kill_chain_name === ATTACK_KILL_CHAIN)
    .map((kc) => (kc.phase_name ?? '').toLowerCase())
    .filter(Boolean);
}
