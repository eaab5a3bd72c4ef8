/**
 * Canonical ATT&CK Enterprise tactic registry.
 *
 * Order is kill-chain order, not alphabetical; every catalog record's tactic
 * must be a member.
 */

export const TACTIC_ORDER = [
  'reconnaissance',
  'resource-development',
  'initial-access',
  'execution',
  'persistence',
  'privilege-escalation',
  'defense-evasion',
  'credential-access',
  'discovery',
  'lateral-movement',
  'collection',
  'command-and-control',
  'exfiltration',
  'impact',
] as const;

export type TacticId = (typeof TACTIC_ORDER)[number];

export const TACTIC_TITLES: Readonly<Record<TacticId, string>> = {
  reconnaissance: 'Reconnaissance',
  'resource-development': 'Resource Development',
  'initial-access': 'Initial Access',
  execution: 'Execution',
  persistence: 'Persistence',
  'privilege-escalation': 'Privilege Escalation',
  'defense-evasion': 'Defense Evasion',
  'credential-access': 'Credential Access',
  discovery: 'Discovery',
  'lateral-movement': 'Lateral Movement',
  collection: 'Collection',
  'command-and-control': 'Command & Control',
  exfiltration: 'Exfiltration',
  impact: 'Impact',
};

const TACTIC_SET: ReadonlySet<string> = new Set(TACTIC_ORDER);

export const TECHNIQUE_ID_PATTERN = /^T\d{4}(\.\d{3})?$/;

export function isTacticId(value: string): value is TacticId {
  return TACTIC_SET.has(value);
}

/** Position of a tactic in kill-chain order. */
export function tacticRank(tactic: TacticId): number {
  return TACTIC_ORDER.indexOf(tactic);
}

/**
 * Convert a free-text tactic label ("Command and Control", "Privilege
 * Escalation") into registry form. Returns undefined when the result is not
 * a registry member.
 *
 * @example toTacticId('Command & Control') => 'command-and-control'
 */
export function toTacticId(label: string): TacticId | undefined {
  const slug = label
    .trim()
    .toLowerCase()
    .replace(/&/g, ' and ')
    .trim()
    .replace(/\s+/g, '-');
  return isTacticId(slug) ? slug : undefined;
}
