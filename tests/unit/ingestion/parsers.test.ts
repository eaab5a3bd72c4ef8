/**
 * Tests for the catalog source parsers (STIX bundle, Navigator layer,
 * spreadsheet).
 */

import { describe, it, expect } from 'vitest';
import * as XLSX from 'xlsx';
import { parseStixBundle, findAttackReference } from '@/ingestion/parsers/stix-bundle.js';
import { parseNavigatorLayer } from '@/ingestion/parsers/navigator-layer.js';
import {
  parseSheet,
  parseSpreadsheet,
  readWorkbook,
  splitTactics,
} from '@/ingestion/parsers/spreadsheet.js';
import type { CellValue, WorkbookTable } from '@/types/sources.js';
import { ATTACK_TECHNIQUE_HEADERS, attackTechniqueRow } from '../../fixtures/attack/workbook.js';

// ---------------------------------------------------------------------------
// Fixture builders
// ---------------------------------------------------------------------------

function attackPattern(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    type: 'attack-pattern',
    id: 'attack-pattern--0001',
    name: 'Command and Scripting Interpreter',
    description: 'Adversaries may abuse command and script interpreters.',
    external_references: [
      {
        source_name: 'mitre-attack',
        external_id: 'T1059',
        url: 'https://attack.mitre.org/techniques/T1059',
      },
    ],
    kill_chain_phases: [{ kill_chain_name: 'mitre-attack', phase_name: 'execution' }],
    ...overrides,
  };
}

function workbook(...sheets: Array<{ name: string; rows: CellValue[][] }>): WorkbookTable {
  return { sheets };
}

// ---------------------------------------------------------------------------
// STIX bundle
// ---------------------------------------------------------------------------

describe('parseStixBundle', () => {
  it('should emit one candidate for a single-phase technique', () => {
    expect(parseStixBundle([attackPattern()])).toEqual([
      {
        techniqueId: 'T1059',
        tacticId: 'execution',
        name: 'Command and Scripting Interpreter',
        description: 'Adversaries may abuse command and script interpreters.',
        references: 'https://attack.mitre.org/techniques/T1059',
      },
    ]);
  });

  it('should emit one candidate per recognised phase', () => {
    const obj = attackPattern({
      external_references: [{ source_name: 'mitre-attack', external_id: 'T1078' }],
      name: 'Valid Accounts',
      kill_chain_phases: [
        { kill_chain_name: 'mitre-attack', phase_name: 'defense-evasion' },
        { kill_chain_name: 'mitre-attack', phase_name: 'Persistence' },
        { kill_chain_name: 'lockheed-martin', phase_name: 'installation' },
      ],
    });

    const candidates = parseStixBundle([obj]);

    expect(candidates).toHaveLength(2);
    expect(candidates.map((c) => c.tacticId)).toEqual(['defense-evasion', 'persistence']);
    expect(new Set(candidates.map((c) => `${c.techniqueId}|${c.name}|${c.description}`)).size).toBe(1);
  });

  it('should skip techniques without ATT&CK kill-chain phases', () => {
    expect(parseStixBundle([attackPattern({ kill_chain_phases: [] })])).toEqual([]);
    expect(parseStixBundle([attackPattern({ kill_chain_phases: undefined })])).toEqual([]);
    expect(
      parseStixBundle([
        attackPattern({ kill_chain_phases: [{ kill_chain_name: 'other', phase_name: 'execution' }] }),
      ]),
    ).toEqual([]);
  });

  it('should skip objects without an ATT&CK technique reference', () => {
    const noRefs = attackPattern({ external_references: [] });
    const capecOnly = attackPattern({
      external_references: [{ source_name: 'capec', external_id: 'CAPEC-66' }],
    });
    const tacticRef = attackPattern({
      external_references: [{ source_name: 'mitre-attack', external_id: 'TA0002' }],
    });

    expect(parseStixBundle([noRefs, capecOnly])).toEqual([]);
    // TA0002 starts with "T"; the normalizer is what rejects it
    expect(parseStixBundle([tacticRef])[0]?.techniqueId).toBe('TA0002');
  });

  it('should ignore non-technique, revoked and deprecated objects', () => {
    const objects = [
      { type: 'x-mitre-tactic', name: 'Execution', x_mitre_shortname: 'execution' },
      { type: 'relationship', source_ref: 'a', target_ref: 'b' },
      attackPattern({ revoked: true }),
      attackPattern({ x_mitre_deprecated: true }),
    ];
    expect(parseStixBundle(objects)).toEqual([]);
  });

  it('should skip malformed objects without failing the bundle', () => {
    const objects = [null, 'text', { type: 42 }, attackPattern({ external_references: 'nope' }), attackPattern()];
    const candidates = parseStixBundle(objects);
    expect(candidates).toHaveLength(1);
    expect(candidates[0].techniqueId).toBe('T1059');
  });

  it('should default missing name and description to empty strings', () => {
    const obj = attackPattern({ name: undefined, description: undefined });
    expect(parseStixBundle([obj])[0]).toMatchObject({ name: '', description: '' });
  });
});

describe('findAttackReference', () => {
  it('should take the first matching reference, case-insensitive on source', () => {
    const ref = findAttackReference({
      type: 'attack-pattern',
      external_references: [
        { source_name: 'MITRE-ATTACK', external_id: 'T1003', url: 'first' },
        { source_name: 'mitre-attack', external_id: 'T1004', url: 'second' },
      ],
    });
    expect(ref).toEqual({ externalId: 'T1003', url: 'first' });
  });
});

// ---------------------------------------------------------------------------
// Navigator layer
// ---------------------------------------------------------------------------

describe('parseNavigatorLayer', () => {
  it('should use the technique id as placeholder name', () => {
    expect(parseNavigatorLayer([{ techniqueID: 'T1059', tactic: 'execution' }])).toEqual([
      { techniqueId: 'T1059', tacticId: 'execution', name: 'T1059', description: '' },
    ]);
  });

  it('should lower-case the tactic', () => {
    expect(parseNavigatorLayer([{ techniqueID: 'T1021', tactic: 'Lateral-Movement' }])[0]?.tacticId).toBe(
      'lateral-movement',
    );
  });

  it('should skip entries missing id or tactic', () => {
    const entries = [
      { techniqueID: 'T1059' },
      { tactic: 'execution' },
      { techniqueID: '', tactic: 'execution' },
      { techniqueID: 'T1003', tactic: '' },
      { techniqueID: 1059, tactic: 'execution' },
      null,
      'T1059',
    ];
    expect(parseNavigatorLayer(entries)).toEqual([]);
  });
});

// ---------------------------------------------------------------------------
// Spreadsheet
// ---------------------------------------------------------------------------

describe('splitTactics', () => {
  it('should split on commas', () => {
    expect(splitTactics('Initial Access, Execution')).toEqual(['initial-access', 'execution']);
  });

  it('should split on slashes and the word "and"', () => {
    expect(splitTactics('Persistence/Privilege Escalation')).toEqual([
      'persistence',
      'privilege-escalation',
    ]);
    expect(splitTactics('Persistence and Defense Evasion')).toEqual(['persistence', 'defense-evasion']);
    expect(splitTactics('Discovery & Collection')).toEqual(['discovery', 'collection']);
  });

  it('should keep tactics whose own name contains "and"', () => {
    expect(splitTactics('Command and Control')).toEqual(['command-and-control']);
    expect(splitTactics('Command & Control, Exfiltration')).toEqual(['command-and-control', 'exfiltration']);
  });

  it('should keep an "and"-bearing tactic joined to others by "and"', () => {
    expect(splitTactics('Command and Control and Impact')).toEqual(['command-and-control', 'impact']);
    expect(splitTactics('Impact & Command and Control')).toEqual(['impact', 'command-and-control']);
    expect(splitTactics('Discovery and Weaponization and Command & Control')).toEqual([
      'discovery',
      'command-and-control',
    ]);
  });

  it('should drop unknown tokens and duplicates', () => {
    expect(splitTactics('Execution, Weaponization, execution')).toEqual(['execution']);
    expect(splitTactics('Weaponization')).toEqual([]);
    expect(splitTactics('')).toEqual([]);
  });
});

describe('parseSheet', () => {
  const header: CellValue[] = ['ID', 'name', 'description', 'tactics'];

  it('should emit one candidate per recognised tactic', () => {
    const candidates = parseSheet({
      name: 'techniques',
      rows: [header, ['T1566', ' Phishing ', ' Send phishing messages. ', 'Initial Access, Execution']],
    });

    expect(candidates).toEqual([
      { techniqueId: 'T1566', tacticId: 'initial-access', name: 'Phishing', description: 'Send phishing messages.' },
      { techniqueId: 'T1566', tacticId: 'execution', name: 'Phishing', description: 'Send phishing messages.' },
    ]);
  });

  it('should read names from the full ATT&CK techniques sheet', () => {
    const candidates = parseSheet({
      name: 'techniques',
      rows: [
        ATTACK_TECHNIQUE_HEADERS,
        attackTechniqueRow({
          ID: 'T1059',
          'STIX ID': 'attack-pattern--0001',
          name: 'Command and Scripting Interpreter',
          description: 'desc...',
          tactics: 'Execution',
          'is sub-technique': false,
          'sub-technique of': '',
        }),
      ],
    });

    expect(candidates).toEqual([
      {
        techniqueId: 'T1059',
        tacticId: 'execution',
        name: 'Command and Scripting Interpreter',
        description: 'desc...',
      },
    ]);
  });

  it('should skip a sheet without a name column even when it has ids', () => {
    const candidates = parseSheet({
      name: 'relationships',
      rows: [
        ['source ID', 'target ID', 'tactics'],
        ['T1059', 'S0001', 'Execution'],
      ],
    });
    expect(candidates).toEqual([]);
  });

  it('should skip rows whose id does not start with T', () => {
    const candidates = parseSheet({
      name: 'techniques',
      rows: [header, ['S0154', 'Cobalt Strike', '', 'Execution'], [null, 'Blank', '', 'Execution']],
    });
    expect(candidates).toEqual([]);
  });

  it('should skip rows with empty or unrecognised tactics', () => {
    const candidates = parseSheet({
      name: 'techniques',
      rows: [header, ['T1001', 'Data Obfuscation', '', ''], ['T1002', 'Legacy', '', 'Weaponization']],
    });
    expect(candidates).toEqual([]);
  });

  it('should default description when the column is absent', () => {
    const candidates = parseSheet({
      name: 'techniques',
      rows: [
        ['Technique ID', 'Technique', 'Tactic'],
        ['T1021', 'Remote Services', 'Lateral Movement'],
      ],
    });
    expect(candidates).toEqual([
      { techniqueId: 'T1021', tacticId: 'lateral-movement', name: 'Remote Services', description: '' },
    ]);
  });

  it('should keep row order top to bottom', () => {
    const candidates = parseSheet({
      name: 'techniques',
      rows: [header, ['T1059', '', '', 'Execution'], ['T1059', 'Second', '', 'Execution'], ['T1059', 'Third', '', 'Execution']],
    });
    expect(candidates.map((c) => c.name)).toEqual(['', 'Second', 'Third']);
  });

  it('should handle an empty sheet', () => {
    expect(parseSheet({ name: 'empty', rows: [] })).toEqual([]);
  });
});

describe('parseSpreadsheet', () => {
  it('should scan every sheet and ignore non-technique ones', () => {
    const candidates = parseSpreadsheet(
      workbook(
        { name: 'tactics', rows: [['ID', 'name', 'description'], ['TA0002', 'Execution', 'Run code']] },
        { name: 'techniques', rows: [['ID', 'name', 'tactics'], ['T1059', 'Command and Scripting Interpreter', 'Execution']] },
        { name: 'more techniques', rows: [['ID', 'name', 'tactics'], ['T1003', 'OS Credential Dumping', 'Credential Access']] },
      ),
    );

    expect(candidates.map((c) => `${c.techniqueId}:${c.tacticId}`)).toEqual([
      'T1059:execution',
      'T1003:credential-access',
    ]);
  });
});

describe('readWorkbook', () => {
  it('should read sheets from an xlsx buffer', () => {
    const book = XLSX.utils.book_new();
    XLSX.utils.book_append_sheet(
      book,
      XLSX.utils.aoa_to_sheet([
        ['ID', 'name', 'tactics'],
        ['T1059', 'Command and Scripting Interpreter', 'Execution'],
      ]),
      'techniques',
    );
    const buffer: Buffer = XLSX.write(book, { type: 'buffer', bookType: 'xlsx' });

    const table = readWorkbook(buffer);

    expect(table.sheets).toHaveLength(1);
    expect(table.sheets[0].name).toBe('techniques');
    expect(table.sheets[0].rows).toEqual([
      ['ID', 'name', 'tactics'],
      ['T1059', 'Command and Scripting Interpreter', 'Execution'],
    ]);
  });
});
