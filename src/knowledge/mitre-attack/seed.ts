/**
 * Baseline techniques inserted into an empty catalog so the catalog browser
 * has something to show before the first import.
 */

import type { NormalizedRecord } from '../../types/catalog.js';

export const DEFAULT_TECHNIQUES: readonly NormalizedRecord[] = [
  {
    techniqueId: 'T1059',
    tacticId: 'execution',
    name: 'Command and Scripting Interpreter',
    description: 'Execute commands and scripts via shells/interpreters.',
    references: 'https://attack.mitre.org/techniques/T1059/',
  },
  {
    techniqueId: 'T1021',
    tacticId: 'lateral-movement',
    name: 'Remote Services',
    description: 'RDP/SMB/SSH for lateral movement.',
    references: 'https://attack.mitre.org/techniques/T1021/',
  },
  {
    techniqueId: 'T1003',
    tacticId: 'credential-access',
    name: 'OS Credential Dumping',
    description: 'Dump creds from OS components.',
    references: 'https://attack.mitre.org/techniques/T1003/',
  },
];
