/**
 * Source document shapes accepted by the ingestion pipeline.
 */

// STIX 2.x bundle --------------------------------------------------------

export interface StixExternalReference {
  source_name?: string;
  external_id?: string;
  url?: string;
}

export interface StixKillChainPhase {
  kill_chain_name?: string;
  phase_name?: string;
}

export interface StixObject {
  type: string;
  id?: string;
  name?: string;
  description?: string;
  external_references?: StixExternalReference[];
  kill_chain_phases?: StixKillChainPhase[];
  revoked?: boolean;
  x_mitre_deprecated?: boolean;
}

// ATT&CK Navigator layer -------------------------------------------------

export interface NavigatorTechniqueEntry {
  techniqueID?: string;
  tactic?: string;
}

// Spreadsheet ------------------------------------------------------------

export type CellValue = string | number | boolean | Date | null;

export interface SheetTable {
  name: string;
  /** Row-major cell values; row 0 is the header row. */
  rows: CellValue[][];
}

export interface WorkbookTable {
  sheets: SheetTable[];
}

// Tagged union -----------------------------------------------------------

export type ParsedSource =
  | { kind: 'bundle'; path: string; objects: unknown[] }
  | { kind: 'flat-list'; path: string; entries: unknown[] }
  | { kind: 'spreadsheet'; path: string; workbook: WorkbookTable };

export type SourceKind = ParsedSource['kind'];
