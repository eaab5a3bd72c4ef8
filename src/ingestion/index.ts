/**
 * Ingestion pipeline: source parsers, normalizer and import orchestrator
 * for the technique catalog.
 */

export { parseStixBundle, findAttackReference, getAttackPhases } from './parsers/stix-bundle.js';
export { parseNavigatorLayer } from './parsers/navigator-layer.js';
export { parseSpreadsheet, parseSheet, readWorkbook, splitTactics } from './parsers/spreadsheet.js';

export {
  HEADER_SYNONYMS,
  matchHeaderColumns,
  toTechniqueColumns,
  type LogicalColumn,
  type ColumnMap,
  type TechniqueColumns,
} from './header-matcher.js';

export { normalizeCandidate, normalizeCandidates, type NormalizeResult } from './normalizer.js';

export {
  SourceFormatError,
  classifyJsonDocument,
  extractCandidates,
  loadJsonSource,
  loadSpreadsheetSource,
} from './source.js';

export {
  importCatalog,
  formatImportMessage,
  NO_DATA_MESSAGE,
  type ImportSources,
  type ImportReport,
  type ImportOptions,
  type SourceOutcome,
} from './importer.js';

export type { ParsedSource, SourceKind, WorkbookTable, SheetTable } from '../types/sources.js';
