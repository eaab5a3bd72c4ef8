/**
 * Public API: the technique catalog read contract, the import pipeline and
 * the store implementations collaborators inject.
 */

export {
  TACTIC_ORDER,
  TACTIC_TITLES,
  TECHNIQUE_ID_PATTERN,
  isTacticId,
  tacticRank,
  toTacticId,
  type TacticId,
} from './knowledge/mitre-attack/tactics.js';

export {
  CatalogWriteError,
  POPULATED_SETTING,
  isCatalogPopulated,
  type CatalogStore,
} from './catalog/store.js';
export { MemoryCatalogStore } from './catalog/memory-store.js';
export { SqliteCatalogStore } from './catalog/sqlite-store.js';
export {
  mergeRecords,
  resolveEnrichment,
  isPlaceholderName,
  type ConflictResolver,
  type MergeStats,
} from './catalog/merge.js';
export { listCatalog, getCatalogStatus, type ListCatalogOptions } from './catalog/query.js';
export { seedDefaultTechniques } from './catalog/seed.js';

export * from './ingestion/index.js';
export * from './reporting/index.js';

export { loadConfig, ConfigError } from './config/loader.js';
export { createLogger, setLogLevel, getLogLevel, type Logger, type LogLevel } from './utils/logger.js';

export type {
  CatalogRecord,
  CatalogStatus,
  NormalizedRecord,
  RawCandidate,
  TacticGroup,
} from './types/catalog.js';
export type { RtopsConfig } from './types/config.js';
