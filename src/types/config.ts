/**
 * Configuration types for the catalog CLI.
 */

import type { LogLevel } from '../utils/logger.js';

export interface RtopsConfig {
  catalog: CatalogConfig;
  sources: SourcesConfig;
  logging: LogConfig;
}

export interface CatalogConfig {
  databasePath: string;
  seedDefaults: boolean;       // insert baseline techniques into an empty catalog
}

export interface SourcesConfig {
  bundlePaths: string[];       // STIX bundle or Navigator layer JSON, tried first
  spreadsheetPaths: string[];  // ATT&CK .xlsx exports, tried second
}

export interface LogConfig {
  level: LogLevel;
}
