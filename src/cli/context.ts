/**
 * Resolves configuration and opens the catalog for a CLI command.
 */

import { resolve } from 'path';

import { loadConfig } from '../config/loader.js';
import { SqliteCatalogStore } from '../catalog/sqlite-store.js';
import { seedDefaultTechniques } from '../catalog/seed.js';
import type { RtopsConfig } from '../types/config.js';
import { createLogger, setLogLevel } from '../utils/logger.js';
import type { GlobalOptions } from './options.js';

const log = createLogger('cli');

export interface CommandContext {
  config: RtopsConfig;
  store: SqliteCatalogStore;
}

export function openContext(options: GlobalOptions): CommandContext {
  const config = loadConfig({ configPath: options.config });
  if (options.db) {
    config.catalog.databasePath = resolve(options.db);
  }
  setLogLevel(options.verbose ? 'debug' : config.logging.level);

  const store = SqliteCatalogStore.open(config.catalog.databasePath);
  if (config.catalog.seedDefaults) {
    const seeded = seedDefaultTechniques(store);
    if (seeded > 0) {
      log.debug(`Seeded ${seeded} default techniques into an empty catalog`);
    }
  }

  return { config, store };
}
