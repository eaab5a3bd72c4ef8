/**
 * Status command — whether ATT&CK data has been imported, with per-tactic
 * row counts.
 */

import type { Command } from 'commander';
import chalk from 'chalk';

import { getCatalogStatus } from '../../catalog/query.js';
import { formatCatalogStatus } from '../../reporting/summary-reporter.js';
import { openContext } from '../context.js';
import type { GlobalOptions } from '../options.js';

export function registerStatusCommand(program: Command): void {
  program
    .command('status')
    .description('Show catalog import status')
    .action((_options: GlobalOptions, cmd: Command) => {
      const { config, store } = openContext(cmd.optsWithGlobals<GlobalOptions>());
      try {
        console.log('');
        console.log(chalk.gray(`  Database: ${config.catalog.databasePath}`));
        console.log('');
        console.log(formatCatalogStatus(getCatalogStatus(store)));
        console.log('');
      } finally {
        store.close();
      }
    });
}
