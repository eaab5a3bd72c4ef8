/**
 * Import command — load ATT&CK bundles, layers and workbooks into the
 * catalog.
 *
 * Paths given on the command line replace the configured candidates of the
 * same kind. Missing files are skipped; unreadable ones are reported in the
 * summary and do not stop the pass.
 */

import type { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';

import { importCatalog, type ImportReport } from '../../ingestion/importer.js';
import { printImportSummary } from '../../reporting/summary-reporter.js';
import { openContext } from '../context.js';
import { printError, type GlobalOptions } from '../options.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

interface ImportOptions extends GlobalOptions {
  bundle?: string[];
  spreadsheet?: string[];
}

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

export function registerImportCommand(program: Command): void {
  program
    .command('import')
    .description('Import / enrich the technique catalog from ATT&CK sources')
    .option('-b, --bundle <paths...>', 'STIX bundle or Navigator layer JSON files')
    .option('-s, --spreadsheet <paths...>', 'ATT&CK .xlsx workbooks')
    .action(async (_options: ImportOptions, cmd: Command) => {
      await runImport(cmd.optsWithGlobals<ImportOptions>());
    });
}

// ---------------------------------------------------------------------------
// Main Logic
// ---------------------------------------------------------------------------

async function runImport(options: ImportOptions): Promise<void> {
  const startTime = Date.now();
  const { config, store } = openContext(options);

  console.log('');
  console.log(chalk.bold.cyan('  RTOps — ATT&CK Import'));
  console.log(chalk.gray('  ─────────────────────────────────────────'));
  console.log('');

  const spinner = ora('Importing technique catalog...').start();
  let report: ImportReport;
  try {
    report = await importCatalog(store, {
      bundlePaths: options.bundle ?? config.sources.bundlePaths,
      spreadsheetPaths: options.spreadsheet ?? config.sources.spreadsheetPaths,
    });
  } catch (err) {
    spinner.fail(chalk.red('Import aborted'));
    printError('Catalog write failed', err instanceof Error ? err.message : String(err));
    store.close();
    process.exit(1);
  }

  if (report.changes > 0) {
    spinner.succeed(chalk.green(report.message));
  } else {
    spinner.warn(chalk.yellow(report.message));
  }

  console.log('');
  printImportSummary(report, Date.now() - startTime);
  console.log('');
  store.close();
}
