/**
 * Catalog command — list techniques grouped by tactic in kill-chain order.
 */

import { writeFileSync, mkdirSync } from 'fs';
import { dirname, resolve } from 'path';
import type { Command } from 'commander';

import { listCatalog } from '../../catalog/query.js';
import { isCatalogPopulated } from '../../catalog/store.js';
import { generateCatalogJson } from '../../reporting/json-reporter.js';
import { generateCatalogMarkdown } from '../../reporting/markdown-reporter.js';
import { formatCatalogTable } from '../../reporting/summary-reporter.js';
import type { TacticGroup } from '../../types/catalog.js';
import { openContext } from '../context.js';
import {
  addOutputOption,
  parseCatalogFormat,
  printSuccess,
  type CatalogFormat,
  type GlobalOptions,
} from '../options.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

interface CatalogOptions extends GlobalOptions {
  query?: string;
  format: CatalogFormat;
  output?: string;
}

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

export function registerCatalogCommand(program: Command): void {
  const cmd = program
    .command('catalog')
    .description('List the technique catalog grouped by tactic')
    .option('-q, --query <text>', 'Filter by name, technique ID or tactic (e.g. T1059, initial-access)')
    .option('-f, --format <format>', 'Output format: table, markdown, json', parseCatalogFormat, 'table');

  addOutputOption(cmd).action((_options: CatalogOptions, command: Command) => {
    runCatalog(command.optsWithGlobals<CatalogOptions>());
  });
}

// ---------------------------------------------------------------------------
// Main Logic
// ---------------------------------------------------------------------------

function runCatalog(options: CatalogOptions): void {
  const { store } = openContext(options);
  try {
    const groups = listCatalog(store, { query: options.query });
    const text = render(groups, options, isCatalogPopulated(store));

    if (options.output) {
      const outputPath = resolve(options.output);
      mkdirSync(dirname(outputPath), { recursive: true });
      writeFileSync(outputPath, text, 'utf-8');
      printSuccess(`Catalog written to ${outputPath}`);
    } else {
      console.log(text);
    }
  } finally {
    store.close();
  }
}

function render(groups: TacticGroup[], options: CatalogOptions, populated: boolean): string {
  switch (options.format) {
    case 'json':
      return generateCatalogJson(groups, { populated, query: options.query });
    case 'markdown':
      return generateCatalogMarkdown(groups, { query: options.query });
    case 'table':
      return formatCatalogTable(groups);
  }
}
