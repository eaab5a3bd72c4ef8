#!/usr/bin/env node

/**
 * RTOps CLI — ATT&CK technique catalog for adversary-emulation operations
 *
 * Usage:
 *   rtops import --bundle enterprise-attack.json --spreadsheet enterprise-attack-v17.1.xlsx
 *   rtops catalog --query T1059 --format markdown
 *   rtops status
 */

import 'dotenv/config';

import { Command, CommanderError } from 'commander';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import chalk from 'chalk';

import { registerImportCommand } from './commands/import.js';
import { registerCatalogCommand } from './commands/catalog.js';
import { registerStatusCommand } from './commands/status.js';
import { addGlobalOptions } from './options.js';

const pkg: unknown = JSON.parse(
  readFileSync(fileURLToPath(new URL('../../package.json', import.meta.url)), 'utf-8'),
);
const version =
  typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string'
    ? pkg.version
    : '0.0.0';

const program = new Command();

program
  .name('rtops')
  .description('ATT&CK technique catalog for adversary-emulation engagements')
  .version(version);

addGlobalOptions(program);

// Register all commands
registerImportCommand(program);
registerCatalogCommand(program);
registerStatusCommand(program);

// Global error handling
program.exitOverride();

async function main(): Promise<void> {
  try {
    await program.parseAsync();
  } catch (err) {
    // CommanderError for help/version is expected — don't treat as error
    if (err instanceof CommanderError) {
      if (err.code === 'commander.helpDisplayed' || err.code === 'commander.version') {
        return;
      }
    }

    console.error('');
    console.error(chalk.red(`Error: ${err instanceof Error ? err.message : String(err)}`));
    console.error('');
    console.error(chalk.gray('Run "rtops --help" for usage information.'));
    console.error('');
    process.exit(1);
  }
}

void main();
