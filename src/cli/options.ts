/**
 * Shared CLI option helpers for rtops commands.
 *
 * Global option registration, output format parsing and chalk-colored
 * message helpers used across all commands.
 */

import type { Command } from 'commander';
import chalk from 'chalk';

// ---------------------------------------------------------------------------
// Option registration helpers
// ---------------------------------------------------------------------------

export interface GlobalOptions {
  config?: string;
  db?: string;
  verbose?: boolean;
}

/**
 * Options every command inherits: config file, database path, verbosity.
 */
export function addGlobalOptions(program: Command): Command {
  return program
    .option('-c, --config <file>', 'Path to rtops.config.yaml')
    .option('--db <path>', 'Catalog database path (overrides config)')
    .option('--verbose', 'Verbose logging');
}

/**
 * Add the -o/--output option to a command.
 */
export function addOutputOption(cmd: Command): Command {
  return cmd.option('-o, --output <file>', 'Write output to a file instead of stdout');
}

// ---------------------------------------------------------------------------
// Format parsing
// ---------------------------------------------------------------------------

export type CatalogFormat = 'table' | 'markdown' | 'json';

const VALID_FORMATS: readonly CatalogFormat[] = ['table', 'markdown', 'json'];

function isCatalogFormat(value: string): value is CatalogFormat {
  return (VALID_FORMATS as readonly string[]).includes(value);
}

/**
 * Parse a --format value. Throws on anything not in VALID_FORMATS.
 *
 * @example parseCatalogFormat('MD') => 'markdown'
 */
export function parseCatalogFormat(value: string): CatalogFormat {
  const normalized = value.trim().toLowerCase();
  if (normalized === 'md') return 'markdown';
  if (isCatalogFormat(normalized)) return normalized;
  throw new Error(
    `Unknown format "${value}". Valid formats: ${VALID_FORMATS.join(', ')}`,
  );
}

// ---------------------------------------------------------------------------
// Error display
// ---------------------------------------------------------------------------

/**
 * Print a user-friendly error message with optional details.
 */
export function printError(message: string, detail?: string): void {
  console.error(chalk.red(`\nError: ${message}`));
  if (detail) {
    console.error(chalk.gray(`  ${detail}`));
  }
  console.error('');
}

export function printSuccess(message: string): void {
  console.log(chalk.green(`  ${message}`));
}
