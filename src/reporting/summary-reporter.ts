/**
 * Terminal renderers: import summary box, catalog listing and status.
 *
 * Output goes through chalk; `stripAnsi` is used wherever padding must be
 * computed from the visible width.
 */

import chalk from 'chalk';

import type { ImportReport, SourceOutcome } from '../ingestion/importer.js';
import type { CatalogStatus, TacticGroup } from '../types/catalog.js';

/** Fixed width of the summary box interior (between the box edges). */
const BOX_WIDTH = 60;

// ---------------------------------------------------------------------------
// Import summary
// ---------------------------------------------------------------------------

export function formatImportSummary(report: ImportReport, durationMs?: number): string {
  const rule = (left: string, right: string): string =>
    chalk.cyan(`${left}${''.padStart(BOX_WIDTH, '═')}${right}`);

  const lines: string[] = [];
  lines.push(rule('╔', '╗'));
  lines.push(formatCenteredLine('ATT&CK Import Summary'));
  lines.push(rule('╠', '╣'));

  for (const source of report.sources) {
    lines.push(formatLineRaw(formatSourceLine(source)));
  }
  if (report.sources.length === 0) {
    lines.push(formatLineRaw(chalk.gray('No candidate paths configured')));
  }

  lines.push(rule('╠', '╣'));
  const changes = report.changes > 0 ? chalk.green(String(report.changes)) : chalk.yellow('0');
  lines.push(formatLineRaw(`Rows inserted/updated: ${changes}`));
  lines.push(
    formatLineRaw(
      `Catalog populated: ${report.populated ? chalk.green('yes') : chalk.yellow('no')}` +
        (report.populatedTransitioned ? chalk.gray(' (first import)') : ''),
    ),
  );
  if (durationMs !== undefined) {
    lines.push(formatLineRaw(`Duration: ${formatDuration(durationMs)}`));
  }
  lines.push(rule('╚', '╝'));

  return lines.join('\n');
}

export function printImportSummary(report: ImportReport, durationMs?: number): void {
  console.log(formatImportSummary(report, durationMs));
}

function formatSourceLine(source: SourceOutcome): string {
  const name = shortenPath(source.path, 30);
  switch (source.status) {
    case 'missing':
      return `${chalk.gray('-')} ${name} ${chalk.gray('missing')}`;
    case 'failed':
      return `${chalk.red('✗')} ${name} ${chalk.red('unreadable')}`;
    case 'imported':
      return `${chalk.green('✓')} ${name} ${source.kind}: +${source.inserted} ~${source.enriched}`;
  }
}

// ---------------------------------------------------------------------------
// Catalog listing
// ---------------------------------------------------------------------------

export function formatCatalogTable(groups: readonly TacticGroup[]): string {
  const lines: string[] = [];

  for (const group of groups) {
    lines.push(chalk.bold(`${group.title} `) + chalk.gray(`(${group.records.length})`));
    if (group.records.length === 0) {
      lines.push(chalk.gray('  No techniques loaded'));
    }
    for (const r of group.records) {
      lines.push(`  ${chalk.cyan(r.techniqueId.padEnd(10))} ${r.name || chalk.gray(r.techniqueId)}`);
    }
    lines.push('');
  }

  return lines.join('\n');
}

export function formatCatalogStatus(status: CatalogStatus): string {
  const lines: string[] = [];
  lines.push(
    `${chalk.cyan('ATT&CK loaded:')}   ${status.populated ? chalk.green('Yes') : chalk.yellow('No')}`,
  );
  lines.push(`${chalk.cyan('Total rows:')}      ${status.totalRecords}`);
  lines.push('');
  for (const { title, count } of status.byTactic) {
    const countText = count > 0 ? String(count) : chalk.gray('0');
    lines.push(`  ${title.padEnd(24)} ${countText}`);
  }
  return lines.join('\n');
}

// ---------------------------------------------------------------------------
// Formatting Helpers
// ---------------------------------------------------------------------------

/**
 * Pad a line that may contain chalk-colored segments, using the visible
 * (ANSI-stripped) length.
 */
function formatLineRaw(text: string): string {
  const paddingNeeded = BOX_WIDTH - 2 - stripAnsi(text).length;
  const padding = paddingNeeded > 0 ? ' '.repeat(paddingNeeded) : '';
  return `${chalk.cyan('║')} ${text}${padding} ${chalk.cyan('║')}`;
}

function formatCenteredLine(text: string): string {
  const totalPadding = BOX_WIDTH - 2 - text.length;
  const leftPad = Math.floor(totalPadding / 2);
  const padded = ' '.repeat(leftPad) + text + ' '.repeat(totalPadding - leftPad);
  return `${chalk.cyan('║')} ${chalk.bold.white(padded)} ${chalk.cyan('║')}`;
}

function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  return `${(ms / 1000).toFixed(1)}s`;
}

function shortenPath(path: string, max: number): string {
  return path.length > max ? `...${path.slice(path.length - (max - 3))}` : path;
}

export function stripAnsi(str: string): string {
  // eslint-disable-next-line no-control-regex
  return str.replace(/\x1b\[[0-9;]*m/g, '');
}
