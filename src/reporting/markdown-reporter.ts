/**
 * Markdown rendering of the technique map: one section per tactic in
 * kill-chain order.
 */

import type { TacticGroup } from '../types/catalog.js';

// ---------------------------------------------------------------------------
// Public Types
// ---------------------------------------------------------------------------

export interface MarkdownMapOptions {
  /** Include the description column. Default: true */
  includeDescriptions?: boolean;
  /** Render tactics that have no techniques. Default: true */
  includeEmptyTactics?: boolean;
  /** Longest description rendered before truncation. Default: 160 */
  maxDescriptionLength?: number;
  /** Search text the map was filtered by, shown under the title. */
  query?: string;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export function generateCatalogMarkdown(
  groups: readonly TacticGroup[],
  options?: MarkdownMapOptions,
): string {
  const opts = {
    includeDescriptions: options?.includeDescriptions ?? true,
    includeEmptyTactics: options?.includeEmptyTactics ?? true,
    maxDescriptionLength: options?.maxDescriptionLength ?? 160,
  };

  const total = groups.reduce((sum, g) => sum + g.records.length, 0);
  const sections: string[] = ['# ATT&CK Technique Map'];

  const summary = [`${total} technique-tactic rows across ${groups.filter((g) => g.records.length > 0).length} tactics.`];
  if (options?.query) {
    summary.push(`Filtered by: \`${options.query}\``);
  }
  sections.push(summary.join(' '));

  for (const group of groups) {
    if (group.records.length === 0 && !opts.includeEmptyTactics) continue;
    sections.push(renderTactic(group, opts.includeDescriptions, opts.maxDescriptionLength));
  }

  return sections.join('\n\n') + '\n';
}

// ---------------------------------------------------------------------------
// Section Renderers
// ---------------------------------------------------------------------------

function renderTactic(
  group: TacticGroup,
  includeDescriptions: boolean,
  maxDescriptionLength: number,
): string {
  const lines: string[] = [`## ${group.title} (${group.records.length})`, ''];

  if (group.records.length === 0) {
    lines.push('_No techniques loaded_');
    return lines.join('\n');
  }

  if (includeDescriptions) {
    lines.push('| ID | Name | Description |');
    lines.push('| --- | --- | --- |');
    for (const r of group.records) {
      const description = truncate(r.description, maxDescriptionLength);
      lines.push(`| ${r.techniqueId} | ${escapeCell(r.name || r.techniqueId)} | ${escapeCell(description)} |`);
    }
  } else {
    lines.push('| ID | Name |');
    lines.push('| --- | --- |');
    for (const r of group.records) {
      lines.push(`| ${r.techniqueId} | ${escapeCell(r.name || r.techniqueId)} |`);
    }
  }

  return lines.join('\n');
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function escapeCell(text: string): string {
  return text.replace(/\|/g, '\\|').replace(/\r?\n/g, ' ');
}

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max - 3)}...` : text;
}
