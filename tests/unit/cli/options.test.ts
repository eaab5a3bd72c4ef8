/**
 * Unit tests for shared CLI options.
 *
 * Tests: addGlobalOptions, addOutputOption, parseCatalogFormat, printError, printSuccess
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { Command } from 'commander';
import {
  addGlobalOptions,
  addOutputOption,
  parseCatalogFormat,
  printError,
  printSuccess,
  type GlobalOptions,
} from '@/cli/options.js';

// Mock chalk so we do not get ANSI codes in output assertions.
vi.mock('chalk', () => ({
  default: {
    red: (s: string) => s,
    green: (s: string) => s,
    yellow: (s: string) => s,
    cyan: (s: string) => s,
    gray: (s: string) => s,
  },
}));

afterEach(() => {
  vi.restoreAllMocks();
});

// ---------------------------------------------------------------------------
// parseCatalogFormat
// ---------------------------------------------------------------------------

describe('parseCatalogFormat', () => {
  it('should accept each supported format', () => {
    expect(parseCatalogFormat('table')).toBe('table');
    expect(parseCatalogFormat('markdown')).toBe('markdown');
    expect(parseCatalogFormat('json')).toBe('json');
  });

  it('should normalize case, whitespace and the md alias', () => {
    expect(parseCatalogFormat(' JSON ')).toBe('json');
    expect(parseCatalogFormat('MD')).toBe('markdown');
  });

  it('should reject unknown formats', () => {
    expect(() => parseCatalogFormat('xml')).toThrow(
      'Unknown format "xml". Valid formats: table, markdown, json',
    );
  });
});

// ---------------------------------------------------------------------------
// Option registration
// ---------------------------------------------------------------------------

describe('addGlobalOptions', () => {
  it('should register config, db and verbose options', () => {
    const program = addGlobalOptions(new Command());

    program.parse(['--config', 'custom.yaml', '--db', 'catalog.db', '--verbose'], { from: 'user' });

    expect(program.opts<GlobalOptions>()).toEqual({
      config: 'custom.yaml',
      db: 'catalog.db',
      verbose: true,
    });
  });
});

describe('addOutputOption', () => {
  it('should register -o/--output', () => {
    const cmd = addOutputOption(new Command());

    cmd.parse(['-o', 'out.md'], { from: 'user' });

    expect(cmd.opts()).toEqual({ output: 'out.md' });
  });
});

// ---------------------------------------------------------------------------
// Message helpers
// ---------------------------------------------------------------------------

describe('print helpers', () => {
  it('should print errors with an optional detail line', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});

    printError('Catalog write failed', 'database is locked');

    expect(spy.mock.calls).toEqual([['\nError: Catalog write failed'], ['  database is locked'], ['']]);
  });

  it('should indent success lines', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => {});

    printSuccess('done');

    expect(spy.mock.calls).toEqual([['  done']]);
  });
});
