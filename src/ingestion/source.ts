/**
 * Source loading and dispatch.
 *
 * A file on disk becomes a `ParsedSource`, a tagged union over the three
 * supported document shapes; `extractCandidates` is the single place that
 * matches on it.
 */

import { readFile } from 'node:fs/promises';
import { extname } from 'node:path';

import type { RawCandidate } from '../types/catalog.js';
import type { ParsedSource } from '../types/sources.js';
import { parseStixBundle } from './parsers/stix-bundle.js';
import { parseNavigatorLayer } from './parsers/navigator-layer.js';
import { parseSpreadsheet, readWorkbook } from './parsers/spreadsheet.js';

export class SourceFormatError extends Error {
  constructor(
    message: string,
    public readonly path: string,
  ) {
    super(message);
    this.name = 'SourceFormatError';
  }
}

const SPREADSHEET_EXTENSIONS = new Set(['.xlsx', '.xlsm', '.xls', '.ods']);

/**
 * Classify an already-parsed JSON document. A bundle has an `objects` array,
 * a Navigator layer a `techniques` array; anything else is unsupported.
 */
export function classifyJsonDocument(document: unknown, path: string): ParsedSource {
  if (typeof document !== 'object' || document === null || Array.isArray(document)) {
    throw new SourceFormatError('Expected a JSON object at the top level', path);
  }

  if ('objects' in document) {
    if (!Array.isArray(document.objects)) {
      throw new SourceFormatError('Bundle "objects" is not an array', path);
    }
    return { kind: 'bundle', path, objects: document.objects };
  }

  if ('techniques' in document) {
    if (!Array.isArray(document.techniques)) {
      throw new SourceFormatError('Layer "techniques" is not an array', path);
    }
    return { kind: 'flat-list', path, entries: document.techniques };
  }

  throw new SourceFormatError('Unrecognized JSON document: no "objects" or "techniques"', path);
}

export async function loadJsonSource(path: string): Promise<ParsedSource> {
  const text = await readFile(path, 'utf-8');
  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (err) {
    throw new SourceFormatError(
      `Invalid JSON: ${err instanceof Error ? err.message : String(err)}`,
      path,
    );
  }
  return classifyJsonDocument(document, path);
}

export async function loadSpreadsheetSource(path: string): Promise<ParsedSource> {
  const ext = extname(path).toLowerCase();
  if (ext && !SPREADSHEET_EXTENSIONS.has(ext)) {
    throw new SourceFormatError(`Unsupported spreadsheet extension "${ext}"`, path);
  }

  const data = await readFile(path);
  try {
    return { kind: 'spreadsheet', path, workbook: readWorkbook(data) };
  } catch (err) {
    throw new SourceFormatError(
      `Unreadable workbook: ${err instanceof Error ? err.message : String(err)}`,
      path,
    );
  }
}

export function extractCandidates(source: ParsedSource): RawCandidate[] {
  switch (source.kind) {
    case 'bundle':
      return parseStixBundle(source.objects);
    case 'flat-list':
      return parseNavigatorLayer(source.entries);
    case 'spreadsheet':
      return parseSpreadsheet(source.workbook);
  }
}
