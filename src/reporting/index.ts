/**
 * Barrel exports for the catalog reporters.
 */

export {
  buildCatalogExport,
  generateCatalogJson,
  writeCatalogJson,
  type CatalogExport,
  type CatalogExportOptions,
} from './json-reporter.js';

export {
  generateCatalogMarkdown,
  type MarkdownMapOptions,
} from './markdown-reporter.js';

export {
  formatImportSummary,
  printImportSummary,
  formatCatalogTable,
  formatCatalogStatus,
} from './summary-reporter.js';
