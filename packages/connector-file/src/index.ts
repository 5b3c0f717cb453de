/**
 * @snowmatch/connector-file
 *
 * File-backed catalog and modifier registry, CSV price lists and
 * result files
 */

export { BaseFileStore } from './base-file-store.js';
export type { FileStoreConfig, StoreState } from './base-file-store.js';

export { JsonCatalog, createJsonCatalog } from './json-catalog.js';
export type { JsonCatalogConfig } from './json-catalog.js';

export { NdjsonModifierRegistry, createNdjsonModifierRegistry } from './ndjson-modifier-registry.js';
export type { NdjsonModifierRegistryConfig } from './ndjson-modifier-registry.js';

export { parsePriceListCsv, readPriceListCsv, mapHeaders, normalizeDecimal } from './price-list-csv.js';
export type { PriceListCsvOptions, PriceListReadResult, PriceListRowError } from './price-list-csv.js';

export {
  RESULT_COLUMNS,
  formatResultsCsv,
  sanitizeFormulaValue,
  toResultRow,
  writeResultsCsv,
  writeResultsJson,
} from './result-writers.js';
export type { CsvWriteOptions } from './result-writers.js';
