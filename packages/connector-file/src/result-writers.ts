/**
 * Result writers
 * Final records as CSV (one row per record, for spreadsheets) or JSON
 * (full records with audit trails).
 */

import { stringify } from 'csv-stringify/sync';
import type { FinalProductRecord } from '@snowmatch/core';
import { writeFileAtomic } from './base-file-store.js';

export interface CsvWriteOptions {
  /** CSV delimiter (default: ',') */
  delimiter?: string;
  /**
   * Mitigate CSV/Excel formula injection by prefixing strings that start
   * with =, +, -, or @ (after optional whitespace). Default: true.
   */
  sanitizeFormulas?: boolean;
  /** Prefix used when sanitizeFormulas is enabled (default: "'") */
  formulaEscapePrefix?: string;
}

export const RESULT_COLUMNS = [
  'model_code',
  'brand',
  'model_family',
  'model_year',
  'base_model_key',
  'price',
  'currency',
  'market',
  'status',
  'auto_accepted',
  'confidence',
  'failure_reason',
  'hard_violations',
  'warnings',
  'spec',
] as const;

type ResultColumn = (typeof RESULT_COLUMNS)[number];

export function sanitizeFormulaValue(value: string, prefix: string): string {
  if (value.startsWith(prefix)) return value;
  return /^[\t\r\n ]*[=+\-@]/.test(value) ? `${prefix}${value}` : value;
}

export function toResultRow(record: FinalProductRecord): Record<ResultColumn, string | number | boolean> {
  const { identity } = record;
  return {
    model_code: identity.modelCode,
    brand: identity.brand,
    model_family: identity.modelFamily,
    model_year: identity.modelYear,
    base_model_key: identity.baseModelKey ?? '',
    price: identity.price,
    currency: identity.currency,
    market: identity.market,
    status: record.validationStatus,
    auto_accepted: record.autoAccepted,
    confidence: record.confidenceScore,
    failure_reason: record.failureReason ?? '',
    hard_violations: record.hardViolations.join('; '),
    warnings: record.warnings.join('; '),
    spec: JSON.stringify(record.spec),
  };
}

export function formatResultsCsv(records: readonly FinalProductRecord[], options: CsvWriteOptions = {}): string {
  const sanitize = options.sanitizeFormulas !== false;
  const prefix = options.formulaEscapePrefix ?? "'";

  const rows = records.map((record) => {
    const row = toResultRow(record);
    if (!sanitize) return row;
    const out: Record<string, string | number | boolean> = {};
    for (const column of RESULT_COLUMNS) {
      const value = row[column];
      out[column] = typeof value === 'string' ? sanitizeFormulaValue(value, prefix) : value;
    }
    return out;
  });

  return stringify(rows, {
    header: true,
    columns: [...RESULT_COLUMNS],
    delimiter: options.delimiter ?? ',',
    cast: { boolean: (value) => (value ? 'true' : 'false') },
  });
}

async function writeOutput(filePath: string, content: string): Promise<void> {
  await writeFileAtomic(filePath, content, 'result-writer');
}

export async function writeResultsCsv(
  filePath: string,
  records: readonly FinalProductRecord[],
  options?: CsvWriteOptions
): Promise<void> {
  await writeOutput(filePath, formatResultsCsv(records, options));
}

export async function writeResultsJson(
  filePath: string,
  records: readonly FinalProductRecord[],
  indent = 2
): Promise<void> {
  await writeOutput(filePath, `${JSON.stringify(records, null, indent)}\n`);
}
