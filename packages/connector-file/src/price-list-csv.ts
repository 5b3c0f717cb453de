/**
 * CSV price-list reader
 *
 * Header names are matched case-insensitively in camelCase or
 * snake_case, with a few common aliases ("colour", "options", ...).
 * Prices may use decimal commas and grouped thousands.
 */

import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import { parse } from 'csv-parse/sync';
import { CollaboratorError, parsePriceListRow, wrapError } from '@snowmatch/core';
import type { PriceListRow } from '@snowmatch/core';

export interface PriceListCsvOptions {
  /** CSV delimiter (default: ',') */
  delimiter?: string;
  /** Character encoding (default: utf-8) */
  encoding?: BufferEncoding;
  /** Used when the file has no source_file column (default: the file name) */
  sourceFile?: string;
}

export interface PriceListRowError {
  /** 1-based data row, header excluded */
  row: number;
  modelCode: string | null;
  message: string;
}

export interface PriceListReadResult {
  rows: PriceListRow[];
  errors: PriceListRowError[];
}

type RowField = keyof PriceListRow;

const FIELD_ALIASES: Record<RowField, readonly string[]> = {
  modelCode: ['modelcode', 'code'],
  brand: ['brand', 'make'],
  modelYear: ['modelyear', 'year'],
  modelName: ['modelname', 'model'],
  package: ['package', 'trim'],
  engineToken: ['enginetoken', 'engine'],
  trackToken: ['tracktoken', 'track'],
  starterToken: ['startertoken', 'starter'],
  displayToken: ['displaytoken', 'display', 'gauge'],
  optionModifiers: ['optionmodifiers', 'options', 'springoptions'],
  color: ['color', 'colour'],
  price: ['price'],
  currency: ['currency'],
  market: ['market'],
  sourceFile: ['sourcefile'],
  pageNumber: ['pagenumber', 'page'],
  extractionConfidence: ['extractionconfidence'],
};

const FORBIDDEN_HEADERS = new Set(['__proto__', 'prototype', 'constructor']);

function headerKey(header: string): string {
  return header.trim().toLowerCase().replace(/[\s_-]+/g, '');
}

/**
 * Map header positions to row fields; unknown columns are ignored.
 */
export function mapHeaders(headers: readonly string[]): Map<number, RowField> {
  const mapping = new Map<number, RowField>();
  const fields = Object.keys(FIELD_ALIASES).filter((f): f is RowField => f in FIELD_ALIASES);

  headers.forEach((header, index) => {
    if (FORBIDDEN_HEADERS.has(header.trim())) {
      throw new CollaboratorError({
        code: 'VALIDATION_ERROR',
        message: `Unsafe CSV header name: ${header}`,
        suggestion: 'Rename the column to a safe field name and try again.',
      });
    }
    const key = headerKey(header);
    const field = fields.find((f) => FIELD_ALIASES[f].includes(key));
    if (field && ![...mapping.values()].includes(field)) {
      mapping.set(index, field);
    }
  });

  return mapping;
}

/**
 * "18 990,00" -> "18990.00", "18.990,50" -> "18990.50", "18,990.50" -> "18990.50"
 */
export function normalizeDecimal(raw: string): string {
  const compact = raw.replace(/\s/g, '');
  const lastComma = compact.lastIndexOf(',');
  const lastDot = compact.lastIndexOf('.');

  if (lastComma === -1) return compact;
  if (lastDot === -1) {
    // "1,234" with exactly three trailing digits reads as grouping
    return /^-?\d{1,3}(,\d{3})+$/.test(compact) ? compact.replace(/,/g, '') : compact.replace(',', '.');
  }
  return lastComma > lastDot
    ? compact.replace(/\./g, '').replace(',', '.')
    : compact.replace(/,/g, '');
}

function toRawRecord(cells: readonly string[], mapping: Map<number, RowField>): Record<string, string | number> {
  const record: Record<string, string | number> = {};
  for (const [index, field] of mapping) {
    const value = cells[index]?.trim() ?? '';
    if (field === 'price') {
      record.price = normalizeDecimal(value);
    } else if (field === 'extractionConfidence' || field === 'pageNumber') {
      if (value) record[field] = Number(normalizeDecimal(value));
    } else if (field === 'sourceFile') {
      if (value) record.sourceFile = value;
    } else {
      record[field] = value;
    }
  }
  return record;
}

function toCells(row: unknown): string[] {
  return Array.isArray(row) ? row.map((cell) => (cell === null || cell === undefined ? '' : String(cell))) : [];
}

/**
 * Parse price-list CSV text. Rows that fail validation are reported with
 * their position and skipped; the rest are returned in file order.
 */
export function parsePriceListCsv(content: string, options: PriceListCsvOptions = {}): PriceListReadResult {
  let parsed: unknown;
  try {
    parsed = parse(content.replace(/^\uFEFF/, ''), {
      columns: false,
      delimiter: options.delimiter ?? ',',
      skip_empty_lines: true,
      relax_column_count: true,
      trim: true,
    });
  } catch (error) {
    throw wrapError(error, {
      code: 'VALIDATION_ERROR',
      prefix: 'Malformed CSV',
      suggestion: 'Check quoting and the delimiter setting.',
    });
  }

  const rows = Array.isArray(parsed) ? parsed.map(toCells) : [];
  const [headerRow, ...dataRows] = rows;
  if (!headerRow) return { rows: [], errors: [] };

  const mapping = mapHeaders(headerRow);
  const result: PriceListReadResult = { rows: [], errors: [] };

  dataRows.forEach((cells, index) => {
    const raw = toRawRecord(cells, mapping);
    if (options.sourceFile && raw.sourceFile === undefined) {
      raw.sourceFile = options.sourceFile;
    }

    const row = parsePriceListRow(raw);
    if (row.ok) {
      result.rows.push(row.value);
    } else {
      const code = raw.modelCode;
      result.errors.push({
        row: index + 1,
        modelCode: typeof code === 'string' && code ? code : null,
        message: row.error,
      });
    }
  });

  return result;
}

export async function readPriceListCsv(filePath: string, options: PriceListCsvOptions = {}): Promise<PriceListReadResult> {
  let content: string;
  try {
    content = await readFile(filePath, options.encoding ?? 'utf-8');
  } catch (error) {
    throw wrapError(error, {
      code: 'READ_FAILED',
      prefix: `Failed to read price list ${filePath}`,
      collaborator: 'price-list-csv',
    });
  }
  return parsePriceListCsv(content, { ...options, sourceFile: options.sourceFile ?? basename(filePath) });
}
