/**
 * Technical completeness check over the mandatory fields.
 */

import { deepClone, getPath, setPath, stableStringify } from '@snowmatch/core';
import type { AttributeTree, AttributeValue, WorkingProductRecord } from '@snowmatch/core';
import type { MandatoryField } from '../config/index.js';
import { isMissing, readNumber, roundScore } from './values.js';

export interface TechnicalCheckResult {
  /** Fraction of mandatory fields present and well-typed */
  score: number;
  valid: string[];
  defaulted: string[];
  invalid: string[];
  missing: string[];
  /** Missing fields without a default; these fail the record */
  hardViolations: string[];
  warnings: string[];
}

/** Identity fields are authoritative over anything the spec tree says */
function checkView(record: WorkingProductRecord): AttributeTree {
  const { identity } = record;
  return {
    ...record.spec,
    brand: identity.brand,
    modelYear: identity.modelYear,
    modelFamily: identity.modelFamily,
    category: identity.category,
  };
}

function typeProblem(field: MandatoryField, value: AttributeValue): string | null {
  switch (field.type) {
    case 'number':
      if (readNumber(value) === null) return `expected number, got ${stableStringify(value)}`;
      break;
    case 'string':
      if (typeof value !== 'string') return `expected string, got ${stableStringify(value)}`;
      break;
    case 'boolean':
      if (typeof value !== 'boolean') return `expected boolean, got ${stableStringify(value)}`;
      break;
  }

  if (field.enum) {
    const normalized = String(value).toLowerCase();
    if (!field.enum.some((allowed) => String(allowed).toLowerCase() === normalized)) {
      return `${stableStringify(value)} is not one of ${field.enum.join(', ')}`;
    }
  }

  return null;
}

/**
 * Defaults for missing fields are written into `record.spec`.
 */
export function runTechnicalCheck(
  record: WorkingProductRecord,
  fields: readonly MandatoryField[]
): TechnicalCheckResult {
  const view = checkView(record);
  const result: TechnicalCheckResult = {
    score: 1,
    valid: [],
    defaulted: [],
    invalid: [],
    missing: [],
    hardViolations: [],
    warnings: [],
  };

  for (const field of fields) {
    const value = getPath(view, field.path);

    if (value === undefined || isMissing(value)) {
      if (field.default !== undefined) {
        setPath(record.spec, field.path, deepClone(field.default));
        result.defaulted.push(field.path);
        result.valid.push(field.path);
        result.warnings.push(`${field.path}: missing, default ${stableStringify(field.default)} applied`);
      } else {
        result.missing.push(field.path);
        result.hardViolations.push(`missing mandatory field: ${field.path}`);
      }
      continue;
    }

    const problem = typeProblem(field, value);
    if (problem) {
      result.invalid.push(field.path);
      result.warnings.push(`${field.path}: ${problem}`);
    } else {
      result.valid.push(field.path);
    }
  }

  result.score = fields.length === 0 ? 1 : roundScore(result.valid.length / fields.length);
  return result;
}
