/**
 * PostgreSQL modifier registry (table `option_modifiers`).
 *
 * Upserts merge in one statement: the higher-confidence entry keeps its
 * deltas, confidence is the maximum, times_seen accumulates.
 */

import { CollaboratorError, parseOptionModifierRecord } from '@snowmatch/core';
import type { ModifierRegistry, ModifierScope, OptionModifierRecord } from '@snowmatch/core';
import { pickModifier, registryKey } from '@snowmatch/reconciliation';
import type { Queryable } from './client.js';
import { modifierRowSchema, parseRows } from './rows.js';
import type { ModifierRow } from './rows.js';

const MODIFIER_COLUMNS =
  'brand, modifier_name, model_family, model_year, category, deltas, confidence, provenance, times_seen, created_at, updated_at';

const UPSERT_SQL = `INSERT INTO option_modifiers AS m (
    registry_key, brand_key, name_key, brand, modifier_name, model_family, model_year,
    category, deltas, confidence, provenance, times_seen, created_at, updated_at
  )
  VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9::jsonb, $10, $11, $12, COALESCE($13::timestamptz, now()), COALESCE($14::timestamptz, now()))
  ON CONFLICT (registry_key) DO UPDATE SET
    brand = CASE WHEN EXCLUDED.confidence >= m.confidence THEN EXCLUDED.brand ELSE m.brand END,
    modifier_name = CASE WHEN EXCLUDED.confidence >= m.confidence THEN EXCLUDED.modifier_name ELSE m.modifier_name END,
    category = CASE WHEN EXCLUDED.confidence >= m.confidence THEN EXCLUDED.category ELSE m.category END,
    deltas = CASE WHEN EXCLUDED.confidence >= m.confidence THEN EXCLUDED.deltas ELSE m.deltas END,
    provenance = CASE WHEN EXCLUDED.confidence >= m.confidence THEN EXCLUDED.provenance ELSE m.provenance END,
    confidence = GREATEST(m.confidence, EXCLUDED.confidence),
    times_seen = m.times_seen + EXCLUDED.times_seen,
    updated_at = EXCLUDED.updated_at`;

function lookupText(value: string): string {
  return value.trim().toLowerCase();
}

export class PostgresModifierRegistry implements ModifierRegistry {
  constructor(
    private readonly db: Queryable,
    private readonly id = 'postgres-modifier-registry'
  ) {}

  async getModifier(brand: string, name: string, scope?: ModifierScope): Promise<OptionModifierRecord | null> {
    const result = await this.db.query(
      `SELECT ${MODIFIER_COLUMNS} FROM option_modifiers WHERE brand_key = $1 AND name_key = $2 ORDER BY id`,
      [lookupText(brand), lookupText(name)]
    );
    const records = parseRows(modifierRowSchema, result.rows, 'option_modifiers', this.id).map((row) =>
      this.toRecord(row)
    );
    return pickModifier(records, brand, name, scope);
  }

  async upsertModifier(record: OptionModifierRecord): Promise<void> {
    const parsed = parseOptionModifierRecord(record);
    if (!parsed.ok) {
      throw new CollaboratorError({
        code: 'VALIDATION_ERROR',
        message: parsed.error,
        collaborator: this.id,
      });
    }

    const value = parsed.value;
    await this.db.query(
      UPSERT_SQL,
      [
        registryKey(value),
        lookupText(value.brand),
        lookupText(value.modifierName),
        value.brand,
        value.modifierName,
        value.modelFamily ?? null,
        value.modelYear ?? null,
        value.category,
        JSON.stringify(value.deltas),
        value.confidence,
        value.provenance,
        value.timesSeen ?? 1,
        value.createdAt ?? null,
        value.updatedAt ?? null,
      ],
      'WRITE_FAILED'
    );
  }

  private toRecord(row: ModifierRow): OptionModifierRecord {
    const parsed = parseOptionModifierRecord({
      brand: row.brand,
      modifierName: row.modifier_name,
      ...(row.model_family !== null ? { modelFamily: row.model_family } : {}),
      ...(row.model_year !== null ? { modelYear: row.model_year } : {}),
      category: row.category,
      deltas: row.deltas,
      confidence: row.confidence,
      provenance: row.provenance,
      timesSeen: row.times_seen,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    });
    if (!parsed.ok) {
      throw new CollaboratorError({
        code: 'VALIDATION_ERROR',
        message: parsed.error,
        collaborator: this.id,
        context: { brand: row.brand, modifierName: row.modifier_name },
      });
    }
    return parsed.value;
  }
}

export function createPostgresModifierRegistry(db: Queryable, id?: string): PostgresModifierRegistry {
  return new PostgresModifierRegistry(db, id);
}
