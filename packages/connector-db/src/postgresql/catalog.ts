/**
 * PostgreSQL base model catalog (table `base_models`).
 */

import { CollaboratorError, parseBaseModelTemplate } from '@snowmatch/core';
import type { BaseModelTemplate, CatalogCollaborator } from '@snowmatch/core';
import { normalizeLookupKey, normalizeLookupText } from '@snowmatch/entity-resolution/keys';
import { templateKey } from '@snowmatch/reconciliation';
import type { Queryable } from './client.js';
import { baseModelRowSchema, modelFamilyRowSchema, parseRows } from './rows.js';
import type { BaseModelRow } from './rows.js';

const TEMPLATE_COLUMNS = 'brand, model_family, model_year, category, platform, option_sets, source_catalog';

export class PostgresCatalog implements CatalogCollaborator {
  constructor(
    private readonly db: Queryable,
    private readonly id = 'postgres-catalog'
  ) {}

  async getBaseModel(lookupKey: string): Promise<BaseModelTemplate | null> {
    const result = await this.db.query(`SELECT ${TEMPLATE_COLUMNS} FROM base_models WHERE lookup_key = $1`, [
      normalizeLookupKey(lookupKey),
    ]);
    const [row] = parseRows(baseModelRowSchema, result.rows, 'base_models', this.id);
    return row ? this.toTemplate(row) : null;
  }

  async listCandidates(brand: string, modelYear?: number): Promise<string[]> {
    const params: unknown[] = [normalizeLookupText(brand)];
    let sql = 'SELECT DISTINCT model_family FROM base_models WHERE brand_key = $1';
    if (modelYear !== undefined) {
      params.push(modelYear);
      sql += ' AND model_year = $2';
    }
    sql += ' ORDER BY model_family';

    const result = await this.db.query(sql, params);
    return parseRows(modelFamilyRowSchema, result.rows, 'base_models', this.id).map((row) => row.model_family);
  }

  /**
   * Insert or replace a template under its normalized lookup key.
   */
  async saveTemplate(template: BaseModelTemplate): Promise<void> {
    const parsed = parseBaseModelTemplate(template);
    if (!parsed.ok) {
      throw new CollaboratorError({
        code: 'VALIDATION_ERROR',
        message: parsed.error,
        collaborator: this.id,
      });
    }

    const value = parsed.value;
    await this.db.query(
      `INSERT INTO base_models (lookup_key, brand, brand_key, model_family, model_year, category, platform, option_sets, source_catalog, updated_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7::jsonb, $8::jsonb, $9, now())
       ON CONFLICT (lookup_key) DO UPDATE SET
         brand = EXCLUDED.brand,
         brand_key = EXCLUDED.brand_key,
         model_family = EXCLUDED.model_family,
         model_year = EXCLUDED.model_year,
         category = EXCLUDED.category,
         platform = EXCLUDED.platform,
         option_sets = EXCLUDED.option_sets,
         source_catalog = EXCLUDED.source_catalog,
         updated_at = now()`,
      [
        templateKey(value),
        value.brand,
        normalizeLookupText(value.brand),
        value.modelFamily,
        value.modelYear,
        value.category,
        JSON.stringify(value.platform),
        JSON.stringify(value.optionSets),
        value.sourceCatalog ?? null,
      ],
      'WRITE_FAILED'
    );
  }

  private toTemplate(row: BaseModelRow): BaseModelTemplate {
    const parsed = parseBaseModelTemplate({
      brand: row.brand,
      modelFamily: row.model_family,
      modelYear: row.model_year,
      category: row.category,
      platform: row.platform,
      optionSets: row.option_sets,
      ...(row.source_catalog !== null ? { sourceCatalog: row.source_catalog } : {}),
    });
    if (!parsed.ok) {
      throw new CollaboratorError({
        code: 'VALIDATION_ERROR',
        message: parsed.error,
        collaborator: this.id,
        suggestion: 'Re-import the template; the stored JSON does not match the template schema.',
      });
    }
    return parsed.value;
  }
}

export function createPostgresCatalog(db: Queryable, id?: string): PostgresCatalog {
  return new PostgresCatalog(db, id);
}
