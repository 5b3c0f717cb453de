/**
 * PostgreSQL product repository (table `product_records`).
 *
 * One row per (model code, market, model year); a later run replaces
 * the row and resolves pending review items for the same product.
 */

import { CollaboratorError } from '@snowmatch/core';
import type { FinalProductRecord, ProductRepository } from '@snowmatch/core';
import type { PostgresClient } from './client.js';

const SAVE_SQL = `INSERT INTO product_records (
    model_code, market, model_year, brand, model_family, base_model_key, price, currency,
    validation_status, confidence_score, auto_accepted, spec, record, processed_at
  )
  VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12::jsonb, $13::jsonb, $14)
  ON CONFLICT (model_code, market, model_year) DO UPDATE SET
    brand = EXCLUDED.brand,
    model_family = EXCLUDED.model_family,
    base_model_key = EXCLUDED.base_model_key,
    price = EXCLUDED.price,
    currency = EXCLUDED.currency,
    validation_status = EXCLUDED.validation_status,
    confidence_score = EXCLUDED.confidence_score,
    auto_accepted = EXCLUDED.auto_accepted,
    spec = EXCLUDED.spec,
    record = EXCLUDED.record,
    processed_at = EXCLUDED.processed_at`;

const RESOLVE_REVIEWS_SQL = `UPDATE review_queue SET status = 'resolved', resolved_at = now()
  WHERE model_code = $1 AND market = $2 AND model_year = $3 AND status = 'pending'`;

export class PostgresProductRepository implements ProductRepository {
  constructor(
    private readonly client: PostgresClient,
    private readonly id = 'postgres-products'
  ) {}

  async save(record: FinalProductRecord): Promise<void> {
    if (record.validationStatus === 'failed') {
      throw new CollaboratorError({
        code: 'VALIDATION_ERROR',
        message: `Refusing to save failed record ${record.identity.modelCode}`,
        collaborator: this.id,
        suggestion: 'Send failed records to the review queue.',
      });
    }

    const { identity } = record;
    await this.client.transaction(async (tx) => {
      await tx.query(SAVE_SQL, [
        identity.modelCode,
        identity.market,
        identity.modelYear,
        identity.brand,
        identity.modelFamily,
        identity.baseModelKey,
        identity.price,
        identity.currency,
        record.validationStatus,
        record.confidenceScore,
        record.autoAccepted,
        JSON.stringify(record.spec),
        JSON.stringify(record),
        record.processedAt,
      ]);
      await tx.query(RESOLVE_REVIEWS_SQL, [identity.modelCode, identity.market, identity.modelYear]);
    });
  }
}

export function createPostgresProductRepository(client: PostgresClient, id?: string): PostgresProductRepository {
  return new PostgresProductRepository(client, id);
}
