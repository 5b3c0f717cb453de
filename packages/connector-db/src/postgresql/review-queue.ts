import type { FinalProductRecord, ReviewQueue } from '@snowmatch/core';
import type { Queryable } from './client.js';

const ENQUEUE_SQL = `INSERT INTO review_queue (
    model_code, market, model_year, reason, failure_reason, confidence_score, record
  )
  VALUES ($1, $2, $3, $4, $5, $6, $7::jsonb)`;

/** Failed records waiting for a human (table `review_queue`) */
export class PostgresReviewQueue implements ReviewQueue {
  constructor(private readonly db: Queryable) {}

  async enqueue(record: FinalProductRecord, reason: string): Promise<void> {
    const { identity } = record;
    await this.db.query(
      ENQUEUE_SQL,
      [
        identity.modelCode,
        identity.market,
        identity.modelYear,
        reason,
        record.failureReason,
        record.confidenceScore,
        JSON.stringify(record),
      ],
      'WRITE_FAILED'
    );
  }
}

export function createPostgresReviewQueue(db: Queryable): PostgresReviewQueue {
  return new PostgresReviewQueue(db);
}
