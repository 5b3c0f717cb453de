/**
 * BatchProcessor
 *
 * Reconciles many rows concurrently and routes each outcome: records
 * that did not fail go to the product repository, failed ones to the
 * review queue.
 */

import { randomUUID } from 'node:crypto';
import { createSilentLogger } from '@snowmatch/core';
import type {
  FailureReason,
  FinalProductRecord,
  Logger,
  PriceListRow,
  ProductRepository,
  ReviewQueue,
} from '@snowmatch/core';
import { ReconciliationError } from '../errors/index.js';
import { mapWithConcurrency } from '../runtime/index.js';
import { roundScore } from '../validation/index.js';
import type { ReconciliationEngine } from './reconciliation-engine.js';

export interface BatchSummary {
  total: number;
  passed: number;
  requiresReview: number;
  failed: number;
  autoAccepted: number;
  /** Mean confidence over all records, 4 decimals */
  averageConfidence: number;
  failureReasons: Partial<Record<FailureReason, number>>;
}

export interface BatchResult {
  id: string;
  startedAt: Date;
  /** Same order as the input rows */
  records: FinalProductRecord[];
  summary: BatchSummary;
  processingTimeMs: number;
}

export interface BatchProcessorOptions {
  repository?: ProductRepository;
  reviewQueue?: ReviewQueue;
  logger?: Logger;
  /** Overrides `batch.maxConcurrentRows` from the engine config */
  maxConcurrentRows?: number;
}

export function summarize(records: readonly FinalProductRecord[]): BatchSummary {
  const summary: BatchSummary = {
    total: records.length,
    passed: 0,
    requiresReview: 0,
    failed: 0,
    autoAccepted: 0,
    averageConfidence:
      records.length === 0
        ? 0
        : roundScore(records.reduce((sum, r) => sum + r.confidenceScore, 0) / records.length),
    failureReasons: {},
  };

  for (const record of records) {
    if (record.validationStatus === 'passed') summary.passed++;
    else if (record.validationStatus === 'requires_review') summary.requiresReview++;
    else if (record.validationStatus === 'failed') summary.failed++;
    if (record.autoAccepted) summary.autoAccepted++;
    if (record.failureReason) {
      summary.failureReasons[record.failureReason] = (summary.failureReasons[record.failureReason] ?? 0) + 1;
    }
  }

  return summary;
}

export class BatchProcessor {
  private readonly logger: Logger;

  constructor(
    private readonly engine: ReconciliationEngine,
    private readonly options: BatchProcessorOptions = {}
  ) {
    this.logger = options.logger ?? createSilentLogger();
  }

  /**
   * Rows are independent. A row that fails input validation becomes a
   * failed `invalid_row` record; a pipeline-level error (catalog,
   * registry, repository, review queue) rejects the whole batch.
   */
  async process(rows: readonly PriceListRow[]): Promise<BatchResult> {
    const startedAt = new Date();
    const start = Date.now();
    const limit = this.options.maxConcurrentRows ?? this.engine.config.batch.maxConcurrentRows;

    const records = await mapWithConcurrency(rows, limit, async (row, index) => {
      const record = await this.reconcileRow(row, index);
      await this.route(record);
      return record;
    });

    const summary = summarize(records);
    const processingTimeMs = Date.now() - start;

    this.logger.info('Batch reconciled', { ...summary, processingTimeMs });

    return {
      id: randomUUID(),
      startedAt,
      records,
      summary,
      processingTimeMs,
    };
  }

  private async reconcileRow(row: PriceListRow, index: number): Promise<FinalProductRecord> {
    try {
      return await this.engine.reconcile(row);
    } catch (err) {
      if (!(err instanceof ReconciliationError) || err.code !== 'INVALID_ROW') throw err;
      this.logger.warn('Rejected invalid row', { index, modelCode: row.modelCode, error: err.message });
      return this.engine.rejectRow(row, err);
    }
  }

  private async route(record: FinalProductRecord): Promise<void> {
    if (record.validationStatus === 'failed') {
      await this.options.reviewQueue?.enqueue(record, reviewReason(record));
      return;
    }
    await this.options.repository?.save(record);
  }
}

export function reviewReason(record: FinalProductRecord): string {
  switch (record.failureReason) {
    case 'invalid_row':
      return `Invalid row: ${record.hardViolations.join('; ')}`;
    case 'no_base_model_match':
      return `No base model matched ${record.identity.brand} ${record.identity.modelFamily} ${record.identity.modelYear}`;
    case 'missing_mandatory_fields':
      return `Missing mandatory fields: ${record.hardViolations.join('; ')}`;
    case 'below_review_threshold':
      return `Confidence ${record.confidenceScore} below review threshold`;
    default:
      return 'Failed validation';
  }
}
