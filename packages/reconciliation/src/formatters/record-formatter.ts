/**
 * Record and batch formatters
 *
 * Plain-text reports for reviewers and the command line.
 */

import type { FinalProductRecord } from '@snowmatch/core';
import type { BatchResult } from '../pipeline/index.js';
import type { PromotionResult } from '../promotion/index.js';

function percent(value: number): string {
  return `${(value * 100).toFixed(1)}%`;
}

/**
 * One record with its score breakdown and audit trail
 */
export function formatProductRecord(record: FinalProductRecord): string {
  const lines: string[] = [];
  const { identity } = record;

  lines.push(`## ${identity.modelCode}: ${identity.brand} ${identity.modelFamily} ${identity.modelYear}`);
  lines.push(`Status: ${record.validationStatus}${record.autoAccepted ? ' (auto-accepted)' : ''}`);
  lines.push(`Confidence: ${percent(record.confidenceScore)}`);
  if (record.failureReason) {
    lines.push(`Failure reason: ${record.failureReason}`);
  }
  lines.push(`Price: ${identity.price} ${identity.currency} (${identity.market})`);
  lines.push('');

  if (record.scoreBreakdown) {
    lines.push('### Score Breakdown');
    for (const [name, value] of Object.entries(record.scoreBreakdown)) {
      lines.push(`- ${name}: ${percent(value)}`);
    }
    lines.push('');
  }

  if (record.hardViolations.length > 0 || record.warnings.length > 0) {
    lines.push('### Issues');
    for (const violation of record.hardViolations) {
      lines.push(`- [hard] ${violation}`);
    }
    for (const warning of record.warnings) {
      lines.push(`- ${warning}`);
    }
    lines.push('');
  }

  lines.push('### Audit Trail');
  record.auditTrail.forEach((entry, index) => {
    const method = entry.resolutionMethod ? ` [${entry.resolutionMethod}]` : '';
    lines.push(`${index + 1}. ${entry.stage}: ${entry.decision}${method} (${entry.confidenceContribution.toFixed(2)})`);
  });

  return lines.join('\n');
}

/**
 * Batch summary plus the records that need a human
 */
export function formatBatchResult(result: BatchResult): string {
  const { summary } = result;
  const lines: string[] = [];

  lines.push('## Reconciliation Batch');
  lines.push(`Batch: ${result.id}`);
  lines.push(`Started: ${result.startedAt.toISOString()}`);
  lines.push('');
  lines.push('### Summary');
  lines.push(`- Rows: ${summary.total}`);
  lines.push(`- Passed: ${summary.passed} (auto-accepted: ${summary.autoAccepted})`);
  lines.push(`- Requires review: ${summary.requiresReview}`);
  lines.push(`- Failed: ${summary.failed}`);
  lines.push(`- Average confidence: ${percent(summary.averageConfidence)}`);
  for (const [reason, count] of Object.entries(summary.failureReasons)) {
    lines.push(`- ${reason}: ${count}`);
  }
  lines.push(`- Processing time: ${result.processingTimeMs}ms`);

  const attention = result.records.filter((r) => r.validationStatus !== 'passed');
  if (attention.length > 0) {
    lines.push('');
    lines.push(`### Needs Attention (showing first 20 of ${attention.length})`);
    for (const record of attention.slice(0, 20)) {
      const reason = record.failureReason ?? record.warnings[0] ?? 'below auto-accept threshold';
      lines.push(`- ${record.identity.modelCode} ${record.validationStatus} ${percent(record.confidenceScore)}: ${reason}`);
    }
  }

  return lines.join('\n');
}

export function formatPromotionResult(result: PromotionResult, dryRun = false): string {
  const lines: string[] = [];

  lines.push(dryRun ? '## Modifier Promotion (dry run)' : '## Modifier Promotion');
  lines.push(`- Promoted: ${result.promoted.length}`);
  lines.push(`- Skipped: ${result.skipped.length}`);

  if (result.promoted.length > 0) {
    lines.push('');
    lines.push('### Promoted');
    for (const entry of result.promoted) {
      const year = entry.modelYear === undefined ? '' : ` ${entry.modelYear}`;
      lines.push(`- ${entry.brand}${year} "${entry.modifierName}" (${entry.category}) ${percent(entry.confidence)}`);
    }
  }

  if (result.skipped.length > 0) {
    lines.push('');
    lines.push('### Skipped');
    for (const skip of result.skipped) {
      lines.push(`- ${skip.brand} "${skip.token}": ${skip.reason}`);
    }
  }

  return lines.join('\n');
}
