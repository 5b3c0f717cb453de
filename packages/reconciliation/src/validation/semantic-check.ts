/**
 * Semantic consistency check through the external resolver.
 */

import { deepClone } from '@snowmatch/core';
import type { Logger, SemanticResolver, WorkingProductRecord } from '@snowmatch/core';

export interface SemanticCheckResult {
  score: number;
  usedFallback: boolean;
  error?: string;
}

export async function runSemanticCheck(
  resolver: SemanticResolver,
  record: WorkingProductRecord,
  originalText: string,
  fallbackScore: number,
  logger: Logger
): Promise<SemanticCheckResult> {
  try {
    const score = await resolver.checkConsistency(deepClone(record), originalText);
    if (!Number.isFinite(score)) {
      return { score: fallbackScore, usedFallback: true, error: `non-numeric consistency score: ${score}` };
    }
    return { score: Math.max(0, Math.min(1, score)), usedFallback: false };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.warn('Semantic consistency check failed; using fallback score', {
      modelCode: record.identity.modelCode,
      error: message,
    });
    return { score: fallbackScore, usedFallback: true, error: message };
  }
}
