/**
 * Offline semantic resolver
 *
 * String similarity stands in for the LLM: base models are ranked with
 * the catalog candidate ranker, consistency is the share of record
 * tokens found in the price-list line. It cannot invent modifier
 * deltas, so unknown modifiers stay unresolved.
 */

import { ResolverError } from '@snowmatch/core';
import type {
  BaseModelMatch,
  ModifierContext,
  ModifierResolution,
  SemanticResolver,
  WorkingProductRecord,
} from '@snowmatch/core';
import { bestCandidate, tokenize } from '@snowmatch/entity-resolution';
import type { WeightedAlgorithm } from '@snowmatch/entity-resolution';

export interface SimilarityResolverOptions {
  /** Overrides the ranker's default algorithm weights */
  algorithms?: WeightedAlgorithm[];
}

/**
 * Tokens the record claims about itself: brand, family, year and the
 * selected variant on every axis.
 */
export function recordTokens(record: WorkingProductRecord): string[] {
  const parts: string[] = [record.identity.brand, record.identity.modelFamily, String(record.identity.modelYear)];
  for (const resolution of Object.values(record.axes)) {
    if (resolution?.selectedToken) parts.push(resolution.selectedToken);
  }
  return [...new Set(parts.flatMap((part) => tokenize(part)))];
}

export class SimilaritySemanticResolver implements SemanticResolver {
  constructor(private readonly options: SimilarityResolverOptions = {}) {}

  async matchBaseModel(_brand: string, targetName: string, candidates: string[]): Promise<BaseModelMatch> {
    const best = bestCandidate(targetName, candidates, this.options.algorithms);
    if (!best) {
      return { name: null, confidence: 0, reasoning: 'no candidates' };
    }
    return { name: best.candidate, confidence: best.score, reasoning: `string similarity (${best.details})` };
  }

  async resolveModifier(brand: string, token: string, _context: ModifierContext): Promise<ModifierResolution> {
    throw new ResolverError({
      code: 'NOT_FOUND',
      message: `no offline resolution for modifier '${token}'`,
      collaborator: 'similarity',
      suggestion: `Add '${token}' for ${brand} to the modifier registry.`,
    });
  }

  async checkConsistency(record: WorkingProductRecord, originalText: string): Promise<number> {
    const expected = recordTokens(record);
    if (expected.length === 0) return 0;

    const seen = new Set(tokenize(originalText));
    const found = expected.filter((token) => seen.has(token)).length;
    return Math.round((found / expected.length) * 10000) / 10000;
  }
}

export function createSimilarityResolver(options?: SimilarityResolverOptions): SimilaritySemanticResolver {
  return new SimilaritySemanticResolver(options);
}
