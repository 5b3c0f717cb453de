/**
 * Candidate ranking
 *
 * Scores free-text names against a list of known names. Used as the
 * offline fallback for base-model matching.
 */

import { normalizeLookupText } from '../keys/lookup-key.js';
import { compositeSimilarity } from '../similarity/string-similarity.js';
import type { RankedCandidate, WeightedAlgorithm } from '../types/similarity.js';

export const DEFAULT_RANKING_ALGORITHMS: WeightedAlgorithm[] = [
  { algorithm: 'jaro_winkler', weight: 0.4 },
  { algorithm: 'dice_sorensen', weight: 0.3 },
  { algorithm: 'token_overlap', weight: 0.3 },
];

/**
 * Rank candidates by similarity to `target`, best first.
 * Ties keep the order the candidates were given in.
 */
export function rankCandidates(
  target: string,
  candidates: readonly string[],
  algorithms: WeightedAlgorithm[] = DEFAULT_RANKING_ALGORITHMS
): RankedCandidate[] {
  const normalizedTarget = normalizeLookupText(target).replace(/_/g, ' ');

  const ranked = candidates.map((candidate, index) => {
    const normalized = normalizeLookupText(candidate).replace(/_/g, ' ');
    const result = compositeSimilarity(normalizedTarget, normalized, algorithms);
    return {
      index,
      candidate,
      score: Math.round(result.score * 10000) / 10000,
      details: result.details ?? 'identical',
    };
  });

  ranked.sort((a, b) => b.score - a.score || a.index - b.index);

  return ranked.map(({ candidate, score, details }) => ({ candidate, score, details }));
}

/**
 * Best candidate, or null when the list is empty
 */
export function bestCandidate(
  target: string,
  candidates: readonly string[],
  algorithms?: WeightedAlgorithm[]
): RankedCandidate | null {
  return rankCandidates(target, candidates, algorithms)[0] ?? null;
}
