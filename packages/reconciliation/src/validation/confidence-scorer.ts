/**
 * Confidence Scorer
 *
 * Final score as a fixed weighted average of the sub-scores.
 */

import type { ScoreBreakdown } from '@snowmatch/core';
import { roundScore } from './values.js';

export type ScoreWeights = Record<keyof ScoreBreakdown, number>;

const SCORE_KEYS: Array<keyof ScoreBreakdown> = [
  'technical',
  'business',
  'semantic',
  'matching',
  'variants',
  'modifiers',
];

export class ConfidenceScorer {
  constructor(private readonly weights: ScoreWeights) {}

  /**
   * sum(weight * score) / sum(weight), rounded to 4 decimals.
   * Order-independent and pure.
   */
  score(breakdown: ScoreBreakdown): number {
    let totalWeight = 0;
    let weightedSum = 0;
    for (const key of SCORE_KEYS) {
      const weight = this.weights[key];
      weightedSum += weight * breakdown[key];
      totalWeight += weight;
    }
    if (totalWeight === 0) return 0;
    return roundScore(weightedSum / totalWeight);
  }
}
