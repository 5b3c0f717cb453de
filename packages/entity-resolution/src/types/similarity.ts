/**
 * String Similarity Types
 */

/** Result of a similarity comparison */
export interface SimilarityResult {
  /** Similarity score between 0 (no match) and 1 (exact match) */
  score: number;

  /** Which algorithm produced this result */
  algorithm: SimilarityAlgorithm;

  /** Optional details about the comparison */
  details?: string;
}

/** Available similarity algorithms */
export type SimilarityAlgorithm =
  | 'levenshtein'
  | 'jaro'
  | 'jaro_winkler'
  | 'dice_sorensen'
  | 'token_overlap'
  | 'composite';

export interface WeightedAlgorithm {
  algorithm: Exclude<SimilarityAlgorithm, 'composite'>;
  weight: number;
}

/** A candidate scored against a target name */
export interface RankedCandidate {
  candidate: string;
  score: number;
  details: string;
}
