export type {
  SimilarityResult,
  SimilarityAlgorithm,
  WeightedAlgorithm,
  RankedCandidate,
} from './similarity.js';
