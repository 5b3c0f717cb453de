export {
  levenshtein,
  jaro,
  jaroWinkler,
  diceSorensen,
  tokenOverlap,
  compositeSimilarity,
  calculateSimilarity,
} from './string-similarity.js';
