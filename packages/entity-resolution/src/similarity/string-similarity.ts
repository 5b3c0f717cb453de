/**
 * String Similarity Functions
 *
 * Algorithms used to compare model-family names and option tokens.
 * Inputs are compared as given; normalize them first.
 */

import { distance as levenshteinDistance } from 'fastest-levenshtein';
import type { SimilarityResult, WeightedAlgorithm } from '../types/similarity.js';
import { tokenize } from '../keys/lookup-key.js';

/**
 * Normalized Levenshtein similarity, 1 = identical
 */
export function levenshtein(a: string, b: string): SimilarityResult {
  if (a === b) {
    return { score: 1, algorithm: 'levenshtein' };
  }

  if (a.length === 0 || b.length === 0) {
    return { score: 0, algorithm: 'levenshtein' };
  }

  const dist = levenshteinDistance(a, b);
  const maxLen = Math.max(a.length, b.length);
  const score = 1 - dist / maxLen;

  return {
    score,
    algorithm: 'levenshtein',
    details: `Distance: ${dist}, Max length: ${maxLen}`,
  };
}

/**
 * Jaro similarity: matching characters and transpositions.
 */
export function jaro(a: string, b: string): SimilarityResult {
  if (a === b) {
    return { score: 1, algorithm: 'jaro' };
  }

  if (a.length === 0 || b.length === 0) {
    return { score: 0, algorithm: 'jaro' };
  }

  const matchWindow = Math.floor(Math.max(a.length, b.length) / 2) - 1;
  const aMatches: boolean[] = new Array<boolean>(a.length).fill(false);
  const bMatches: boolean[] = new Array<boolean>(b.length).fill(false);

  let matches = 0;
  let transpositions = 0;

  // Find matches
  for (let i = 0; i < a.length; i++) {
    const start = Math.max(0, i - matchWindow);
    const end = Math.min(i + matchWindow + 1, b.length);

    for (let j = start; j < end; j++) {
      if (bMatches[j] || a[i] !== b[j]) continue;
      aMatches[i] = true;
      bMatches[j] = true;
      matches++;
      break;
    }
  }

  if (matches === 0) {
    return { score: 0, algorithm: 'jaro' };
  }

  // Count transpositions
  let k = 0;
  for (let i = 0; i < a.length; i++) {
    if (!aMatches[i]) continue;
    while (!bMatches[k]) k++;
    if (a[i] !== b[k]) transpositions++;
    k++;
  }

  const score =
    (matches / a.length +
      matches / b.length +
      (matches - transpositions / 2) / matches) /
    3;

  return {
    score,
    algorithm: 'jaro',
    details: `Matches: ${matches}, Transpositions: ${transpositions / 2}`,
  };
}

/**
 * Jaro-Winkler similarity. Model names share their distinctive part
 * up front ("Summit X" vs "Summit SP"), so the prefix boost fits.
 *
 * @param prefixScale Scaling factor for common prefix (max 0.25)
 */
export function jaroWinkler(
  a: string,
  b: string,
  prefixScale = 0.1
): SimilarityResult {
  const jaroResult = jaro(a, b);

  if (jaroResult.score === 1) {
    return { score: 1, algorithm: 'jaro_winkler' };
  }

  // Calculate common prefix length (max 4 characters)
  let prefixLength = 0;
  const maxPrefix = Math.min(4, Math.min(a.length, b.length));

  for (let i = 0; i < maxPrefix; i++) {
    if (a[i] === b[i]) {
      prefixLength++;
    } else {
      break;
    }
  }

  const score =
    jaroResult.score + prefixLength * prefixScale * (1 - jaroResult.score);

  return {
    score,
    algorithm: 'jaro_winkler',
    details: `Jaro: ${jaroResult.score.toFixed(3)}, Common prefix: ${prefixLength}`,
  };
}

/**
 * Dice-Sorensen coefficient over character n-grams
 */
export function diceSorensen(a: string, b: string, ngramSize = 2): SimilarityResult {
  if (a === b) {
    return { score: 1, algorithm: 'dice_sorensen' };
  }

  const aNgrams = getNgrams(a, ngramSize);
  const bNgrams = getNgrams(b, ngramSize);

  if (aNgrams.size === 0 || bNgrams.size === 0) {
    return { score: 0, algorithm: 'dice_sorensen' };
  }

  let intersection = 0;
  for (const ngram of aNgrams) {
    if (bNgrams.has(ngram)) {
      intersection++;
    }
  }

  const score = (2 * intersection) / (aNgrams.size + bNgrams.size);

  return {
    score,
    algorithm: 'dice_sorensen',
    details: `Intersection: ${intersection}, A ngrams: ${aNgrams.size}, B ngrams: ${bNgrams.size}`,
  };
}

/**
 * Share of whole tokens the two strings have in common (Dice over token sets).
 * "RAVE RE" vs "RAVE RE 600" scores 0.8.
 */
export function tokenOverlap(a: string, b: string): SimilarityResult {
  const aTokens = new Set(tokenize(a));
  const bTokens = new Set(tokenize(b));

  if (aTokens.size === 0 || bTokens.size === 0) {
    return { score: 0, algorithm: 'token_overlap' };
  }

  let shared = 0;
  for (const token of aTokens) {
    if (bTokens.has(token)) shared++;
  }

  return {
    score: (2 * shared) / (aTokens.size + bTokens.size),
    algorithm: 'token_overlap',
    details: `Shared tokens: ${shared}`,
  };
}

/**
 * Weighted combination of several algorithms
 */
export function compositeSimilarity(
  a: string,
  b: string,
  algorithms: WeightedAlgorithm[]
): SimilarityResult {
  if (a === b) {
    return { score: 1, algorithm: 'composite' };
  }

  let totalWeight = 0;
  let weightedSum = 0;
  const details: string[] = [];

  for (const { algorithm, weight } of algorithms) {
    const result = calculateSimilarity(a, b, algorithm);
    weightedSum += result.score * weight;
    totalWeight += weight;
    details.push(`${algorithm}: ${result.score.toFixed(3)}`);
  }

  const score = totalWeight > 0 ? weightedSum / totalWeight : 0;

  return {
    score,
    algorithm: 'composite',
    details: details.join(', '),
  };
}

export function calculateSimilarity(
  a: string,
  b: string,
  algorithm: WeightedAlgorithm['algorithm']
): SimilarityResult {
  switch (algorithm) {
    case 'levenshtein':
      return levenshtein(a, b);
    case 'jaro':
      return jaro(a, b);
    case 'jaro_winkler':
      return jaroWinkler(a, b);
    case 'dice_sorensen':
      return diceSorensen(a, b);
    case 'token_overlap':
      return tokenOverlap(a, b);
    default: {
      const exhaustive: never = algorithm;
      throw new Error(`Unknown algorithm: ${String(exhaustive)}`);
    }
  }
}
