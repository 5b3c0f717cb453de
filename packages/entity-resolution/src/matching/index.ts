export { rankCandidates, bestCandidate, DEFAULT_RANKING_ALGORITHMS } from './candidate-ranker.js';
