export { SimilaritySemanticResolver, createSimilarityResolver, recordTokens } from './similarity-resolver.js';
export type { SimilarityResolverOptions } from './similarity-resolver.js';
