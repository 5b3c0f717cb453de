/**
 * @snowmatch/resolvers
 *
 * SemanticResolver implementations: Anthropic Claude tool-use and an
 * offline string-similarity matcher.
 */

export * from './anthropic/index.js';
export * from './similarity/index.js';
