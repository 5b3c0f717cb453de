/**
 * @snowmatch/entity-resolution
 *
 * Name matching for catalog lookups: normalized keys, string
 * similarity and candidate ranking.
 */

export * from './similarity/index.js';
export * from './keys/index.js';
export * from './matching/index.js';
export * from './types/index.js';
