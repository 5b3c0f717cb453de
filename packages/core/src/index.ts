/**
 * @snowmatch/core
 *
 * Domain types, collaborator interfaces, schemas, errors and logging
 * shared by every snowmatch package.
 */

export * from './types/index.js';
export * from './interfaces/index.js';
export * from './errors/index.js';
export * from './validation/index.js';
export * from './utils/index.js';
export * from './logging/index.js';
