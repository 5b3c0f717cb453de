/**
 * PostgreSQL stores
 */

export { PostgresClient, createPostgresClient } from './client.js';
export type { PostgresClientConfig, PostgresQueryResult, Queryable } from './client.js';

export { applySchema, readSchemaSql } from './schema.js';
export { PostgresCatalog, createPostgresCatalog } from './catalog.js';
export { PostgresModifierRegistry, createPostgresModifierRegistry } from './modifier-registry.js';
export { PostgresProductRepository, createPostgresProductRepository } from './product-repository.js';
export { PostgresReviewQueue, createPostgresReviewQueue } from './review-queue.js';
