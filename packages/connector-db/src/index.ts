/**
 * @snowmatch/connector-db
 *
 * PostgreSQL-backed catalog, modifier registry, product repository
 * and review queue.
 */

export * from './postgresql/index.js';
