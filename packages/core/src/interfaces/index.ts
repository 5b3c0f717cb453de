/**
 * Interface exports for core
 */

export type {
  CatalogCollaborator,
  ModifierRegistry,
  BaseModelMatch,
  ModifierContext,
  ModifierResolution,
  SemanticResolver,
  ProductRepository,
  ReviewQueue,
} from './collaborators.js';
