/**
 * Collaborator Interfaces
 *
 * Everything the reconciliation engine talks to is injected through
 * these interfaces: file and database stores, LLM resolvers and
 * in-process fakes all implement them.
 */

import type {
  AttributeTree,
  BaseModelTemplate,
  FieldDelta,
  FinalProductRecord,
  ModifierCategory,
  ModifierScope,
  OptionModifierRecord,
  WorkingProductRecord,
} from '../types/index.js';

/**
 * Base model catalog.
 */
export interface CatalogCollaborator {
  /**
   * Fetch a template by normalized lookup key.
   * @returns null when no template exists for the key
   * @throws CollaboratorError when the catalog is unreachable
   */
  getBaseModel(lookupKey: string): Promise<BaseModelTemplate | null>;

  /**
   * Model-family names known for a brand, used as candidates for
   * semantic matching.
   */
  listCandidates(brand: string, modelYear?: number): Promise<string[]>;
}

/**
 * Registry of known option modifiers.
 */
export interface ModifierRegistry {
  /** Case-insensitive lookup; returns the most specific entry for the scope */
  getModifier(
    brand: string,
    name: string,
    scope?: ModifierScope
  ): Promise<OptionModifierRecord | null>;

  /**
   * Insert or merge an entry keyed by (brand, modifierName, modelYear).
   * Implementations serialize concurrent writes.
   */
  upsertModifier(record: OptionModifierRecord): Promise<void>;
}

export interface BaseModelMatch {
  /** Chosen candidate, or null when none fits */
  name: string | null;
  confidence: number;
  reasoning?: string;
}

export interface ModifierContext {
  modelCode: string;
  modelFamily: string;
  modelYear: number;
  category: string | null;
  spec: AttributeTree;
}

export interface ModifierResolution {
  deltas: FieldDelta[];
  confidence: number;
  category?: ModifierCategory;
  reasoning?: string;
}

/**
 * External semantic collaborator (an LLM or an offline matcher).
 *
 * Every method may throw ResolverError; callers treat any failure as a miss.
 */
export interface SemanticResolver {
  matchBaseModel(
    brand: string,
    targetName: string,
    candidates: string[]
  ): Promise<BaseModelMatch>;

  resolveModifier(
    brand: string,
    token: string,
    context: ModifierContext
  ): Promise<ModifierResolution>;

  /** Confidence in [0, 1] that the record narrates the same product as the text */
  checkConsistency(record: WorkingProductRecord, originalText: string): Promise<number>;
}

/** Receives records that did not fail */
export interface ProductRepository {
  save(record: FinalProductRecord): Promise<void>;
}

/** Receives failed records for manual review */
export interface ReviewQueue {
  enqueue(record: FinalProductRecord, reason: string): Promise<void>;
}
