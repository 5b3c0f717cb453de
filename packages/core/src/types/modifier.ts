/**
 * Option modifier ("spring option") types
 */

import type { AttributeValue } from './catalog.js';

export const MODIFIER_CATEGORIES = [
  'color',
  'track',
  'suspension',
  'gauge',
  'starter',
  'feature',
  'accessory',
] as const;

export type ModifierCategory = (typeof MODIFIER_CATEGORIES)[number];

/**
 * Change applied to a record field.
 * - replace: set the value at `path`
 * - merge: append to the list at `path`
 */
export interface FieldDelta {
  /** Dotted path into the spec tree, e.g. "track.profile" */
  path: string;
  op: 'replace' | 'merge';
  value: AttributeValue;
}

/** Where a registry entry came from */
export type ModifierProvenance = 'registry' | 'promoted' | 'human';

/**
 * Known modifier, keyed by (brand, modifierName, [modelFamily], [modelYear]).
 */
export interface OptionModifierRecord {
  brand: string;
  modifierName: string;
  modelFamily?: string;
  modelYear?: number;
  category: ModifierCategory;
  deltas: FieldDelta[];
  /** Contribution used when this entry resolves a token (0.5 - 1.0) */
  confidence: number;
  provenance: ModifierProvenance;
  timesSeen?: number;
  createdAt?: string;
  updatedAt?: string;
}

/** Narrows a registry lookup to a model family and/or year */
export interface ModifierScope {
  modelFamily?: string;
  modelYear?: number;
}
