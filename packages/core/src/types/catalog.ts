/**
 * Catalog types
 *
 * Base model templates as ingested from manufacturer catalogs.
 */

/** Any JSON-compatible specification value */
export type AttributeValue =
  | string
  | number
  | boolean
  | null
  | AttributeValue[]
  | AttributeTree;

/** Nested specification tree (engine, track, suspension, ...) */
export interface AttributeTree {
  [field: string]: AttributeValue;
}

/** Axes a price-list row selects a variant on */
export const VARIANT_AXES = ['engine', 'track', 'starter', 'display', 'color'] as const;

export type VariantAxis = (typeof VARIANT_AXES)[number];

/**
 * A selectable variant inside an option-set.
 */
export interface OptionEntry {
  /** Identifying token matched against price-row text (e.g. "600R E-TEC", "137in") */
  token: string;
  /** Display label, if different from the token */
  label?: string;
  /** Attributes flattened into the record when this option is selected */
  attributes: AttributeTree;
}

/** Option-sets keyed by axis, entries in declaration order */
export type OptionSets = Partial<Record<VariantAxis, OptionEntry[]>>;

/**
 * Catalog entry for one model family and year.
 */
export interface BaseModelTemplate {
  brand: string;
  /** Model family incl. package, e.g. "Rave RE" */
  modelFamily: string;
  modelYear: number;
  /** trail, crossover, deep_snow, utility, touring, performance, ... */
  category: string;
  /** Single-valued platform attributes (chassis, suspension, brakes, weight) */
  platform: AttributeTree;
  optionSets: OptionSets;
  /** Catalog document the template was extracted from */
  sourceCatalog?: string;
}
