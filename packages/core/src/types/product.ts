/**
 * Product record types
 *
 * The working record built during reconciliation and the final,
 * confidence-scored record it ends as.
 */

import type { AttributeTree, OptionSets, VariantAxis } from './catalog.js';
import type { FieldDelta, ModifierCategory } from './modifier.js';

export type ValidationStatus = 'pending' | 'passed' | 'failed' | 'requires_review';

export type PipelineStage =
  | 'row_validation'
  | 'lookup'
  | 'inheritance'
  | 'variant_selection'
  | 'option_modifiers'
  | 'technical_check'
  | 'business_check'
  | 'semantic_check'
  | 'decision';

export type LookupMethod = 'exact_lookup' | 'semantic_match' | 'unmatched';

export type AxisMatchMethod =
  | 'exact'
  | 'substring'
  | 'numeric'
  | 'sole_option'
  | 'fixed'
  | 'ambiguous'
  | 'unresolved';

/**
 * Outcome of variant selection on one axis.
 */
export interface AxisResolution {
  axis: VariantAxis;
  status: 'selected' | 'ambiguous' | 'unresolved' | 'fixed';
  method: AxisMatchMethod;
  rowToken: string;
  selectedToken: string | null;
  /** Tokens of every option that matched with the deciding method */
  candidates: string[];
  confidence: number;
}

export interface ProductIdentity {
  modelCode: string;
  brand: string;
  modelYear: number;
  modelFamily: string;
  category: string | null;
  baseModelKey: string | null;
  price: number;
  currency: string;
  market: string;
}

/**
 * Mutable record assembled stage by stage.
 */
export interface WorkingProductRecord {
  identity: ProductIdentity;
  /** Platform attributes plus selected axes, flattened */
  spec: AttributeTree;
  /** Option-sets not yet narrowed by variant selection */
  optionSets: OptionSets;
  axes: Partial<Record<VariantAxis, AxisResolution>>;
}

export type ResolutionMethod = 'registry' | 'external' | 'unresolved';

/**
 * Result of resolving one modifier token.
 */
export interface ModifierApplication {
  token: string;
  resolutionMethod: ResolutionMethod;
  category: ModifierCategory | null;
  fieldsChanged: string[];
  deltas: FieldDelta[];
  /** Contribution to the modifier score */
  confidence: number;
  /** Confidence as reported by the source, before any penalty */
  rawConfidence: number | null;
  error?: string;
}

export interface AuditEntry {
  stage: PipelineStage;
  decision: string;
  inputs: Record<string, unknown>;
  confidenceContribution: number;
  resolutionMethod?: ResolutionMethod;
}

/** Sub-scores feeding the final weighted score */
export interface ScoreBreakdown {
  technical: number;
  business: number;
  semantic: number;
  matching: number;
  variants: number;
  modifiers: number;
}

export type FailureReason =
  | 'invalid_row'
  | 'no_base_model_match'
  | 'missing_mandatory_fields'
  | 'below_review_threshold';

export interface FinalProductRecord extends WorkingProductRecord {
  confidenceScore: number;
  validationStatus: ValidationStatus;
  autoAccepted: boolean;
  failureReason: FailureReason | null;
  scoreBreakdown: ScoreBreakdown | null;
  hardViolations: string[];
  warnings: string[];
  modifiers: ModifierApplication[];
  auditTrail: AuditEntry[];
  /** ISO timestamp; the only field that differs between identical runs */
  processedAt: string;
}
