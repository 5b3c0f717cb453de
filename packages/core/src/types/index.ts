/**
 * Type exports for core
 */

export { VARIANT_AXES } from './catalog.js';
export type {
  AttributeValue,
  AttributeTree,
  VariantAxis,
  OptionEntry,
  OptionSets,
  BaseModelTemplate,
} from './catalog.js';

export type { PriceListRow } from './price-list.js';

export { MODIFIER_CATEGORIES } from './modifier.js';
export type {
  ModifierCategory,
  FieldDelta,
  ModifierProvenance,
  OptionModifierRecord,
  ModifierScope,
} from './modifier.js';

export type {
  ValidationStatus,
  PipelineStage,
  LookupMethod,
  AxisMatchMethod,
  AxisResolution,
  ProductIdentity,
  WorkingProductRecord,
  ResolutionMethod,
  ModifierApplication,
  AuditEntry,
  ScoreBreakdown,
  FailureReason,
  FinalProductRecord,
} from './product.js';
