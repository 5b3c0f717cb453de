export {
  attributeValueSchema,
  attributeTreeSchema,
  priceListRowSchema,
  optionEntrySchema,
  optionSetsSchema,
  baseModelTemplateSchema,
  fieldDeltaSchema,
  modifierCategorySchema,
  optionModifierRecordSchema,
  MIN_REGISTRY_CONFIDENCE,
  formatZodIssues,
  parsePriceListRow,
  parseBaseModelTemplate,
  parseFieldDeltas,
  parseOptionModifierRecord,
} from './schemas.js';
export type { ParseResult } from './schemas.js';
