/**
 * Zod schemas for every boundary that reads domain data
 * (price-list files, catalog files, registry stores, resolver payloads).
 */

import { z } from 'zod';
import { MODIFIER_CATEGORIES, VARIANT_AXES } from '../types/index.js';
import { isReservedKey } from '../utils/records.js';
import type {
  AttributeTree,
  AttributeValue,
  BaseModelTemplate,
  FieldDelta,
  OptionModifierRecord,
  PriceListRow,
} from '../types/index.js';

export const attributeValueSchema: z.ZodType<AttributeValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(attributeValueSchema),
    z.record(attributeValueSchema),
  ])
);

export const attributeTreeSchema: z.ZodType<AttributeTree> = z.record(attributeValueSchema);

const optionalText = z
  .string()
  .nullish()
  .transform((value) => (value ?? '').trim());

export const priceListRowSchema = z.object({
  modelCode: z
    .string()
    .trim()
    .min(1, 'modelCode is required')
    .max(8, 'modelCode is longer than a commercial code'),
  brand: z.string().trim().min(1, 'brand is required'),
  modelYear: z.coerce.number().int().min(2015).max(2035),
  modelName: z.string().trim().min(1, 'modelName is required'),
  package: optionalText,
  engineToken: optionalText,
  trackToken: optionalText,
  starterToken: optionalText,
  displayToken: optionalText,
  optionModifiers: z
    .string()
    .nullish()
    .transform((value) => {
      const trimmed = value?.trim();
      return trimmed ? trimmed : null;
    }),
  color: optionalText,
  price: z.coerce.number().finite(),
  currency: z.string().trim().toUpperCase().length(3, 'currency must be an ISO 4217 code'),
  market: z.string().trim().toUpperCase().min(2),
  sourceFile: z.string().optional(),
  pageNumber: z.coerce.number().int().positive().optional(),
  extractionConfidence: z.number().min(0).max(1).optional(),
});

export const optionEntrySchema = z.object({
  token: z.string().trim().min(1, 'option token must not be empty'),
  label: z.string().optional(),
  attributes: attributeTreeSchema.default({}),
});

export const optionSetsSchema = z
  .record(z.array(optionEntrySchema))
  .superRefine((value, ctx) => {
    for (const axis of Object.keys(value)) {
      if (!VARIANT_AXES.some((known) => known === axis)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Unknown variant axis: ${axis} (expected one of ${VARIANT_AXES.join(', ')})`,
          path: [axis],
        });
      }
    }
  })
  .transform((value) => {
    const out: BaseModelTemplate['optionSets'] = {};
    for (const axis of VARIANT_AXES) {
      const entries = value[axis];
      if (entries) out[axis] = entries;
    }
    return out;
  });

export const baseModelTemplateSchema = z.object({
  brand: z.string().trim().min(1),
  modelFamily: z.string().trim().min(1),
  modelYear: z.number().int().min(2015).max(2035),
  category: z.string().trim().min(1),
  platform: attributeTreeSchema,
  optionSets: optionSetsSchema.default({}),
  sourceCatalog: z.string().optional(),
});

export const fieldDeltaSchema = z.object({
  path: z
    .string()
    .trim()
    .min(1)
    .regex(/^[A-Za-z0-9_]+(\.[A-Za-z0-9_]+)*$/, 'path must be dotted field names')
    .refine((path) => !path.split('.').some(isReservedKey), 'path must not name __proto__, prototype or constructor'),
  op: z.enum(['replace', 'merge']),
  value: attributeValueSchema,
});

export const modifierCategorySchema = z.enum(MODIFIER_CATEGORIES);

/** Registry entries below this confidence are not worth storing */
export const MIN_REGISTRY_CONFIDENCE = 0.5;

export const optionModifierRecordSchema = z.object({
  brand: z.string().trim().min(1),
  modifierName: z.string().trim().min(1),
  modelFamily: z.string().trim().min(1).optional(),
  modelYear: z.number().int().optional(),
  category: modifierCategorySchema,
  deltas: z.array(fieldDeltaSchema),
  confidence: z.number().min(MIN_REGISTRY_CONFIDENCE).max(1),
  provenance: z.enum(['registry', 'promoted', 'human']),
  timesSeen: z.number().int().nonnegative().optional(),
  createdAt: z.string().optional(),
  updatedAt: z.string().optional(),
});

type Issue = { path: Array<string | number>; message: string };

export function formatZodIssues(label: string, err: { issues: Issue[] }): string {
  const issues = err.issues
    .map((issue) => {
      const path = issue.path.length ? issue.path.join('.') : '(root)';
      return `- ${path}: ${issue.message}`;
    })
    .join('\n');
  return `${label}:\n${issues}`;
}

export type ParseResult<T> = { ok: true; value: T } | { ok: false; error: string };

function parseWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, label: string, input: unknown): ParseResult<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    return { ok: false, error: formatZodIssues(label, result.error) };
  }
  return { ok: true, value: result.data };
}

export function parsePriceListRow(input: unknown): ParseResult<PriceListRow> {
  return parseWith(priceListRowSchema, 'Invalid price-list row', input);
}

export function parseBaseModelTemplate(input: unknown): ParseResult<BaseModelTemplate> {
  return parseWith(baseModelTemplateSchema, 'Invalid base model template', input);
}

export function parseFieldDeltas(input: unknown): ParseResult<FieldDelta[]> {
  return parseWith(z.array(fieldDeltaSchema), 'Invalid field deltas', input);
}

export function parseOptionModifierRecord(input: unknown): ParseResult<OptionModifierRecord> {
  return parseWith(optionModifierRecordSchema, 'Invalid option modifier record', input);
}
