/**
 * Row shapes returned by the snowmatch tables.
 *
 * pg hands NUMERIC back as strings and TIMESTAMPTZ as Date, JSONB as
 * parsed values; these schemas pin that down before rows become domain
 * objects.
 */

import { z } from 'zod';
import { CollaboratorError, formatZodIssues } from '@snowmatch/core';

const timestamp = z.union([z.date(), z.string()]).transform((value) => (value instanceof Date ? value.toISOString() : value));

export const baseModelRowSchema = z.object({
  brand: z.string(),
  model_family: z.string(),
  model_year: z.coerce.number().int(),
  category: z.string(),
  platform: z.unknown(),
  option_sets: z.unknown(),
  source_catalog: z.string().nullable(),
});

export const modelFamilyRowSchema = z.object({
  model_family: z.string(),
});

export const modifierRowSchema = z.object({
  brand: z.string(),
  modifier_name: z.string(),
  model_family: z.string().nullable(),
  model_year: z.number().int().nullable(),
  category: z.string(),
  deltas: z.unknown(),
  confidence: z.coerce.number(),
  provenance: z.string(),
  times_seen: z.coerce.number().int(),
  created_at: timestamp,
  updated_at: timestamp,
});

export type BaseModelRow = z.infer<typeof baseModelRowSchema>;
export type ModifierRow = z.infer<typeof modifierRowSchema>;

/**
 * Validate every row or throw VALIDATION_ERROR naming the table.
 */
export function parseRows<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  rows: readonly unknown[],
  table: string,
  collaborator: string
): T[] {
  return rows.map((row, index) => {
    const parsed = schema.safeParse(row);
    if (!parsed.success) {
      throw new CollaboratorError({
        code: 'VALIDATION_ERROR',
        message: formatZodIssues(`Unexpected ${table} row ${index + 1}`, parsed.error),
        collaborator,
        context: { table },
      });
    }
    return parsed.data;
  });
}
