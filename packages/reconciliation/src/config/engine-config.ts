/**
 * Engine configuration
 *
 * Every tunable of the pipeline lives here with its default. Stages
 * receive the resolved config; nothing reads ad-hoc keys at point of use.
 */

import { z } from 'zod';
import { MIN_REGISTRY_CONFIDENCE, attributeValueSchema, formatZodIssues } from '@snowmatch/core';
import { ReconciliationError } from '../errors/index.js';

const confidence = z.number().min(0).max(1);

const boundsSchema = z
  .object({ min: z.number(), max: z.number() })
  .refine((b) => b.min <= b.max, { message: 'min must not exceed max' });

export const mandatoryFieldSchema = z.object({
  /** Dotted path, checked against identity fields and the spec tree */
  path: z.string().min(1),
  type: z.enum(['string', 'number', 'boolean']),
  /** Allowed values; anything else is not well-typed */
  enum: z.array(z.union([z.string(), z.number()])).optional(),
  /** Applied (with a warning) when the field is missing */
  default: attributeValueSchema.optional(),
});

export type MandatoryField = z.infer<typeof mandatoryFieldSchema>;

export const DEFAULT_MANDATORY_FIELDS: MandatoryField[] = [
  { path: 'brand', type: 'string' },
  { path: 'modelYear', type: 'number' },
  { path: 'engine.displacement', type: 'number' },
  { path: 'track.length', type: 'number' },
  { path: 'weight', type: 'number' },
];

/** Track length bounds in mm per category */
export const DEFAULT_CATEGORY_TRACK_LENGTH: Record<string, { min: number; max: number }> = {
  trail: { min: 2900, max: 3600 },
  performance: { min: 2900, max: 3600 },
  crossover: { min: 3300, max: 3950 },
  touring: { min: 3300, max: 4100 },
  deep_snow: { min: 3500, max: 4450 },
  utility: { min: 3400, max: 4550 },
};

/** Plausible list price per market */
export const DEFAULT_MARKETS: Record<string, { currency: string; minPrice: number; maxPrice: number }> = {
  FI: { currency: 'EUR', minPrice: 4000, maxPrice: 45000 },
  SE: { currency: 'SEK', minPrice: 45000, maxPrice: 500000 },
  NO: { currency: 'NOK', minPrice: 45000, maxPrice: 550000 },
  DK: { currency: 'DKK', minPrice: 30000, maxPrice: 350000 },
};

const retrySchema = z.object({
  /** Total attempts including the first */
  attempts: z.number().int().min(1).max(10).default(3),
  baseDelayMs: z.number().int().nonnegative().default(200),
  maxDelayMs: z.number().int().nonnegative().default(5000),
  /** Random jitter factor between 0 and 1 */
  jitter: z.number().min(0).max(1).default(0.2),
});

export const externalCallSchema = z.object({
  timeoutMs: z.number().int().positive().default(15_000),
  maxConcurrency: z.number().int().min(1).default(4),
  retries: retrySchema.default({}),
  /** Calls beyond `maxRequests` per window wait for the next window */
  rateLimit: z
    .object({
      enabled: z.boolean().default(false),
      windowMs: z.number().int().positive().default(60_000),
      maxRequests: z.number().int().positive().default(50),
    })
    .default({}),
  /** Tracked per resolver operation; only transient failures count */
  circuitBreaker: z
    .object({
      enabled: z.boolean().default(false),
      failureThreshold: z.number().int().min(1).default(5),
      openMs: z.number().int().min(1).default(30_000),
    })
    .default({}),
});

export type ExternalCallConfig = z.infer<typeof externalCallSchema>;

export const engineConfigSchema = z
  .object({
    lookup: z
      .object({
        exactConfidence: confidence.default(0.98),
        /** Minimum semantic-match confidence for a base model */
        semanticFloor: confidence.default(0.7),
      })
      .default({}),
    variants: z
      .object({
        methodConfidence: z
          .object({
            exact: confidence.default(1),
            substring: confidence.default(0.95),
            numeric: confidence.default(0.85),
            soleOption: confidence.default(0.9),
            fixed: confidence.default(1),
            ambiguous: confidence.default(0.6),
            unresolved: confidence.default(0),
          })
          .default({}),
      })
      .default({}),
    modifiers: z
      .object({
        /** Subtracted from the resolver's confidence for externally resolved tokens */
        externalPenalty: confidence.default(0.05),
        /** Contribution of a token nothing could resolve */
        unresolvedConfidence: confidence.default(0.5),
      })
      .default({}),
    validation: z
      .object({
        autoAcceptThreshold: confidence.default(0.95),
        reviewThreshold: confidence.default(0.8),
        semanticFallbackScore: confidence.default(0.5),
        mandatoryFields: z.array(mandatoryFieldSchema).default(DEFAULT_MANDATORY_FIELDS),
        weights: z
          .object({
            technical: z.number().nonnegative().default(0.225),
            business: z.number().nonnegative().default(0.225),
            semantic: z.number().nonnegative().default(0.3),
            matching: z.number().nonnegative().default(0.1),
            variants: z.number().nonnegative().default(0.075),
            modifiers: z.number().nonnegative().default(0.075),
          })
          .default({})
          .refine((w) => Object.values(w).some((v) => v > 0), {
            message: 'at least one weight must be positive',
          }),
      })
      .default({}),
    business: z
      .object({
        rulePenalty: confidence.default(0.2),
        /** Engine displacement (cc) per kg of dry weight */
        displacementPerKg: boundsSchema.default({ min: 1, max: 6 }),
        categoryTrackLength: z.record(boundsSchema).default(DEFAULT_CATEGORY_TRACK_LENGTH),
        markets: z
          .record(
            z.object({
              currency: z.string().length(3),
              minPrice: z.number().nonnegative(),
              maxPrice: z.number().positive(),
            })
          )
          .default(DEFAULT_MARKETS),
      })
      .default({}),
    external: externalCallSchema.default({}),
    batch: z
      .object({
        maxConcurrentRows: z.number().int().min(1).default(10),
      })
      .default({}),
    promotion: z
      .object({
        /** Raw resolver confidence required before an external result is promoted */
        minConfidence: z.number().min(MIN_REGISTRY_CONFIDENCE).max(1).default(0.85),
      })
      .default({}),
  })
  .superRefine((value, ctx) => {
    if (value.validation.reviewThreshold > value.validation.autoAcceptThreshold) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'reviewThreshold must not exceed autoAcceptThreshold',
        path: ['validation', 'reviewThreshold'],
      });
    }
  });

export type EngineConfig = z.output<typeof engineConfigSchema>;
export type EngineConfigInput = z.input<typeof engineConfigSchema>;

/**
 * Fill defaults and validate.
 * @throws ReconciliationError INVALID_CONFIG
 */
export function resolveEngineConfig(input: EngineConfigInput = {}): EngineConfig {
  const result = engineConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ReconciliationError({
      code: 'INVALID_CONFIG',
      message: formatZodIssues('Invalid engine config', result.error),
      suggestion: 'Fix the listed fields or remove them to use the defaults',
    });
  }
  return result.data;
}
