/**
 * Tool definitions the model must answer through, and the zod schemas
 * their inputs are checked against.
 */

import type Anthropic from '@anthropic-ai/sdk';
import { z } from 'zod';
import { MODIFIER_CATEGORIES, fieldDeltaSchema, modifierCategorySchema } from '@snowmatch/core';

const confidence = z.number().min(0).max(1);

export const MATCH_BASE_MODEL_TOOL: Anthropic.Tool = {
  name: 'match_base_model',
  description:
    'Report which catalog model family the price-list model name refers to. Use null when none of the candidates is the same model.',
  input_schema: {
    type: 'object' as const,
    properties: {
      name: {
        type: ['string', 'null'],
        description: 'Exactly one of the candidate names, or null.',
      },
      confidence: {
        type: 'number',
        description: 'Confidence in [0, 1] that the chosen candidate is the same model family and package.',
      },
      reasoning: { type: 'string', description: 'One sentence.' },
    },
    required: ['name', 'confidence', 'reasoning'],
  },
};

export const matchBaseModelInputSchema = z.object({
  name: z.string().nullable(),
  confidence,
  reasoning: z.string().default(''),
});

export const RESOLVE_MODIFIER_TOOL: Anthropic.Tool = {
  name: 'resolve_modifier',
  description:
    'Report how a spring option changes the specification of the snowmobile. Each delta either replaces the value at a dotted path or merges values into the list at that path.',
  input_schema: {
    type: 'object' as const,
    properties: {
      category: {
        type: 'string',
        enum: [...MODIFIER_CATEGORIES],
        description: 'What kind of option this is.',
      },
      deltas: {
        type: 'array',
        items: {
          type: 'object',
          properties: {
            path: { type: 'string', description: 'Dotted path such as "track.profile" or "features".' },
            op: { type: 'string', enum: ['replace', 'merge'] },
            value: { description: 'Any JSON value.' },
          },
          required: ['path', 'op', 'value'],
        },
      },
      confidence: {
        type: 'number',
        description: 'Confidence in [0, 1] that the deltas describe the option correctly.',
      },
      reasoning: { type: 'string', description: 'One sentence.' },
    },
    required: ['category', 'deltas', 'confidence', 'reasoning'],
  },
};

export const resolveModifierInputSchema = z.object({
  category: modifierCategorySchema,
  deltas: z.array(fieldDeltaSchema),
  confidence,
  reasoning: z.string().default(''),
});

export const CHECK_CONSISTENCY_TOOL: Anthropic.Tool = {
  name: 'check_consistency',
  description:
    'Report whether the assembled product record describes the same snowmobile as the price-list line.',
  input_schema: {
    type: 'object' as const,
    properties: {
      confidence: {
        type: 'number',
        description: 'Confidence in [0, 1] that record and line describe the same product.',
      },
      issues: {
        type: 'array',
        items: { type: 'string' },
        description: 'Contradictions found, empty when none.',
      },
    },
    required: ['confidence', 'issues'],
  },
};

export const checkConsistencyInputSchema = z.object({
  confidence,
  issues: z.array(z.string()).default([]),
});
