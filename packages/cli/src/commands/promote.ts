import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { z } from 'zod';
import { fieldDeltaSchema, formatZodIssues, modifierCategorySchema } from '@snowmatch/core';
import type { Logger } from '@snowmatch/core';
import { ModifierPromoter, resolveEngineConfig } from '@snowmatch/reconciliation';
import type { PromotionResult, PromotionSource } from '@snowmatch/reconciliation';
import type { ConfigFile } from '../config.js';
import { ConfigError } from '../config.js';
import type { Runtime } from '../runtime.js';

export interface PromoteOptions {
  /** JSON results written by `reconcile --format json` */
  input: string;
  minConfidence?: number;
  dryRun?: boolean;
}

const modifierApplicationSchema = z.object({
  token: z.string().min(1),
  resolutionMethod: z.enum(['registry', 'external', 'unresolved']),
  category: modifierCategorySchema.nullable(),
  fieldsChanged: z.array(z.string()),
  deltas: z.array(fieldDeltaSchema),
  confidence: z.number().min(0).max(1),
  rawConfidence: z.number().min(0).max(1).nullable(),
  error: z.string().optional(),
});

const promotionSourceSchema = z.object({
  identity: z.object({
    brand: z.string().trim().min(1),
    modelYear: z.number().int(),
  }),
  modifiers: z.array(modifierApplicationSchema),
});

const resultsFileSchema = z.array(promotionSourceSchema);

/**
 * Read product records from a results file, keeping only what promotion
 * needs.
 *
 * @throws ConfigError when the file is unreadable or not a results array
 */
export async function readPromotionSources(filePath: string): Promise<PromotionSource[]> {
  let parsed: unknown;
  try {
    const content = await readFile(filePath, 'utf-8');
    parsed = JSON.parse(content.replace(/^\uFEFF/, ''));
  } catch (error) {
    throw new ConfigError(`Cannot read results ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
  }

  const result = resultsFileSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigError(formatZodIssues(`Invalid results file ${filePath}`, result.error));
  }
  return result.data;
}

export async function promoteCommand(
  options: PromoteOptions,
  config: ConfigFile,
  runtime: Runtime,
  logger: Logger
): Promise<PromotionResult> {
  const inputPath = resolve(options.input);
  const sources = await readPromotionSources(inputPath);
  logger.info('Results read', { input: inputPath, records: sources.length });

  const promoter = new ModifierPromoter(runtime.registry, resolveEngineConfig(config.engine).promotion, logger);
  return await promoter.promote(sources, { minConfidence: options.minConfidence, dryRun: options.dryRun });
}
