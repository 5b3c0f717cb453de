/**
 * Modifier promotion
 *
 * Turns confidently, externally resolved modifier tokens into registry
 * entries. Never called by the engine; runs only when asked to.
 */

import { MIN_REGISTRY_CONFIDENCE, createSilentLogger, parseOptionModifierRecord } from '@snowmatch/core';
import type {
  Logger,
  ModifierApplication,
  ModifierRegistry,
  OptionModifierRecord,
  ProductIdentity,
} from '@snowmatch/core';
import type { EngineConfig } from '../config/index.js';
import { ReconciliationError } from '../errors/index.js';

export interface PromotionOptions {
  /** Overrides `promotion.minConfidence` */
  minConfidence?: number;
  /** Collect candidates without writing them */
  dryRun?: boolean;
}

/** What promotion reads from a final product record */
export interface PromotionSource {
  identity: Pick<ProductIdentity, 'brand' | 'modelYear'>;
  modifiers: readonly ModifierApplication[];
}

export interface SkippedPromotion {
  brand: string;
  token: string;
  reason: string;
}

export interface PromotionResult {
  promoted: OptionModifierRecord[];
  skipped: SkippedPromotion[];
}

function promotionKey(brand: string, name: string, modelYear: number): string {
  return `${brand.trim().toLowerCase()}|${name.trim().toLowerCase()}|${modelYear}`;
}

export class ModifierPromoter {
  private readonly logger: Logger;

  constructor(
    private readonly registry: ModifierRegistry,
    private readonly config: EngineConfig['promotion'],
    logger?: Logger,
    private readonly now: () => Date = () => new Date()
  ) {
    this.logger = logger ?? createSilentLogger();
  }

  /**
   * Candidates are deduplicated on (brand, modifier name, model year);
   * the most confident application wins.
   *
   * Every candidate is validated before the first write. Registries
   * have no batch write, so a failing upsert leaves the entries before it
   * in place; the error lists them.
   *
   * @throws ReconciliationError INVALID_CONFIG when `minConfidence` is
   *   outside 0.5 to 1
   * @throws ReconciliationError PROMOTION_FAILED when the registry rejects a write
   */
  async promote(
    records: readonly PromotionSource[],
    options: PromotionOptions = {}
  ): Promise<PromotionResult> {
    const minConfidence = options.minConfidence ?? this.config.minConfidence;
    if (!(minConfidence >= MIN_REGISTRY_CONFIDENCE && minConfidence <= 1)) {
      throw new ReconciliationError({
        code: 'INVALID_CONFIG',
        message: `Promotion minConfidence must be between ${MIN_REGISTRY_CONFIDENCE} and 1 (got ${minConfidence})`,
        suggestion: `Registry entries need a confidence of at least ${MIN_REGISTRY_CONFIDENCE}.`,
      });
    }
    const candidates = new Map<string, OptionModifierRecord>();
    const skipped: SkippedPromotion[] = [];
    const timestamp = this.now().toISOString();

    for (const record of records) {
      const { brand, modelYear } = record.identity;

      for (const application of record.modifiers) {
        if (application.resolutionMethod !== 'external') continue;

        const raw = application.rawConfidence ?? 0;
        if (raw < minConfidence) {
          skipped.push({ brand, token: application.token, reason: `confidence ${raw} below ${minConfidence}` });
          continue;
        }
        if (!application.category) {
          skipped.push({ brand, token: application.token, reason: 'resolver returned no category' });
          continue;
        }
        if (application.deltas.length === 0) {
          skipped.push({ brand, token: application.token, reason: 'no field deltas' });
          continue;
        }

        const key = promotionKey(brand, application.token, modelYear);
        const existing = candidates.get(key);
        if (existing && existing.confidence >= raw) continue;

        candidates.set(key, {
          brand,
          modifierName: application.token,
          modelYear,
          category: application.category,
          deltas: application.deltas,
          confidence: Math.min(1, raw),
          provenance: 'promoted',
          timesSeen: 1,
          createdAt: timestamp,
          updatedAt: timestamp,
        });
      }
    }

    const promoted: OptionModifierRecord[] = [];
    for (const candidate of candidates.values()) {
      const parsed = parseOptionModifierRecord(candidate);
      if (parsed.ok) promoted.push(parsed.value);
      else skipped.push({ brand: candidate.brand, token: candidate.modifierName, reason: parsed.error });
    }

    if (options.dryRun) {
      return { promoted, skipped };
    }

    const written: string[] = [];
    for (const entry of promoted) {
      try {
        await this.registry.upsertModifier(entry);
        written.push(entry.modifierName);
      } catch (err) {
        throw new ReconciliationError({
          code: 'PROMOTION_FAILED',
          message: `Failed to promote modifier "${entry.modifierName}" for ${entry.brand}: ${err instanceof Error ? err.message : String(err)}`,
          cause: err instanceof Error ? err : undefined,
          context: { brand: entry.brand, modifierName: entry.modifierName, modelYear: entry.modelYear, written },
        });
      }
    }

    this.logger.info('Modifiers promoted', { promoted: promoted.length, skipped: skipped.length });
    return { promoted, skipped };
  }
}
