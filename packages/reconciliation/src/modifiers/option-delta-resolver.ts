/**
 * Option-Delta Resolver ("spring options")
 *
 * Resolves each comma-separated modifier token against the registry,
 * falls back to the semantic resolver, and applies the resulting
 * deltas to the record. Externally resolved results are never written
 * back here; promotion is a separate, explicit step.
 */

import { deepClone, parseFieldDeltas } from '@snowmatch/core';
import type {
  Logger,
  ModifierApplication,
  ModifierRegistry,
  OptionModifierRecord,
  SemanticResolver,
  WorkingProductRecord,
} from '@snowmatch/core';
import type { EngineConfig } from '../config/index.js';
import { ReconciliationError } from '../errors/index.js';
import { applyDeltas } from './delta-applier.js';

export interface ModifierResult {
  record: WorkingProductRecord;
  applications: ModifierApplication[];
  /** Mean contribution, 1.0 when there is nothing to resolve */
  confidence: number;
}

export function splitModifierText(text: string | null | undefined): string[] {
  if (!text) return [];
  return text
    .split(',')
    .map((token) => token.trim())
    .filter((token) => token.length > 0);
}

function clamp01(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.max(0, Math.min(1, value));
}

export class OptionDeltaResolver {
  constructor(
    private readonly registry: ModifierRegistry,
    private readonly resolver: SemanticResolver,
    private readonly config: EngineConfig['modifiers'],
    private readonly logger: Logger
  ) {}

  /**
   * Tokens are applied in the order they appear.
   * @throws ReconciliationError REGISTRY_UNAVAILABLE when the registry fails
   */
  async applyModifiers(record: WorkingProductRecord, modifierText: string | null): Promise<ModifierResult> {
    const tokens = splitModifierText(modifierText);
    const applications: ModifierApplication[] = [];

    for (const token of tokens) {
      applications.push(await this.applyToken(record, token));
    }

    const confidence =
      applications.length === 0
        ? 1
        : applications.reduce((sum, a) => sum + a.confidence, 0) / applications.length;

    return { record, applications, confidence };
  }

  private async applyToken(record: WorkingProductRecord, token: string): Promise<ModifierApplication> {
    const { brand, modelFamily, modelYear } = record.identity;

    const entry = await this.lookup(brand, token, modelFamily, modelYear);
    if (entry) {
      try {
        const fieldsChanged = applyDeltas(record.spec, entry.deltas);
        return {
          token,
          resolutionMethod: 'registry',
          category: entry.category,
          fieldsChanged,
          deltas: entry.deltas,
          confidence: entry.confidence,
          rawConfidence: entry.confidence,
        };
      } catch (err) {
        return this.unresolved(record, token, err);
      }
    }

    try {
      const resolution = await this.resolver.resolveModifier(brand, token, {
        modelCode: record.identity.modelCode,
        modelFamily,
        modelYear,
        category: record.identity.category,
        spec: deepClone(record.spec),
      });

      const deltas = parseFieldDeltas(resolution.deltas);
      if (!deltas.ok) {
        throw new Error(deltas.error);
      }

      const raw = clamp01(resolution.confidence);
      const fieldsChanged = applyDeltas(record.spec, deltas.value);
      return {
        token,
        resolutionMethod: 'external',
        category: resolution.category ?? null,
        fieldsChanged,
        deltas: deltas.value,
        confidence: Math.max(0, raw - this.config.externalPenalty),
        rawConfidence: raw,
      };
    } catch (err) {
      return this.unresolved(record, token, err);
    }
  }

  private unresolved(record: WorkingProductRecord, token: string, err: unknown): ModifierApplication {
    const message = err instanceof Error ? err.message : String(err);
    this.logger.warn('Modifier token left unresolved', {
      modelCode: record.identity.modelCode,
      token,
      error: message,
    });
    return {
      token,
      resolutionMethod: 'unresolved',
      category: null,
      fieldsChanged: [],
      deltas: [],
      confidence: this.config.unresolvedConfidence,
      rawConfidence: null,
      error: message,
    };
  }

  private async lookup(
    brand: string,
    token: string,
    modelFamily: string,
    modelYear: number
  ): Promise<OptionModifierRecord | null> {
    try {
      return await this.registry.getModifier(brand, token, { modelFamily, modelYear });
    } catch (err) {
      throw new ReconciliationError({
        code: 'REGISTRY_UNAVAILABLE',
        message: `Modifier registry lookup failed: ${err instanceof Error ? err.message : String(err)}`,
        suggestion: 'Check the modifier registry store.',
        cause: err instanceof Error ? err : undefined,
        context: { brand, token },
      });
    }
  }
}
