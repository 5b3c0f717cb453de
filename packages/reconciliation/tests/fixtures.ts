import type {
  BaseModelMatch,
  BaseModelTemplate,
  ModifierContext,
  ModifierResolution,
  OptionModifierRecord,
  PriceListRow,
  SemanticResolver,
  WorkingProductRecord,
} from '@snowmatch/core';
import type { EngineConfigInput } from '../src/config/index.js';
import type { Clock } from '../src/runtime/index.js';

export const raveTemplate: BaseModelTemplate = {
  brand: 'Lynx',
  modelFamily: 'Rave RE',
  modelYear: 2026,
  category: 'performance',
  platform: {
    weight: 230,
    chassis: 'Radien2',
    suspension: { front: 'LFS-R', rear: 'PPS3-DS+' },
    brakes: 'Brembo',
    features: ['LED headlight'],
  },
  optionSets: {
    engine: [
      { token: '600R E-TEC', attributes: { displacement: 599.4, type: '2-stroke', powerHp: 125 } },
      { token: '850 E-TEC', attributes: { displacement: 849, type: '2-stroke', powerHp: 165 } },
    ],
    track: [
      { token: '129in', attributes: { length: 3300, width: 406, lug: 38 } },
      { token: '137in', attributes: { length: 3500, width: 406, lug: 38 } },
    ],
  },
};

export const adventureTemplate: BaseModelTemplate = {
  brand: 'Lynx',
  modelFamily: 'Adventure LX',
  modelYear: 2026,
  category: 'touring',
  platform: { weight: 290, engine: { displacement: 900, type: '4-stroke' } },
  optionSets: {
    track: [{ token: '146in', attributes: { length: 3700 } }],
  },
};

export function makeRow(overrides: Partial<PriceListRow> = {}): PriceListRow {
  return {
    modelCode: 'LTTA',
    brand: 'Lynx',
    modelYear: 2026,
    modelName: 'Rave',
    package: 'RE',
    engineToken: '600R E-TEC',
    trackToken: '129in 3300mm',
    starterToken: 'Electric',
    displayToken: '',
    optionModifiers: null,
    color: 'Black',
    price: 18990,
    currency: 'EUR',
    market: 'FI',
    ...overrides,
  };
}

export const blackEditionEntry: OptionModifierRecord = {
  brand: 'Lynx',
  modifierName: 'Black edition',
  category: 'color',
  deltas: [
    { path: 'color.name', op: 'replace', value: 'Black' },
    { path: 'features', op: 'merge', value: 'Black edition graphics' },
  ],
  confidence: 0.92,
  provenance: 'registry',
};

type Answer<T> = T | Error;

export interface FakeResolverOptions {
  baseModel?: Answer<BaseModelMatch>;
  modifiers?: Record<string, Answer<ModifierResolution>>;
  consistency?: Answer<number>;
  /** Delay before every answer */
  delayMs?: number;
}

/**
 * Deterministic stand-in for the LLM resolver. Unknown modifier tokens
 * throw, like an unavailable service.
 */
export class FakeResolver implements SemanticResolver {
  readonly calls: Array<{ method: string; args: unknown[] }> = [];
  inFlight = 0;
  maxInFlight = 0;

  constructor(private readonly options: FakeResolverOptions = {}) {}

  async matchBaseModel(brand: string, targetName: string, candidates: string[]): Promise<BaseModelMatch> {
    return this.answer('matchBaseModel', [brand, targetName, candidates], this.options.baseModel ?? {
      name: null,
      confidence: 0,
    });
  }

  async resolveModifier(brand: string, token: string, context: ModifierContext): Promise<ModifierResolution> {
    const configured = this.options.modifiers?.[token] ?? new Error(`no resolution for ${token}`);
    return this.answer('resolveModifier', [brand, token, context], configured);
  }

  async checkConsistency(record: WorkingProductRecord, originalText: string): Promise<number> {
    return this.answer('checkConsistency', [record, originalText], this.options.consistency ?? 0.95);
  }

  callsTo(method: string): number {
    return this.calls.filter((c) => c.method === method).length;
  }

  private async answer<T>(method: string, args: unknown[], value: Answer<T>): Promise<T> {
    this.calls.push({ method, args });
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      if (this.options.delayMs) {
        await new Promise<void>((resolve) => setTimeout(resolve, this.options.delayMs));
      }
      if (value instanceof Error) throw value;
      return value;
    } finally {
      this.inFlight--;
    }
  }
}

/** No retries or backoff, so failing fakes fail fast */
export const fastConfig: EngineConfigInput = {
  external: { timeoutMs: 1000, retries: { attempts: 1 } },
};

/** Clock whose sleeps advance time instantly and are recorded */
export class ManualClock implements Clock {
  current = 0;
  readonly sleeps: number[] = [];

  now(): number {
    return this.current;
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.current += ms;
  }
}
