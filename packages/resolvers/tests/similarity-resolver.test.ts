import { describe, expect, it } from 'vitest';
import type { AxisResolution, WorkingProductRecord } from '@snowmatch/core';
import { SimilaritySemanticResolver, recordTokens } from '../src/index.js';

function selected(axis: AxisResolution['axis'], token: string): AxisResolution {
  return {
    axis,
    status: 'selected',
    method: 'exact',
    rowToken: token,
    selectedToken: token,
    candidates: [token],
    confidence: 1,
  };
}

function record(trackToken: string): WorkingProductRecord {
  return {
    identity: {
      modelCode: 'LTTA',
      brand: 'Lynx',
      modelYear: 2026,
      modelFamily: 'Rave RE',
      category: 'performance',
      baseModelKey: 'LYNX_RAVE_RE_2026',
      price: 18990,
      currency: 'EUR',
      market: 'FI',
    },
    spec: {},
    optionSets: {},
    axes: { engine: selected('engine', '600R E-TEC'), track: selected('track', trackToken) },
  };
}

const line = 'LTTA: Lynx Rave RE 2026 | engine 600R E-TEC | track 129in 3300mm | 18990 EUR (FI)';

describe('SimilaritySemanticResolver', () => {
  const resolver = new SimilaritySemanticResolver();

  it('returns the best-ranked candidate', async () => {
    expect(await resolver.matchBaseModel('Lynx', 'Rave RE', ['Adventure LX', 'Rave RE'])).toEqual({
      name: 'Rave RE',
      confidence: 1,
      reasoning: 'string similarity (identical)',
    });
  });

  it('returns no match without candidates', async () => {
    expect(await resolver.matchBaseModel('Lynx', 'Rave RE', [])).toEqual({
      name: null,
      confidence: 0,
      reasoning: 'no candidates',
    });
  });

  it('leaves modifiers to the registry', async () => {
    await expect(
      resolver.resolveModifier('Lynx', 'mystery kit', {
        modelCode: 'LTTA',
        modelFamily: 'Rave RE',
        modelYear: 2026,
        category: null,
        spec: {},
      })
    ).rejects.toMatchObject({ code: 'NOT_FOUND', message: "no offline resolution for modifier 'mystery kit'" });
  });

  it('collects the tokens a record claims', () => {
    expect(recordTokens(record('129in'))).toEqual(['LYNX', 'RAVE', 'RE', '2026', '600R', 'ETEC', '129IN']);
  });

  it('scores consistency as the share of record tokens in the line', async () => {
    expect(await resolver.checkConsistency(record('129in'), line)).toBe(1);
    expect(await resolver.checkConsistency(record('137in'), line)).toBe(0.8571);
  });
});
