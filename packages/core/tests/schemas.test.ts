import { describe, expect, it } from 'vitest';
import {
  parseBaseModelTemplate,
  parseFieldDeltas,
  parseOptionModifierRecord,
  parsePriceListRow,
} from '../src/validation/schemas.js';

const rawRow = {
  modelCode: ' LTTA ',
  brand: 'Lynx',
  modelYear: '2026',
  modelName: 'Rave',
  package: 'RE',
  engineToken: '600R E-TEC',
  trackToken: '129in 3300mm',
  starterToken: null,
  displayToken: undefined,
  optionModifiers: '  ',
  color: 'Black',
  price: '18990.50',
  currency: 'eur',
  market: 'fi',
};

describe('parsePriceListRow', () => {
  it('normalizes strings and coerces numbers', () => {
    const result = parsePriceListRow(rawRow);
    expect(result.ok).toBe(true);
    if (!result.ok) return;

    expect(result.value).toEqual({
      modelCode: 'LTTA',
      brand: 'Lynx',
      modelYear: 2026,
      modelName: 'Rave',
      package: 'RE',
      engineToken: '600R E-TEC',
      trackToken: '129in 3300mm',
      starterToken: '',
      displayToken: '',
      optionModifiers: null,
      color: 'Black',
      price: 18990.5,
      currency: 'EUR',
      market: 'FI',
    });
  });

  it('reports each invalid field on its own line', () => {
    const result = parsePriceListRow({ ...rawRow, modelCode: '', currency: 'EURO' });
    expect(result.ok).toBe(false);
    if (result.ok) return;

    expect(result.error.split('\n')).toEqual([
      'Invalid price-list row:',
      '- modelCode: modelCode is required',
      '- currency: currency must be an ISO 4217 code',
    ]);
  });
});

describe('parseBaseModelTemplate', () => {
  it('rejects option entries without a token', () => {
    const result = parseBaseModelTemplate({
      brand: 'Lynx',
      modelFamily: 'Rave RE',
      modelYear: 2026,
      category: 'performance',
      platform: { weight: 230 },
      optionSets: { engine: [{ token: ' ', attributes: {} }] },
    });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toContain('- optionSets.engine.0.token: option token must not be empty');
  });

  it('rejects unknown axes', () => {
    const result = parseBaseModelTemplate({
      brand: 'Lynx',
      modelFamily: 'Rave RE',
      modelYear: 2026,
      category: 'performance',
      platform: {},
      optionSets: { seat: [{ token: '2-up', attributes: {} }] },
    });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toContain('- optionSets.seat: Unknown variant axis: seat');
  });

  it('defaults option attributes and option-sets', () => {
    const result = parseBaseModelTemplate({
      brand: 'Ski-Doo',
      modelFamily: 'Summit X',
      modelYear: 2025,
      category: 'deep_snow',
      platform: { weight: 210 },
    });
    expect(result).toEqual({
      ok: true,
      value: {
        brand: 'Ski-Doo',
        modelFamily: 'Summit X',
        modelYear: 2025,
        category: 'deep_snow',
        platform: { weight: 210 },
        optionSets: {},
      },
    });
  });
});

describe('modifier schemas', () => {
  it('accepts nested delta values', () => {
    const result = parseFieldDeltas([
      { path: 'track.profile', op: 'replace', value: { lug: 1.6, unit: 'in' } },
      { path: 'features', op: 'merge', value: ['heated grips'] },
    ]);
    expect(result.ok).toBe(true);
  });

  it('rejects malformed paths', () => {
    const result = parseFieldDeltas([{ path: 'track..profile', op: 'replace', value: 1 }]);
    expect(result.ok).toBe(false);
  });

  it('rejects paths through prototype keys', () => {
    expect(parseFieldDeltas([{ path: '__proto__.polluted', op: 'replace', value: 1 }])).toEqual({
      ok: false,
      error: 'Invalid field deltas:\n- 0.path: path must not name __proto__, prototype or constructor',
    });
    expect(parseFieldDeltas([{ path: 'engine.prototype', op: 'merge', value: 1 }]).ok).toBe(false);
  });

  it('keeps registry confidence within 0.5 and 1', () => {
    const base = {
      brand: 'Lynx',
      modifierName: 'Black edition',
      category: 'color',
      deltas: [{ path: 'color.name', op: 'replace', value: 'Black' }],
      provenance: 'registry',
    };
    expect(parseOptionModifierRecord({ ...base, confidence: 0.92 }).ok).toBe(true);
    expect(parseOptionModifierRecord({ ...base, confidence: 0.4 }).ok).toBe(false);
  });
});
