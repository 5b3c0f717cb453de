import { describe, expect, it } from 'vitest';
import { ResolverError, leafPaths, stableStringify } from '@snowmatch/core';
import type { CatalogCollaborator, FinalProductRecord } from '@snowmatch/core';
import { ReconciliationEngine } from '../src/pipeline/reconciliation-engine.js';
import { ReconciliationError } from '../src/errors/index.js';
import { InMemoryCatalog } from '../src/stores/in-memory-catalog.js';
import { InMemoryModifierRegistry } from '../src/stores/in-memory-registry.js';
import {
  FakeResolver,
  adventureTemplate,
  blackEditionEntry,
  fastConfig,
  makeRow,
  raveTemplate,
} from './fixtures.js';

const fixedNow = () => new Date('2026-01-15T08:00:00.000Z');

function createEngine(
  resolver = new FakeResolver(),
  registry = new InMemoryModifierRegistry(),
  catalog: CatalogCollaborator = new InMemoryCatalog([raveTemplate, adventureTemplate])
) {
  return new ReconciliationEngine({ catalog, registry, resolver, now: fixedNow }, fastConfig);
}

function withoutTimestamp(record: FinalProductRecord): Omit<FinalProductRecord, 'processedAt'> {
  const { processedAt: _processedAt, ...rest } = record;
  return rest;
}

describe('ReconciliationEngine', () => {
  describe('row with an exact catalog match and no modifiers', () => {
    it('populates engine and track from the matched options and auto-accepts', async () => {
      const record = await createEngine().reconcile(makeRow());

      expect(record.spec.engine).toEqual({
        displacement: 599.4,
        type: '2-stroke',
        powerHp: 125,
        token: '600R E-TEC',
      });
      expect(record.spec.track).toEqual({ length: 3300, width: 406, lug: 38, token: '129in' });
      expect(record.auditTrail.filter((e) => e.stage === 'option_modifiers')).toHaveLength(0);
      expect(record.modifiers).toEqual([]);
      expect(record.confidenceScore).toBeGreaterThanOrEqual(0.9);
      expect(record.validationStatus).toBe('passed');
      expect(record.autoAccepted).toBe(true);
      expect(record.identity.baseModelKey).toBe('LYNX_RAVE_RE_2026');
    });

    it('records every stage in order', async () => {
      const record = await createEngine().reconcile(makeRow());

      expect(record.auditTrail.map((e) => e.stage)).toEqual([
        'lookup',
        'inheritance',
        'variant_selection',
        'variant_selection',
        'variant_selection',
        'variant_selection',
        'variant_selection',
        'technical_check',
        'business_check',
        'semantic_check',
        'decision',
      ]);
      expect(record.auditTrail[0]).toMatchObject({
        decision: 'exact_lookup LYNX_RAVE_RE_2026',
        confidenceContribution: 0.98,
      });
      expect(record.scoreBreakdown).toMatchObject({
        technical: 1,
        business: 1,
        semantic: 0.95,
        matching: 0.98,
        modifiers: 1,
      });
      expect(record.scoreBreakdown?.variants).toBeCloseTo(0.99, 10);
      expect(record.processedAt).toBe('2026-01-15T08:00:00.000Z');
    });
  });

  describe('row with an unknown spring option', () => {
    const resolver = () =>
      new FakeResolver({
        modifiers: {
          'Black edition': {
            deltas: [{ path: 'color.name', op: 'replace', value: 'Black' }],
            confidence: 0.9,
            category: 'color',
          },
        },
      });

    it('resolves the token externally with the penalty and still completes', async () => {
      const record = await createEngine(resolver()).reconcile(makeRow({ optionModifiers: 'Black edition' }));

      const external = record.auditTrail.filter((e) => e.resolutionMethod === 'external');
      expect(external).toHaveLength(1);
      expect(external[0]?.confidenceContribution).toBeCloseTo(0.85, 10);
      expect(record.modifiers[0]).toMatchObject({
        token: 'Black edition',
        resolutionMethod: 'external',
        fieldsChanged: ['color.name'],
        rawConfidence: 0.9,
      });
      expect(record.spec.color).toEqual({ name: 'Black' });
      expect(record.validationStatus).not.toBe('failed');
    });

    it('does not write the external result to the registry', async () => {
      const registry = new InMemoryModifierRegistry();
      await createEngine(resolver(), registry).reconcile(makeRow({ optionModifiers: 'Black edition' }));
      expect(registry.list()).toEqual([]);
    });
  });

  describe('row without a base model', () => {
    it('fails with no_base_model_match and a single audit entry', async () => {
      const resolver = new FakeResolver({ baseModel: { name: 'Rave RE', confidence: 0.4 } });
      const record = await createEngine(resolver).reconcile(
        makeRow({ modelName: 'Nonexistent Model', package: '', optionModifiers: 'Black edition' })
      );

      expect(record.validationStatus).toBe('failed');
      expect(record.failureReason).toBe('no_base_model_match');
      expect(record.autoAccepted).toBe(false);
      expect(record.auditTrail).toHaveLength(1);
      expect(record.auditTrail[0]).toMatchObject({
        stage: 'lookup',
        decision: 'unmatched LYNX_NONEXISTENT_MODEL_2026',
        confidenceContribution: 0,
        inputs: { proposedName: 'Rave RE', proposedConfidence: 0.4, candidates: ['Rave RE', 'Adventure LX'] },
      });
      expect(resolver.callsTo('resolveModifier')).toBe(0);
      expect(resolver.callsTo('checkConsistency')).toBe(0);
    });

    it('accepts a semantic match above the floor', async () => {
      const resolver = new FakeResolver({ baseModel: { name: 'Rave RE', confidence: 0.82 } });
      const record = await createEngine(resolver).reconcile(makeRow({ modelName: 'Rave Racing Edition', package: '' }));

      expect(record.auditTrail[0]).toMatchObject({
        decision: 'semantic_match LYNX_RAVE_RE_2026',
        confidenceContribution: 0.82,
      });
      expect(record.scoreBreakdown?.matching).toBe(0.82);
    });
  });

  it('fails structurally incomplete records regardless of score', async () => {
    const catalog = new InMemoryCatalog([{ ...raveTemplate, platform: { chassis: 'Radien2' } }]);
    const record = await createEngine(new FakeResolver(), undefined, catalog).reconcile(makeRow());

    expect(record.hardViolations).toEqual(['missing mandatory field: weight']);
    expect(record.validationStatus).toBe('failed');
    expect(record.failureReason).toBe('missing_mandatory_fields');
    expect(record.auditTrail.map((e) => e.stage).slice(-4)).toEqual([
      'technical_check',
      'business_check',
      'semantic_check',
      'decision',
    ]);
  });

  it('fails a row whose track cannot be selected', async () => {
    const record = await createEngine().reconcile(makeRow({ trackToken: '154in' }));

    expect(record.spec.track).toBeNull();
    expect(record.warnings).toContain('track: no option matches "154in" (options: 129in, 137in)');
    expect(record.validationStatus).toBe('failed');
    expect(record.hardViolations).toEqual(['missing mandatory field: track.length']);
  });

  it('sends a plausible but unconfirmed row to review', async () => {
    const record = await createEngine(new FakeResolver({ consistency: 0.7 })).reconcile(makeRow());

    expect(record.validationStatus).toBe('requires_review');
    expect(record.autoAccepted).toBe(false);
    expect(record.failureReason).toBeNull();
  });

  it('rejects malformed rows without calling collaborators', async () => {
    const resolver = new FakeResolver();
    const engine = createEngine(resolver);

    await expect(engine.reconcile(makeRow({ modelCode: '' }))).rejects.toBeInstanceOf(ReconciliationError);
    expect(resolver.calls).toHaveLength(0);
  });

  it('propagates catalog failures', async () => {
    const catalog: CatalogCollaborator = {
      getBaseModel: async () => {
        throw new Error('connection refused');
      },
      listCandidates: async () => [],
    };
    const engine = createEngine(new FakeResolver(), undefined, catalog);

    await expect(engine.reconcile(makeRow())).rejects.toMatchObject({
      name: 'ReconciliationError',
      code: 'CATALOG_UNAVAILABLE',
    });
  });

  it('degrades when the consistency check times out', async () => {
    const resolver = new FakeResolver({
      consistency: new ResolverError({ code: 'TIMEOUT', message: 'took too long' }),
    });
    const record = await createEngine(resolver).reconcile(makeRow());

    expect(record.scoreBreakdown?.semantic).toBe(0.5);
    expect(record.warnings).toContain('semantic check unavailable: took too long');
    expect(record.auditTrail.find((e) => e.stage === 'semantic_check')?.decision).toBe(
      'resolver unavailable; fallback score used'
    );
  });

  describe('properties', () => {
    it('is idempotent apart from the timestamp', async () => {
      const registry = new InMemoryModifierRegistry([blackEditionEntry]);
      const row = makeRow({ optionModifiers: 'Black edition, heated seat', trackToken: '137' });
      const resolver = new FakeResolver({
        modifiers: {
          'heated seat': {
            deltas: [{ path: 'features', op: 'merge', value: 'heated seat' }],
            confidence: 0.8,
            category: 'feature',
          },
        },
      });

      const engine = new ReconciliationEngine({
        catalog: new InMemoryCatalog([raveTemplate]),
        registry,
        resolver,
      });
      const first = await engine.reconcile(row);
      const second = await engine.reconcile(row);

      expect(stableStringify(withoutTimestamp(second))).toBe(stableStringify(withoutTimestamp(first)));
    });

    it('never lowers the score when an unresolved modifier enters the registry', async () => {
      const registry = new InMemoryModifierRegistry();
      const engine = createEngine(new FakeResolver(), registry);
      const row = makeRow({ optionModifiers: 'Black edition' });

      const before = await engine.reconcile(row);
      expect(before.modifiers[0]?.resolutionMethod).toBe('unresolved');

      await registry.upsertModifier(blackEditionEntry);
      const after = await engine.reconcile(row);

      expect(after.modifiers[0]?.resolutionMethod).toBe('registry');
      expect(after.confidenceScore).toBeGreaterThanOrEqual(before.confidenceScore);
    });

    it('keeps every template field after inheritance', async () => {
      const record = await createEngine().reconcile(makeRow({ optionModifiers: null }));
      const specPaths = new Set(leafPaths(record.spec));
      for (const path of leafPaths(raveTemplate.platform)) {
        expect(specPaths.has(path)).toBe(true);
      }
    });

    it('holds autoAccepted iff score >= 0.95 and passed', async () => {
      const engine = createEngine(
        new FakeResolver({
          modifiers: {
            'Black edition': { deltas: [], confidence: 0.6, category: 'color' },
          },
        })
      );
      const rows = [
        makeRow(),
        makeRow({ trackToken: '137' }),
        makeRow({ optionModifiers: 'Black edition, Unknown kit' }),
        makeRow({ engineToken: 'E-TEC' }),
        makeRow({ price: 900000 }),
        makeRow({ modelName: 'Missing' }),
      ];

      for (const row of rows) {
        const record = await engine.reconcile(row);
        expect(record.autoAccepted).toBe(record.confidenceScore >= 0.95 && record.validationStatus === 'passed');
      }
    });
  });
});
