/**
 * In-memory modifier registry.
 *
 * Writes for the same (brand, modifier name, [family], [year]) are serialized
 * through a write queue; an upsert on an existing key bumps `timesSeen`
 * and keeps the higher confidence.
 */

import { CollaboratorError, WriteQueue, deepClone, parseOptionModifierRecord } from '@snowmatch/core';
import type { ModifierRegistry, ModifierScope, OptionModifierRecord } from '@snowmatch/core';

export function registryKey(
  record: Pick<OptionModifierRecord, 'brand' | 'modifierName' | 'modelFamily' | 'modelYear'>
): string {
  return [
    record.brand.trim().toLowerCase(),
    record.modifierName.trim().toLowerCase(),
    record.modelFamily?.trim().toLowerCase() ?? '*',
    record.modelYear ?? '*',
  ].join('|');
}

/**
 * Specificity of an entry for a scope, or -1 when it does not apply.
 * Family beats year; brand-wide entries score 0.
 */
export function scopeSpecificity(entry: OptionModifierRecord, scope: ModifierScope | undefined): number {
  let specificity = 0;

  if (entry.modelFamily !== undefined) {
    if (entry.modelFamily.toLowerCase() !== scope?.modelFamily?.toLowerCase()) return -1;
    specificity += 2;
  }

  if (entry.modelYear !== undefined) {
    if (entry.modelYear !== scope?.modelYear) return -1;
    specificity += 1;
  }

  return specificity;
}

/**
 * Merge an incoming record into an existing one with the same key.
 */
export function mergeModifierRecords(
  existing: OptionModifierRecord,
  incoming: OptionModifierRecord
): OptionModifierRecord {
  const incomingWins = incoming.confidence >= existing.confidence;
  return {
    ...(incomingWins ? incoming : existing),
    confidence: Math.max(existing.confidence, incoming.confidence),
    timesSeen: (existing.timesSeen ?? 1) + (incoming.timesSeen ?? 1),
    createdAt: existing.createdAt ?? incoming.createdAt,
    updatedAt: incoming.updatedAt ?? existing.updatedAt,
  };
}

/**
 * Most specific applicable entry; ties go to the entry added first.
 */
export function pickModifier(
  entries: Iterable<OptionModifierRecord>,
  brand: string,
  name: string,
  scope?: ModifierScope
): OptionModifierRecord | null {
  const wantedBrand = brand.trim().toLowerCase();
  const wantedName = name.trim().toLowerCase();

  let best: OptionModifierRecord | null = null;
  let bestSpecificity = -1;

  for (const entry of entries) {
    if (entry.brand.trim().toLowerCase() !== wantedBrand) continue;
    if (entry.modifierName.trim().toLowerCase() !== wantedName) continue;

    const specificity = scopeSpecificity(entry, scope);
    if (specificity > bestSpecificity) {
      best = entry;
      bestSpecificity = specificity;
    }
  }

  return best;
}

export class InMemoryModifierRegistry implements ModifierRegistry {
  private readonly entries = new Map<string, OptionModifierRecord>();
  private readonly writes = new WriteQueue();

  constructor(records: readonly OptionModifierRecord[] = []) {
    for (const record of records) {
      const key = registryKey(record);
      const existing = this.entries.get(key);
      this.entries.set(key, existing ? mergeModifierRecords(existing, record) : deepClone(record));
    }
  }

  async getModifier(brand: string, name: string, scope?: ModifierScope): Promise<OptionModifierRecord | null> {
    const entry = pickModifier(this.entries.values(), brand, name, scope);
    return entry ? deepClone(entry) : null;
  }

  async upsertModifier(record: OptionModifierRecord): Promise<void> {
    const parsed = parseOptionModifierRecord(record);
    if (!parsed.ok) {
      throw new CollaboratorError({
        code: 'VALIDATION_ERROR',
        message: parsed.error,
        collaborator: 'modifier-registry',
      });
    }

    const key = registryKey(parsed.value);
    await this.writes.enqueue(key, async () => {
      const existing = this.entries.get(key);
      this.entries.set(key, existing ? mergeModifierRecords(existing, parsed.value) : deepClone(parsed.value));
    });
  }

  list(): OptionModifierRecord[] {
    return [...this.entries.values()].map((entry) => deepClone(entry));
  }
}
