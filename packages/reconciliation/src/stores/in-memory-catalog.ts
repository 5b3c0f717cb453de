/**
 * In-memory catalog, keyed by normalized lookup key.
 */

import type { BaseModelTemplate, CatalogCollaborator } from '@snowmatch/core';
import { createLookupKey, normalizeLookupKey, normalizeLookupText } from '@snowmatch/entity-resolution/keys';

export function templateKey(template: Pick<BaseModelTemplate, 'brand' | 'modelFamily' | 'modelYear'>): string {
  return createLookupKey({
    brand: template.brand,
    modelName: template.modelFamily,
    modelYear: template.modelYear,
  });
}

export class InMemoryCatalog implements CatalogCollaborator {
  private readonly templates = new Map<string, BaseModelTemplate>();

  constructor(templates: readonly BaseModelTemplate[] = []) {
    for (const template of templates) {
      this.add(template);
    }
  }

  /** Later templates with the same key replace earlier ones */
  add(template: BaseModelTemplate): void {
    this.templates.set(templateKey(template), template);
  }

  get size(): number {
    return this.templates.size;
  }

  async getBaseModel(lookupKey: string): Promise<BaseModelTemplate | null> {
    return this.templates.get(normalizeLookupKey(lookupKey)) ?? null;
  }

  async listCandidates(brand: string, modelYear?: number): Promise<string[]> {
    const wanted = normalizeLookupText(brand);
    const families = new Set<string>();
    for (const template of this.templates.values()) {
      if (normalizeLookupText(template.brand) !== wanted) continue;
      if (modelYear !== undefined && template.modelYear !== modelYear) continue;
      families.add(template.modelFamily);
    }
    return [...families];
  }
}
