/**
 * JSON Catalog
 * Base model templates from a JSON file: either an array of templates or
 * an object with a `templates` array.
 */

import { CollaboratorError, parseBaseModelTemplate, wrapError } from '@snowmatch/core';
import type { BaseModelTemplate, CatalogCollaborator } from '@snowmatch/core';
import { InMemoryCatalog } from '@snowmatch/reconciliation';
import { BaseFileStore } from './base-file-store.js';
import type { FileStoreConfig } from './base-file-store.js';

export type JsonCatalogConfig = FileStoreConfig;

function templateEntries(parsed: unknown): unknown[] | null {
  if (Array.isArray(parsed)) return parsed;
  if (typeof parsed === 'object' && parsed !== null && 'templates' in parsed && Array.isArray(parsed.templates)) {
    return parsed.templates;
  }
  return null;
}

export class JsonCatalog extends BaseFileStore<JsonCatalogConfig> implements CatalogCollaborator {
  private catalog = new InMemoryCatalog();

  get size(): number {
    return this.catalog.size;
  }

  protected async parseContent(content: string): Promise<void> {
    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw wrapError(error, {
        code: 'VALIDATION_ERROR',
        prefix: `Invalid JSON in ${this.config.filePath}`,
        collaborator: this.config.id,
      });
    }

    const entries = templateEntries(parsed);
    if (!entries) {
      throw new CollaboratorError({
        code: 'VALIDATION_ERROR',
        message: 'Catalog file must contain an array of templates or a "templates" array',
        collaborator: this.config.id,
        suggestion: 'Wrap the templates in [...] or {"templates": [...]}.',
      });
    }

    const templates: BaseModelTemplate[] = [];
    const problems: string[] = [];
    entries.forEach((entry, index) => {
      const result = parseBaseModelTemplate(entry);
      if (result.ok) templates.push(result.value);
      else problems.push(`[${index}] ${result.error}`);
    });

    if (problems.length > 0) {
      throw new CollaboratorError({
        code: 'VALIDATION_ERROR',
        message: `${problems.length} invalid template(s) in ${this.config.filePath}:\n${problems.join('\n')}`,
        collaborator: this.config.id,
        context: { invalid: problems.length, total: entries.length },
      });
    }

    this.catalog = new InMemoryCatalog(templates);
  }

  async getBaseModel(lookupKey: string): Promise<BaseModelTemplate | null> {
    this.ensureConnected();
    return this.catalog.getBaseModel(lookupKey);
  }

  async listCandidates(brand: string, modelYear?: number): Promise<string[]> {
    this.ensureConnected();
    return this.catalog.listCandidates(brand, modelYear);
  }
}

export function createJsonCatalog(config: JsonCatalogConfig): JsonCatalog {
  return new JsonCatalog(config);
}
