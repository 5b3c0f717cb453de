/**
 * Lookup Index
 *
 * Finds the base model template for a price-list row: exact key first,
 * then the semantic matcher over the brand's model families.
 */

import type {
  BaseModelMatch,
  BaseModelTemplate,
  CatalogCollaborator,
  Logger,
  LookupMethod,
  SemanticResolver,
} from '@snowmatch/core';
import { createLookupKey } from '@snowmatch/entity-resolution/keys';
import type { EngineConfig } from '../config/index.js';
import { ReconciliationError } from '../errors/index.js';

export interface LookupResult {
  template: BaseModelTemplate | null;
  method: LookupMethod;
  confidence: number;
  /** Key built from the row */
  lookupKey: string;
  /** Key of the template that was found, if any */
  matchedKey: string | null;
  /** Family name and confidence the semantic matcher proposed */
  proposedName?: string | null;
  proposedConfidence?: number;
  candidates?: string[];
  /** Resolver or validation problem that turned the fallback into a miss */
  error?: string;
}

export class LookupIndex {
  constructor(
    private readonly catalog: CatalogCollaborator,
    private readonly resolver: SemanticResolver,
    private readonly config: EngineConfig['lookup'],
    private readonly logger: Logger
  ) {}

  /**
   * @throws ReconciliationError CATALOG_UNAVAILABLE when the catalog fails
   */
  async findBaseModel(
    brand: string,
    modelName: string,
    packageName: string,
    modelYear: number
  ): Promise<LookupResult> {
    const lookupKey = createLookupKey({ brand, modelName, package: packageName, modelYear });

    const exact = await this.getTemplate(lookupKey);
    if (exact) {
      return {
        template: exact,
        method: 'exact_lookup',
        confidence: this.config.exactConfidence,
        lookupKey,
        matchedKey: lookupKey,
      };
    }

    const candidates = await this.listCandidates(brand, modelYear);
    const unmatched: LookupResult = {
      template: null,
      method: 'unmatched',
      confidence: 0,
      lookupKey,
      matchedKey: null,
      candidates,
    };

    if (candidates.length === 0) {
      return unmatched;
    }

    const targetName = [modelName, packageName].filter((part) => part.trim().length > 0).join(' ');

    let match: BaseModelMatch;
    try {
      match = await this.resolver.matchBaseModel(brand, targetName, candidates);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.warn('Semantic base-model match failed; treating as miss', {
        lookupKey,
        error: message,
      });
      return { ...unmatched, error: message };
    }

    const proposed: LookupResult = {
      ...unmatched,
      proposedName: match.name,
      proposedConfidence: match.confidence,
    };

    if (match.name === null || !(match.confidence >= this.config.semanticFloor)) {
      return proposed;
    }

    const matchedKey = createLookupKey({ brand, modelName: match.name, modelYear });
    const template = await this.getTemplate(matchedKey);
    if (!template) {
      return { ...proposed, error: `Proposed model family "${match.name}" is not in the catalog` };
    }

    return {
      template,
      method: 'semantic_match',
      confidence: match.confidence,
      lookupKey,
      matchedKey,
      proposedName: match.name,
      proposedConfidence: match.confidence,
      candidates,
    };
  }

  private async getTemplate(key: string): Promise<BaseModelTemplate | null> {
    try {
      return await this.catalog.getBaseModel(key);
    } catch (err) {
      throw catalogUnavailable(err, { lookupKey: key });
    }
  }

  private async listCandidates(brand: string, modelYear: number): Promise<string[]> {
    try {
      return await this.catalog.listCandidates(brand, modelYear);
    } catch (err) {
      throw catalogUnavailable(err, { brand, modelYear });
    }
  }
}

function catalogUnavailable(err: unknown, context: Record<string, unknown>): ReconciliationError {
  return new ReconciliationError({
    code: 'CATALOG_UNAVAILABLE',
    message: `Catalog lookup failed: ${err instanceof Error ? err.message : String(err)}`,
    suggestion: 'Check the catalog source; no row can be reconciled without it.',
    cause: err instanceof Error ? err : undefined,
    context,
  });
}
