/**
 * Reconciliation Engine
 *
 * Runs one price-list row through lookup, inheritance, variant
 * selection, option modifiers and validation, and returns the final
 * record with its audit trail.
 */

import { createSilentLogger, leafPaths, parsePriceListRow } from '@snowmatch/core';
import type {
  AuditEntry,
  CatalogCollaborator,
  FailureReason,
  FinalProductRecord,
  Logger,
  ModifierRegistry,
  PriceListRow,
  SemanticResolver,
  WorkingProductRecord,
} from '@snowmatch/core';
import { resolveEngineConfig } from '../config/index.js';
import type { EngineConfig, EngineConfigInput } from '../config/index.js';
import { ReconciliationError } from '../errors/index.js';
import { inherit } from '../inheritance/index.js';
import { LookupIndex } from '../lookup/index.js';
import type { LookupResult } from '../lookup/index.js';
import { OptionDeltaResolver } from '../modifiers/index.js';
import { GuardedSemanticResolver } from '../runtime/index.js';
import { ConfidenceValidator } from '../validation/index.js';
import { VariantSelector } from '../variants/index.js';
import { describeRow } from './row-text.js';

export interface EngineDependencies {
  catalog: CatalogCollaborator;
  registry: ModifierRegistry;
  resolver: SemanticResolver;
  logger?: Logger;
  /** Clock for `processedAt` */
  now?: () => Date;
}

export class ReconciliationEngine {
  readonly config: EngineConfig;

  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly lookupIndex: LookupIndex;
  private readonly variantSelector: VariantSelector;
  private readonly deltaResolver: OptionDeltaResolver;
  private readonly validator: ConfidenceValidator;

  constructor(deps: EngineDependencies, config?: EngineConfigInput) {
    this.config = resolveEngineConfig(config);
    this.logger = deps.logger ?? createSilentLogger();
    this.now = deps.now ?? (() => new Date());

    const resolver = new GuardedSemanticResolver(deps.resolver, this.config.external, { logger: this.logger });

    this.lookupIndex = new LookupIndex(deps.catalog, resolver, this.config.lookup, this.logger);
    this.variantSelector = new VariantSelector(this.config.variants.methodConfidence, this.logger);
    this.deltaResolver = new OptionDeltaResolver(deps.registry, resolver, this.config.modifiers, this.logger);
    this.validator = new ConfidenceValidator(resolver, this.config, this.logger);
  }

  /**
   * Reconcile one row.
   *
   * @throws ReconciliationError INVALID_ROW when the row fails validation
   * @throws ReconciliationError CATALOG_UNAVAILABLE / REGISTRY_UNAVAILABLE
   *   when a store cannot be reached
   */
  async reconcile(input: PriceListRow): Promise<FinalProductRecord> {
    const row = this.validateRow(input);
    const log = this.logger.child({ modelCode: row.modelCode });

    const lookup = await this.lookupIndex.findBaseModel(
      row.brand,
      row.modelName,
      row.package,
      row.modelYear
    );
    const lookupEntry = this.lookupAudit(lookup);

    if (!lookup.template || !lookup.matchedKey) {
      log.debug('Row failed: no base model match', { lookupKey: lookup.lookupKey });
      return this.unmatchedRecord(row, lookup, lookupEntry);
    }

    const auditTrail: AuditEntry[] = [lookupEntry];

    const record = inherit(lookup.template, row, lookup.matchedKey);
    auditTrail.push({
      stage: 'inheritance',
      decision: `inherited ${lookup.template.brand} ${lookup.template.modelFamily} ${lookup.template.modelYear}`,
      inputs: {
        baseModelKey: lookup.matchedKey,
        platformFields: leafPaths(record.spec).length,
        optionAxes: Object.keys(record.optionSets),
      },
      confidenceContribution: 1,
    });

    const variants = this.variantSelector.selectVariants(record, row);
    for (const resolution of variants.resolutions) {
      auditTrail.push({
        stage: 'variant_selection',
        decision:
          resolution.selectedToken !== null
            ? `${resolution.axis}: ${resolution.method} -> ${resolution.selectedToken}`
            : `${resolution.axis}: ${resolution.method}`,
        inputs: { rowToken: resolution.rowToken, candidates: resolution.candidates },
        confidenceContribution: resolution.confidence,
      });
    }

    const modifiers = await this.deltaResolver.applyModifiers(record, row.optionModifiers);
    for (const application of modifiers.applications) {
      auditTrail.push({
        stage: 'option_modifiers',
        decision:
          application.resolutionMethod === 'unresolved'
            ? `${application.token}: unresolved`
            : `${application.token}: ${application.resolutionMethod}, ${application.fieldsChanged.length} field(s) changed`,
        inputs: {
          token: application.token,
          fieldsChanged: application.fieldsChanged,
          rawConfidence: application.rawConfidence,
          ...(application.error ? { error: application.error } : {}),
        },
        confidenceContribution: application.confidence,
        resolutionMethod: application.resolutionMethod,
      });
    }

    const outcome = await this.validator.validate({
      record,
      applications: modifiers.applications,
      originalText: describeRow(row),
      matchingConfidence: lookup.confidence,
      variantConfidence: variants.confidence,
      modifierConfidence: modifiers.confidence,
    });
    auditTrail.push(...outcome.auditEntries);

    log.debug('Row reconciled', {
      status: outcome.status,
      score: outcome.score,
      autoAccepted: outcome.autoAccepted,
    });

    return {
      ...record,
      confidenceScore: outcome.score,
      validationStatus: outcome.status,
      autoAccepted: outcome.autoAccepted,
      failureReason: outcome.failureReason,
      scoreBreakdown: outcome.breakdown,
      hardViolations: outcome.hardViolations,
      warnings: [...variants.warnings, ...outcome.warnings],
      modifiers: modifiers.applications,
      auditTrail,
      processedAt: this.now().toISOString(),
    };
  }

  private validateRow(input: PriceListRow): PriceListRow {
    const parsed = parsePriceListRow(input);
    if (!parsed.ok) {
      throw new ReconciliationError({
        code: 'INVALID_ROW',
        message: parsed.error,
        suggestion: 'Fix the row at its source; malformed rows are not retried.',
        context: { modelCode: input.modelCode },
      });
    }
    return parsed.value;
  }

  private lookupAudit(lookup: LookupResult): AuditEntry {
    const decision =
      lookup.method === 'unmatched'
        ? `unmatched ${lookup.lookupKey}`
        : `${lookup.method} ${lookup.matchedKey ?? lookup.lookupKey}`;

    const inputs: Record<string, unknown> = { lookupKey: lookup.lookupKey };
    if (lookup.candidates) inputs.candidates = lookup.candidates;
    if (lookup.proposedName !== undefined) inputs.proposedName = lookup.proposedName;
    if (lookup.proposedConfidence !== undefined) inputs.proposedConfidence = lookup.proposedConfidence;
    if (lookup.error) inputs.error = lookup.error;

    return {
      stage: 'lookup',
      decision,
      inputs,
      confidenceContribution: lookup.template ? lookup.confidence : 0,
    };
  }

  /**
   * Failed record for a row that did not pass input validation. Nothing
   * past validation ran, so the only audit entry names the issues.
   */
  rejectRow(input: PriceListRow, error: ReconciliationError): FinalProductRecord {
    const issues = error.message
      .split('\n')
      .slice(1)
      .map((line) => line.replace(/^- /, ''));

    return this.failedRecord(input, 'invalid_row', {
      hardViolations: issues,
      warnings: [],
      auditEntry: {
        stage: 'row_validation',
        decision: 'rejected',
        inputs: { modelCode: input.modelCode, issues },
        confidenceContribution: 0,
      },
    });
  }

  /**
   * Fatal-for-row outcome: only the lookup ran.
   */
  private unmatchedRecord(
    row: PriceListRow,
    lookup: LookupResult,
    lookupEntry: AuditEntry
  ): FinalProductRecord {
    return this.failedRecord(row, 'no_base_model_match', {
      hardViolations: [],
      warnings: [`no base model found for ${lookup.lookupKey}`],
      auditEntry: lookupEntry,
    });
  }

  private failedRecord(
    row: PriceListRow,
    failureReason: FailureReason,
    details: { hardViolations: string[]; warnings: string[]; auditEntry: AuditEntry }
  ): FinalProductRecord {
    const working: WorkingProductRecord = {
      identity: {
        modelCode: row.modelCode,
        brand: row.brand,
        modelYear: row.modelYear,
        modelFamily: [row.modelName, row.package].filter((p) => typeof p === 'string' && p.trim().length > 0).join(' '),
        category: null,
        baseModelKey: null,
        price: row.price,
        currency: row.currency,
        market: row.market,
      },
      spec: {},
      optionSets: {},
      axes: {},
    };

    return {
      ...working,
      confidenceScore: 0,
      validationStatus: 'failed',
      autoAccepted: false,
      failureReason,
      scoreBreakdown: null,
      hardViolations: details.hardViolations,
      warnings: details.warnings,
      modifiers: [],
      auditTrail: [details.auditEntry],
      processedAt: this.now().toISOString(),
    };
  }
}
