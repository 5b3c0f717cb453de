/**
 * Confidence Validator
 *
 * PENDING -> TECH_CHECK -> BUSINESS_CHECK -> SEMANTIC_CHECK -> PASSED | FAILED | REQUIRES_REVIEW
 *
 * Every check runs; a hard structural violation forces FAILED once the
 * score is known.
 */

import type {
  AuditEntry,
  FailureReason,
  Logger,
  ModifierApplication,
  ScoreBreakdown,
  SemanticResolver,
  ValidationStatus,
  WorkingProductRecord,
} from '@snowmatch/core';
import type { EngineConfig } from '../config/index.js';
import { runBusinessCheck } from './business-check.js';
import { ConfidenceScorer } from './confidence-scorer.js';
import { runSemanticCheck } from './semantic-check.js';
import { runTechnicalCheck } from './technical-check.js';

export type ValidatorState =
  | 'pending'
  | 'tech_check'
  | 'business_check'
  | 'semantic_check'
  | 'passed'
  | 'failed'
  | 'requires_review';

const TRANSITIONS: Record<ValidatorState, readonly ValidatorState[]> = {
  pending: ['tech_check'],
  tech_check: ['business_check'],
  business_check: ['semantic_check'],
  semantic_check: ['passed', 'failed', 'requires_review'],
  passed: [],
  failed: [],
  requires_review: [],
};

class ValidatorStateMachine {
  private current: ValidatorState = 'pending';
  readonly history: ValidatorState[] = ['pending'];

  transition(next: ValidatorState): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new Error(`Illegal validator transition ${this.current} -> ${next}`);
    }
    this.current = next;
    this.history.push(next);
  }
}

export interface ValidationInput {
  record: WorkingProductRecord;
  applications: readonly ModifierApplication[];
  originalText: string;
  matchingConfidence: number;
  variantConfidence: number;
  modifierConfidence: number;
}

export interface ValidationOutcome {
  status: Exclude<ValidationStatus, 'pending'>;
  autoAccepted: boolean;
  score: number;
  breakdown: ScoreBreakdown;
  failureReason: FailureReason | null;
  hardViolations: string[];
  warnings: string[];
  auditEntries: AuditEntry[];
  states: ValidatorState[];
}

export interface Decision {
  status: Exclude<ValidationStatus, 'pending'>;
  autoAccepted: boolean;
  failureReason: FailureReason | null;
}

/**
 * Status from score and structural state:
 * auto-accepted (passed) at or above the auto-accept threshold,
 * requires_review at or above the review threshold, failed otherwise
 * or whenever a hard violation exists.
 */
export function decideStatus(
  score: number,
  hasHardViolation: boolean,
  thresholds: { autoAcceptThreshold: number; reviewThreshold: number }
): Decision {
  if (hasHardViolation) {
    return { status: 'failed', autoAccepted: false, failureReason: 'missing_mandatory_fields' };
  }
  if (score >= thresholds.autoAcceptThreshold) {
    return { status: 'passed', autoAccepted: true, failureReason: null };
  }
  if (score >= thresholds.reviewThreshold) {
    return { status: 'requires_review', autoAccepted: false, failureReason: null };
  }
  return { status: 'failed', autoAccepted: false, failureReason: 'below_review_threshold' };
}

export class ConfidenceValidator {
  private readonly scorer: ConfidenceScorer;

  constructor(
    private readonly resolver: SemanticResolver,
    private readonly config: Pick<EngineConfig, 'validation' | 'business'>,
    private readonly logger: Logger
  ) {
    this.scorer = new ConfidenceScorer(config.validation.weights);
  }

  async validate(input: ValidationInput): Promise<ValidationOutcome> {
    const { record } = input;
    const { validation } = this.config;
    const machine = new ValidatorStateMachine();
    const auditEntries: AuditEntry[] = [];
    const warnings: string[] = [];

    machine.transition('tech_check');
    const technical = runTechnicalCheck(record, validation.mandatoryFields);
    warnings.push(...technical.warnings);
    auditEntries.push({
      stage: 'technical_check',
      decision:
        technical.hardViolations.length > 0
          ? `${technical.valid.length}/${validation.mandatoryFields.length} mandatory fields valid; ${technical.hardViolations.join('; ')}`
          : `${technical.valid.length}/${validation.mandatoryFields.length} mandatory fields valid`,
      inputs: {
        missing: technical.missing,
        defaulted: technical.defaulted,
        invalid: technical.invalid,
      },
      confidenceContribution: technical.score,
    });

    machine.transition('business_check');
    const business = runBusinessCheck(record, input.applications, this.config.business);
    warnings.push(...business.violations.map((v) => v.message));
    auditEntries.push({
      stage: 'business_check',
      decision:
        business.violations.length === 0
          ? 'all business rules passed'
          : `${business.violations.length} rule violation(s): ${business.violations.map((v) => v.rule).join(', ')}`,
      inputs: { violations: business.violations },
      confidenceContribution: business.score,
    });

    machine.transition('semantic_check');
    const semantic = await runSemanticCheck(
      this.resolver,
      record,
      input.originalText,
      validation.semanticFallbackScore,
      this.logger
    );
    if (semantic.usedFallback) {
      warnings.push(`semantic check unavailable: ${semantic.error ?? 'unknown error'}`);
    }
    auditEntries.push({
      stage: 'semantic_check',
      decision: semantic.usedFallback ? 'resolver unavailable; fallback score used' : 'consistency scored by resolver',
      inputs: { originalText: input.originalText, ...(semantic.error ? { error: semantic.error } : {}) },
      confidenceContribution: semantic.score,
    });

    const breakdown: ScoreBreakdown = {
      technical: technical.score,
      business: business.score,
      semantic: semantic.score,
      matching: input.matchingConfidence,
      variants: input.variantConfidence,
      modifiers: input.modifierConfidence,
    };
    const score = this.scorer.score(breakdown);
    const decision = decideStatus(score, technical.hardViolations.length > 0, validation);
    machine.transition(decision.status);

    auditEntries.push({
      stage: 'decision',
      decision: decision.autoAccepted ? `${decision.status} (auto-accepted)` : decision.status,
      inputs: {
        breakdown,
        autoAcceptThreshold: validation.autoAcceptThreshold,
        reviewThreshold: validation.reviewThreshold,
        hardViolations: technical.hardViolations,
      },
      confidenceContribution: score,
    });

    return {
      ...decision,
      score,
      breakdown,
      hardViolations: technical.hardViolations,
      warnings,
      auditEntries,
      states: machine.history,
    };
  }
}
