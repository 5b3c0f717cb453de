export { ConfidenceValidator, decideStatus } from './confidence-validator.js';
export type { ValidationInput, ValidationOutcome, ValidatorState, Decision } from './confidence-validator.js';
export { ConfidenceScorer } from './confidence-scorer.js';
export type { ScoreWeights } from './confidence-scorer.js';
export { runTechnicalCheck } from './technical-check.js';
export type { TechnicalCheckResult } from './technical-check.js';
export { runBusinessCheck } from './business-check.js';
export type { BusinessCheckResult, BusinessRuleName, BusinessRuleViolation } from './business-check.js';
export { runSemanticCheck } from './semantic-check.js';
export type { SemanticCheckResult } from './semantic-check.js';
export { readNumber, roundScore } from './values.js';
