export { ReconciliationError } from './reconciliation-error.js';
export type { ReconciliationErrorCode, ReconciliationErrorDetails } from './reconciliation-error.js';
