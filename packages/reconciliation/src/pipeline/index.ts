export { ReconciliationEngine } from './reconciliation-engine.js';
export type { EngineDependencies } from './reconciliation-engine.js';
export { BatchProcessor, summarize, reviewReason } from './batch-processor.js';
export type { BatchResult, BatchSummary, BatchProcessorOptions } from './batch-processor.js';
export { describeRow } from './row-text.js';
