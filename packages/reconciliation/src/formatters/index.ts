export { formatProductRecord, formatBatchResult, formatPromotionResult } from './record-formatter.js';
