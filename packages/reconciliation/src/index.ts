/**
 * @snowmatch/reconciliation
 *
 * Price-list row reconciliation: lookup, inheritance, variant
 * selection, option modifiers and confidence validation.
 */

export * from './config/index.js';
export * from './errors/index.js';
export * from './lookup/index.js';
export * from './inheritance/index.js';
export * from './variants/index.js';
export * from './modifiers/index.js';
export * from './validation/index.js';
export * from './pipeline/index.js';
export * from './promotion/index.js';
export * from './stores/index.js';
export * from './formatters/index.js';
export * from './runtime/index.js';
