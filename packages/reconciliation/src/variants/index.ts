export { VariantSelector, AXIS_TOKEN_FIELD } from './variant-selector.js';
export type { VariantSelectionResult } from './variant-selector.js';
export { matchToken, normalizeToken } from './token-matcher.js';
export type { TokenMatch, TokenMatchMethod } from './token-matcher.js';
