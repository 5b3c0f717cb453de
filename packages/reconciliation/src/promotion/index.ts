export { ModifierPromoter } from './modifier-promoter.js';
export type { PromotionOptions, PromotionResult, PromotionSource, SkippedPromotion } from './modifier-promoter.js';
