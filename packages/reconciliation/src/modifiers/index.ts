export { OptionDeltaResolver, splitModifierText } from './option-delta-resolver.js';
export type { ModifierResult } from './option-delta-resolver.js';
export { applyDeltas } from './delta-applier.js';
