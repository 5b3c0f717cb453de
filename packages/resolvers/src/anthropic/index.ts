export { AnthropicSemanticResolver, createAnthropicResolver, DEFAULT_ANTHROPIC_MODEL } from './anthropic-resolver.js';
export type { AnthropicResolverConfig } from './anthropic-resolver.js';
export { toResolverError } from './errors.js';
export {
  CHECK_CONSISTENCY_TOOL,
  MATCH_BASE_MODEL_TOOL,
  RESOLVE_MODIFIER_TOOL,
} from './tools.js';
