export {
  engineConfigSchema,
  externalCallSchema,
  mandatoryFieldSchema,
  resolveEngineConfig,
  DEFAULT_MANDATORY_FIELDS,
  DEFAULT_CATEGORY_TRACK_LENGTH,
  DEFAULT_MARKETS,
} from './engine-config.js';
export type { EngineConfig, EngineConfigInput, ExternalCallConfig, MandatoryField } from './engine-config.js';
