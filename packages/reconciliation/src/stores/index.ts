export { InMemoryCatalog, templateKey } from './in-memory-catalog.js';
export {
  InMemoryModifierRegistry,
  registryKey,
  scopeSpecificity,
  mergeModifierRecords,
  pickModifier,
} from './in-memory-registry.js';
