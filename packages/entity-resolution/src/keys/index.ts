export {
  normalizeLookupText,
  normalizeLookupKey,
  createLookupKey,
  tokenize,
  extractNumbers,
} from './lookup-key.js';
export type { LookupKeyParts } from './lookup-key.js';
