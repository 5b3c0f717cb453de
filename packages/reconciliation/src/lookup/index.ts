export { LookupIndex } from './lookup-index.js';
export type { LookupResult } from './lookup-index.js';
