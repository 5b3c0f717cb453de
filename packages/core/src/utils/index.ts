export {
  isAttributeTree,
  deepClone,
  stableStringify,
  deepEqual,
  isReservedKey,
  splitPath,
  getPath,
  setPath,
  leafPaths,
} from './records.js';
export { WriteQueue } from './write-queue.js';
