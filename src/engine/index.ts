/**
 * Drift Engine barrel
 */
export { loadJsonDocument, defaultReadFile, type ReadFileFn } from './loader';
export {
  computeDiff,
  hasDrift,
  canonicalize,
  stableStringify,
  jsonTypeOf,
} from './structural-diff';
export { extractResources, compareResources } from './resources';
export type * from './types';
