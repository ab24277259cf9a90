export { merge, isMergeStrategy } from './merge-engine.js';
export { incrementVersion } from './version.js';
export { MERGE_STRATEGIES } from './types.js';
export type { MergeStrategy, MergeConflict, MergeResult } from './types.js';
