import type { ElementType } from '../diff-engine/index.js';
import type { Model } from '../model/index.js';

/**
 * How a path changed on both sides is resolved:
 * - ours: keep our value (the default)
 * - theirs: take their value, dropping the element or field when they removed it
 * - union: keep our scalars; an entity both sides added gets the union of their properties
 */
export type MergeStrategy = 'ours' | 'theirs' | 'union';

export const MERGE_STRATEGIES: readonly MergeStrategy[] = ['ours', 'theirs', 'union'];

export interface MergeConflict {
  path: string;
  element_type: ElementType;
  resolution: MergeStrategy;
  ours_value: string | null;
  theirs_value: string | null;
}

export interface MergeResult {
  merged: Model;
  conflicts: MergeConflict[];
}
