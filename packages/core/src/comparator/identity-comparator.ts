import { isDeepStrictEqual } from 'node:util';
import type {
  CollectionDiff,
  FieldComparator,
  FieldDifference,
  KeyedComparison,
  Modification,
} from './types.js';

/**
 * Build an identity map. A key that repeats keeps the later item.
 */
export function indexBy<T>(items: readonly T[], keyOf: (item: T) => string): Map<string, T> {
  const index = new Map<string, T>();
  for (const item of items) {
    index.set(keyOf(item), item);
  }
  return index;
}

export function compareKeyed<T>(
  source: ReadonlyMap<string, T>,
  target: ReadonlyMap<string, T>,
): KeyedComparison<T> {
  const result: KeyedComparison<T> = { added: [], removed: [], common: [] };

  for (const [key, item] of target) {
    if (!source.has(key)) result.added.push({ key, item });
  }

  for (const [key, item] of source) {
    const counterpart = target.get(key);
    if (counterpart === undefined) {
      result.removed.push({ key, item });
    } else {
      result.common.push({ key, source: item, target: counterpart });
    }
  }

  return result;
}

/**
 * Scalar comparison of the named fields, reported in the order given.
 */
export function compareFields<T, F extends keyof T & string>(
  source: T,
  target: T,
  fields: readonly F[],
): FieldDifference<F>[] {
  const differences: FieldDifference<F>[] = [];
  for (const field of fields) {
    if (!isDeepStrictEqual(source[field], target[field])) {
      differences.push({ field, old_value: source[field], new_value: target[field] });
    }
  }
  return differences;
}

/**
 * Identity-keyed set comparison: added, removed, and per-key field differences
 * for the items both collections share. Common items without differences are omitted.
 */
export function diffCollections<T, F extends string = string>(
  source: readonly T[],
  target: readonly T[],
  keyOf: (item: T) => string,
  compare: FieldComparator<T, F>,
): CollectionDiff<T, F> {
  const { added, removed, common } = compareKeyed(indexBy(source, keyOf), indexBy(target, keyOf));

  const modified: Modification<T, F>[] = [];
  for (const pair of common) {
    const differences = compare(pair.source, pair.target);
    if (differences.length > 0) {
      modified.push({ ...pair, differences });
    }
  }

  return { added, removed, modified };
}
