export interface KeyedItem<T> {
  key: string;
  item: T;
}

export interface CommonPair<T> {
  key: string;
  source: T;
  target: T;
}

export interface FieldDifference<F extends string = string> {
  field: F;
  old_value: unknown;
  new_value: unknown;
}

export interface KeyedComparison<T> {
  /** Keys present only in the target, in target order. */
  added: KeyedItem<T>[];
  /** Keys present only in the source, in source order. */
  removed: KeyedItem<T>[];
  /** Keys present in both, in source order. */
  common: CommonPair<T>[];
}

export interface Modification<T, F extends string = string> extends CommonPair<T> {
  differences: FieldDifference<F>[];
}

export interface CollectionDiff<T, F extends string = string> {
  added: KeyedItem<T>[];
  removed: KeyedItem<T>[];
  modified: Modification<T, F>[];
}

export type FieldComparator<T, F extends string = string> = (
  source: T,
  target: T,
) => FieldDifference<F>[];
