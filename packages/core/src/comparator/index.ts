export { indexBy, compareKeyed, compareFields, diffCollections } from './identity-comparator.js';
export type {
  KeyedItem,
  CommonPair,
  FieldDifference,
  KeyedComparison,
  Modification,
  CollectionDiff,
  FieldComparator,
} from './types.js';
