import { diffChars } from 'diff';

/**
 * Case-insensitive similarity in [0, 1]: 2·M / (|a| + |b|), where M is the number of
 * characters on the longest common subsequence.
 */
export function textSimilarity(a: string, b: string): number {
  const left = a.toLowerCase();
  const right = b.toLowerCase();
  const total = left.length + right.length;
  if (total === 0) return 1;

  let matched = 0;
  for (const part of diffChars(left, right)) {
    if (!part.added && !part.removed) {
      matched += part.value.length;
    }
  }
  return (2 * matched) / total;
}

/**
 * Overlap of two name sets (|A ∩ B| / |A ∪ B|); 1 when both are empty.
 */
export function jaccard(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
  const union = new Set([...a, ...b]);
  if (union.size === 0) return 1;
  let common = 0;
  for (const name of a) {
    if (b.has(name)) common++;
  }
  return common / union.size;
}
