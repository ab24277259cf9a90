import { describe, it, expect } from 'vitest';
import { jaccard, textSimilarity } from './similarity.js';

describe('textSimilarity', () => {
  it('should be 1 for equal strings', () => {
    expect(textSimilarity('Amount > 100', 'Amount > 100')).toBe(1);
  });

  it('should be 1 for two empty strings', () => {
    expect(textSimilarity('', '')).toBe(1);
  });

  it('should be 0 against an empty string', () => {
    expect(textSimilarity('abc', '')).toBe(0);
  });

  it('should ignore case', () => {
    expect(textSimilarity('STATUS', 'status')).toBe(1);
  });

  it('should count characters on the longest common subsequence', () => {
    // 13 of 14 characters match on each side.
    expect(textSimilarity('Amount > 10000', 'Amount > 50000')).toBeCloseTo(26 / 28, 10);
  });
});

describe('jaccard', () => {
  it('should divide the intersection by the union', () => {
    expect(jaccard(new Set(['Id', 'Name', 'Email']), new Set(['Id', 'Name', 'CreditLimit']))).toBe(0.5);
  });

  it('should be 1 for two empty sets', () => {
    expect(jaccard(new Set(), new Set())).toBe(1);
  });

  it('should be 0 for disjoint sets', () => {
    expect(jaccard(new Set(['a']), new Set(['b']))).toBe(0);
  });
});
