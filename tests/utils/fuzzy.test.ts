import { describe, expect, it } from 'vitest';
import { FuzzyMatcher } from '../../src/utils/fuzzy.js';

describe('FuzzyMatcher', () => {
  describe('calculateSimilarity', () => {
    it('scores exact, case-insensitive and containment matches at fixed values', () => {
      expect(FuzzyMatcher.calculateSimilarity('Macbook', 'Macbook')).toBe(100);
      expect(FuzzyMatcher.calculateSimilarity('macbook', 'MacBook')).toBe(95);
      expect(FuzzyMatcher.calculateSimilarity('book', 'MacBook Pro')).toBe(85);
    });

    it('takes the best of the edit-distance and overlap measures', () => {
      // 7 shared characters over 18 total
      expect(FuzzyMatcher.calculateSimilarity('macbook pro', 'macbook')).toBe(77);
      expect(FuzzyMatcher.calculateSimilarity('ipad', 'iphone')).toBe(40);
    });

    it('scores empty input as no match', () => {
      expect(FuzzyMatcher.calculateSimilarity('', 'anything')).toBe(0);
      expect(FuzzyMatcher.calculateSimilarity('  ', '  ')).toBe(100);
    });
  });

  it('computes Levenshtein distance', () => {
    expect(FuzzyMatcher.levenshteinDistance('kitten', 'sitting')).toBe(3);
    expect(FuzzyMatcher.levenshteinDistance('', 'abc')).toBe(3);
  });

  it('counts shared characters recursively around the longest common run', () => {
    expect(FuzzyMatcher.commonCharacters('abc', 'abc')).toBe(3);
    expect(FuzzyMatcher.commonCharacters('xaybz', 'ab')).toBe(2);
    expect(FuzzyMatcher.characterOverlap('abc', 'abd')).toBeCloseTo(66.67, 1);
  });

  it('measures word overlap against the larger word count', () => {
    expect(FuzzyMatcher.wordOverlap('red chair', 'blue chair')).toBe(50);
    expect(FuzzyMatcher.wordOverlap('', '')).toBe(0);
  });

  it('finds the closest label with Fuse', () => {
    const matches = FuzzyMatcher.search('ipad', [{ label: 'iPad' }, { label: 'MacBook Pro' }], ['label']);

    expect(matches[0].item).toEqual({ label: 'iPad' });
    expect(matches[0].refIndex).toBe(0);
  });
});
