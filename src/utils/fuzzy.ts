import Fuse from 'fuse.js';
import { FUZZY_CHOICE_CONFIG, RESOLUTION_THRESHOLDS, toFuseThreshold } from '../config/resolution.js';

/**
 * String similarity utilities for duplicate ranking and reply matching
 */

export interface FuzzyMatch<T> {
  item: T;
  refIndex: number;
  score: number; // 0-1, higher is better
}

export class FuzzyMatcher {
  /**
   * Find best matches for a query in a list of items using Fuse.js
   */
  static search<T>(
    query: string,
    items: readonly T[],
    keys: string[],
    threshold: number = FUZZY_CHOICE_CONFIG.MIN_LABEL_SIMILARITY
  ): FuzzyMatch<T>[] {
    const fuse = new Fuse(items, {
      keys,
      threshold: toFuseThreshold(threshold),
      includeScore: true,
      ignoreLocation: FUZZY_CHOICE_CONFIG.IGNORE_LOCATION,
      minMatchCharLength: FUZZY_CHOICE_CONFIG.MIN_MATCH_CHARACTER_LENGTH,
    });

    return fuse
      .search(query)
      .map((result) => ({
        item: result.item,
        refIndex: result.refIndex,
        score: 1 - (result.score ?? 0),
      }))
      .filter((match) => match.score >= threshold)
      .sort((a, b) => b.score - a.score);
  }

  /**
   * Levenshtein distance between two strings
   */
  static levenshteinDistance(str1: string, str2: string): number {
    if (str1 === str2) return 0;
    if (str1.length === 0) return str2.length;
    if (str2.length === 0) return str1.length;

    let previous = Array.from({ length: str1.length + 1 }, (_, j) => j);

    for (let i = 1; i <= str2.length; i++) {
      const current = [i];
      for (let j = 1; j <= str1.length; j++) {
        const cost = str2.charAt(i - 1) === str1.charAt(j - 1) ? 0 : 1;
        current[j] = Math.min(
          previous[j - 1] + cost, // substitution
          current[j - 1] + 1,     // insertion
          previous[j] + 1         // deletion
        );
      }
      previous = current;
    }

    return previous[str1.length];
  }

  /**
   * Number of characters two strings share: the longest common substring plus,
   * recursively, the shared characters to its left and right.
   */
  static commonCharacters(str1: string, str2: string): number {
    if (str1.length === 0 || str2.length === 0) return 0;

    let max = 0;
    let pos1 = 0;
    let pos2 = 0;
    for (let i = 0; i < str1.length; i++) {
      for (let j = 0; j < str2.length; j++) {
        let k = 0;
        while (i + k < str1.length && j + k < str2.length && str1[i + k] === str2[j + k]) {
          k++;
        }
        if (k > max) {
          max = k;
          pos1 = i;
          pos2 = j;
        }
      }
    }

    if (max === 0) return 0;

    return (
      max +
      this.commonCharacters(str1.slice(0, pos1), str2.slice(0, pos2)) +
      this.commonCharacters(str1.slice(pos1 + max), str2.slice(pos2 + max))
    );
  }

  /**
   * Character-overlap percentage (0-100)
   */
  static characterOverlap(str1: string, str2: string): number {
    const total = str1.length + str2.length;
    if (total === 0) return 100;
    return (this.commonCharacters(str1, str2) * 2 * 100) / total;
  }

  /**
   * Levenshtein similarity percentage (0-100)
   */
  static levenshteinSimilarity(str1: string, str2: string): number {
    const maxLength = Math.max(str1.length, str2.length);
    if (maxLength === 0) return 100;
    return (1 - this.levenshteinDistance(str1, str2) / maxLength) * 100;
  }

  /**
   * Word intersection ratio (0-100): search words found in the target over the larger word count
   */
  static wordOverlap(search: string, target: string): number {
    const searchWords = search.split(/\s+/).filter(Boolean);
    const targetWords = new Set(target.split(/\s+/).filter(Boolean));
    const largest = Math.max(searchWords.length, targetWords.size);
    if (largest === 0) return 0;

    const shared = searchWords.filter((word) => targetWords.has(word)).length;
    return (shared / largest) * 100;
  }

  /**
   * Composite similarity score (0-100, integer).
   * Exact = 100, case-insensitive exact = 95, containment = 85,
   * otherwise the best of Levenshtein, character overlap and word overlap.
   */
  static calculateSimilarity(search: string, target: string): number {
    const a = search.trim();
    const b = target.trim();

    if (a === b) return RESOLUTION_THRESHOLDS.SCORE_EXACT;
    if (a.length === 0 || b.length === 0) return 0;

    const lowerA = a.toLowerCase();
    const lowerB = b.toLowerCase();

    if (lowerA === lowerB) return RESOLUTION_THRESHOLDS.SCORE_CASE_INSENSITIVE;
    if (lowerB.includes(lowerA)) return RESOLUTION_THRESHOLDS.SCORE_CONTAINMENT;

    const best = Math.max(
      this.levenshteinSimilarity(lowerA, lowerB),
      this.characterOverlap(lowerA, lowerB),
      this.wordOverlap(lowerA, lowerB)
    );

    return Math.max(0, Math.min(100, Math.trunc(best)));
  }
}
