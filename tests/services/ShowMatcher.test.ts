import { describe, it, expect } from 'vitest';
import { MATCH_THRESHOLD, exactMatch, fuzzyMatches, resolveShow } from '../../src/services/ShowMatcher.js';
import type { SeriesSummary } from '../../src/services/JellyfinCatalog.js';

const library: SeriesSummary[] = [
  { name: 'Alpha', library: 'TV Shows', year: 1990, episode_count: 3 },
  { name: 'Beta', library: 'TV Shows', year: 1985, episode_count: 2 },
];

describe('ShowMatcher', () => {
  describe('exactMatch', () => {
    it('should match titles regardless of case', () => {
      expect(exactMatch('ALPHA', library)?.name).toBe('Alpha');
      expect(exactMatch('Alph', library)).toBeUndefined();
    });
  });

  describe('fuzzyMatches', () => {
    it('should score a transposed title above the threshold', () => {
      const matches = fuzzyMatches('alpah', library);
      expect(matches.map(m => m.name)).toEqual(['Alpha']);
      expect(matches[0].score).toBe(80);
    });

    it('should drop titles below the threshold', () => {
      expect(fuzzyMatches('Quxxy', library)).toEqual([]);
    });

    it('should honor the limit', () => {
      const many = Array.from({ length: 8 }, (_, i) => ({ ...library[0], name: `Alpha ${i}` }));
      expect(fuzzyMatches('Alpha', many, 3)).toHaveLength(3);
    });
  });

  describe('resolveShow', () => {
    it('should prefer an exact match', () => {
      expect(resolveShow('beta', library)).toEqual({ kind: 'matched', series: library[1], score: 100 });
    });

    it('should accept a single confident fuzzy match', () => {
      // Punctuation is ignored by the scorer
      expect(resolveShow('Alpha!', library)).toEqual({ kind: 'matched', series: library[0], score: 100 });
    });

    it('should return candidates for an uncertain match', () => {
      const resolution = resolveShow('alpah', library);
      expect(resolution.kind).toBe('ambiguous');
      if (resolution.kind !== 'ambiguous') return;
      expect(resolution.candidates).toEqual([{ ...library[0], score: 80 }]);
      expect(resolution.candidates[0].score).toBeGreaterThanOrEqual(MATCH_THRESHOLD);
    });

    it('should report no match', () => {
      expect(resolveShow('Quxxy', library)).toEqual({ kind: 'none' });
    });
  });
});
