import * as fuzz from 'fuzzball';
import type { SeriesSummary } from './JellyfinCatalog.js';

/** Lowest WRatio score that counts as a match */
export const MATCH_THRESHOLD = 65;

/** A lone fuzzy match at or above this score is taken without asking */
export const AUTO_ACCEPT_SCORE = 95;

export interface ShowCandidate extends SeriesSummary {
  score: number;
}

export type ShowResolution =
  | { kind: 'matched'; series: SeriesSummary; score: number }
  | { kind: 'ambiguous'; candidates: ShowCandidate[] }
  | { kind: 'none' };

/** Case-insensitive exact title match */
export function exactMatch(query: string, series: SeriesSummary[]): SeriesSummary | undefined {
  const lower = query.toLowerCase();
  return series.find(s => s.name.toLowerCase() === lower);
}

/**
 * Series scoring at least MATCH_THRESHOLD against the query, best first.
 * Ties keep library order.
 */
export function fuzzyMatches(query: string, series: SeriesSummary[], limit = 5): ShowCandidate[] {
  return series
    .map(s => ({ ...s, score: fuzz.WRatio(query, s.name) }))
    .filter(c => c.score >= MATCH_THRESHOLD)
    .sort((a, b) => b.score - a.score)
    .slice(0, limit);
}

/**
 * Resolve a typed show name against the library: an exact title wins,
 * then a single confident fuzzy match. Anything else is left for the
 * caller to pick from.
 */
export function resolveShow(query: string, series: SeriesSummary[]): ShowResolution {
  const exact = exactMatch(query, series);
  if (exact) return { kind: 'matched', series: exact, score: 100 };

  const candidates = fuzzyMatches(query, series);
  if (candidates.length === 0) return { kind: 'none' };

  if (candidates.length === 1 && candidates[0].score >= AUTO_ACCEPT_SCORE) {
    const { score, ...match } = candidates[0];
    return { kind: 'matched', series: match, score };
  }
  return { kind: 'ambiguous', candidates };
}
