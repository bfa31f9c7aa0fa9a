import type { CommercialCategory, CommercialRef, DurationRange } from '../types/index.js';
import { durationSecsOf } from '../utils/duration.js';
import type { Rng } from './CommercialPicker.js';

export const UNCATEGORIZED = 'uncategorized';
const DEFAULT_CATEGORY_WEIGHT = 1.0;

export interface CommercialBlock {
  clips: CommercialRef[];
  totalSecs: number;
}

/**
 * Category of a clip: the name of the folder it is stored in.
 * Handles both POSIX and Windows separators.
 */
export function categoryFromPath(path: string | null): string {
  if (!path) return UNCATEGORIZED;
  const parts = path.split(/[\\/]+/).filter(p => p.length > 0);
  // Last part is the file itself; a bare file name has no folder
  if (parts.length < 2) return UNCATEGORIZED;
  const parent = parts[parts.length - 2];
  // Drive root ("C:") is not a category
  if (/^[a-zA-Z]:$/.test(parent)) return UNCATEGORIZED;
  return parent;
}

/** Lower-cased category name -> selection weight */
export function categoryWeights(categories: Pick<CommercialCategory, 'name' | 'weight'>[]): Map<string, number> {
  const weights = new Map<string, number>();
  for (const cat of categories) {
    weights.set(cat.name.toLowerCase(), cat.weight);
  }
  return weights;
}

/**
 * Build a multi-clip commercial block whose length reaches a target drawn
 * uniformly from `range`. Clips are drawn independently with replacement,
 * weighted by category, so one clip can appear more than once in a block.
 */
export function buildCommercialBlock(
  pool: CommercialRef[],
  range: DurationRange,
  weights: Map<string, number>,
  rng: Rng
): CommercialBlock {
  if (pool.length === 0) {
    return { clips: [], totalSecs: 0 };
  }

  const target = range.min + rng() * (range.max - range.min);

  const clipWeights = pool.map(clip => {
    const category = categoryFromPath(clip.path).toLowerCase();
    return weights.get(category) ?? DEFAULT_CATEGORY_WEIGHT;
  });
  const totalWeight = clipWeights.reduce((sum, w) => sum + w, 0);

  const clips: CommercialRef[] = [];
  let totalSecs = 0;

  while (totalSecs < target) {
    const clip = pool[weightedIndex(clipWeights, totalWeight, rng)];
    clips.push(clip);
    totalSecs += durationSecsOf(clip);
  }

  return { clips, totalSecs };
}

function weightedIndex(weights: number[], totalWeight: number, rng: Rng): number {
  let roll = rng() * totalWeight;
  for (let i = 0; i < weights.length; i++) {
    roll -= weights[i];
    if (roll < 0) return i;
  }
  // Float rounding can leave a sliver of roll; it belongs to the last clip
  return weights.length - 1;
}
