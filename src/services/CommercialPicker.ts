import type { CommercialRef } from '../types/index.js';
import { durationSecsOf } from '../utils/duration.js';

export type Rng = () => number;

export interface CommercialPick {
  clip: CommercialRef | null;
  durationSecs: number;
}

/**
 * Pick one commercial for a single-clip break, avoiding recent repeats.
 *
 * `recentHistory` holds the pool indices of the last `minGap` picks, oldest
 * first, and is updated in place. A clip is not reused until `minGap` others
 * have played. When the pool is too small for that, the least-recently-used
 * index in the window is reused.
 */
export function pickSingleCommercial(
  pool: CommercialRef[],
  recentHistory: number[],
  minGap: number,
  rng: Rng
): CommercialPick {
  if (pool.length === 0) {
    return { clip: null, durationSecs: 0 };
  }

  const recent = new Set(recentHistory);
  const eligible: number[] = [];
  for (let i = 0; i < pool.length; i++) {
    if (!recent.has(i)) eligible.push(i);
  }

  const index = eligible.length > 0
    ? eligible[Math.floor(rng() * eligible.length)]
    : recentHistory[0];

  recentHistory.push(index);
  while (recentHistory.length > Math.max(1, minGap)) {
    recentHistory.shift();
  }

  const clip = pool[index];
  return { clip, durationSecs: durationSecsOf(clip) };
}
