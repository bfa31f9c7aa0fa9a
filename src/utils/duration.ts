/**
 * Duration helpers for scheduled items and Jellyfin runtimes.
 */
import type { ScheduledItem } from '../types/index.js';

/** Assumed length of an item whose runtime is unknown or non-positive. */
export const DEFAULT_ITEM_DURATION_SECS = 30;

/**
 * Playable duration of an item in seconds, falling back to
 * DEFAULT_ITEM_DURATION_SECS when the library has no usable runtime.
 */
export function durationSecsOf(item: Pick<ScheduledItem, 'durationSeconds'>): number {
  const secs = item.durationSeconds;
  if (secs === null || !Number.isFinite(secs) || secs <= 0) {
    return DEFAULT_ITEM_DURATION_SECS;
  }
  return secs;
}

/**
 * Convert Jellyfin RunTimeTicks (100ns units) to seconds.
 * Returns null for missing or non-positive runtimes.
 */
export function ticksToSecs(ticks: number | null | undefined): number | null {
  if (ticks === null || ticks === undefined || ticks <= 0) return null;
  return ticks / 10_000_000;
}

/**
 * Format a duration in seconds as "2h 5m" or "45m"
 */
export function formatRuntime(totalSecs: number): string {
  const totalMinutes = Math.floor(totalSecs / 60);
  const hours = Math.floor(totalMinutes / 60);
  const minutes = totalMinutes % 60;
  if (hours > 0) {
    return `${hours}h ${minutes}m`;
  }
  return `${minutes}m`;
}

/**
 * Season/episode label, e.g. S01E04
 */
export function formatPosition(season: number, episode: number): string {
  return `S${String(season).padStart(2, '0')}E${String(episode).padStart(2, '0')}`;
}
