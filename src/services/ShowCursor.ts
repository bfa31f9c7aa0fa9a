import type { Catalog, EpisodeRef, ShowEntry, ShowHandle, SortBy } from '../types/index.js';
import { formatPosition } from '../utils/duration.js';

/**
 * One show's traversal state within a single generation run.
 * The cursor always points at the next episode to schedule.
 */
export class ShowCursor {
  readonly show: ShowEntry;
  readonly handle: ShowHandle;
  season: number;
  episode: number;
  exhausted = false;
  episodesAdded = 0;

  constructor(show: ShowEntry, handle: ShowHandle, season: number, episode: number) {
    this.show = show;
    this.handle = handle;
    this.season = season;
    this.episode = episode;
  }

  get name(): string {
    return this.show.name;
  }

  get position(): string {
    return formatPosition(this.season, this.episode);
  }

  /**
   * Return the episode at the cursor and move past it, rolling over into the
   * next season when the current one has run out. Returns null (and marks the
   * show exhausted) when nothing further is reachable.
   */
  advance(catalog: Catalog): EpisodeRef | null {
    if (this.exhausted) return null;

    let episode = catalog.findEpisode(this.handle, this.season, this.episode);

    if (!episode) {
      const nextSeason = catalog.nextSeasonNumber(this.handle, this.season);
      if (nextSeason === null) {
        this.exhausted = true;
        return null;
      }
      this.season = nextSeason;
      this.episode = 1;
      episode = catalog.findEpisode(this.handle, this.season, this.episode);
      if (!episode) {
        this.exhausted = true;
        return null;
      }
    }

    this.episode += 1;
    this.episodesAdded += 1;
    return episode;
  }
}

/**
 * Order shows for round-robin. Array.prototype.sort is stable, so ties keep
 * their configured order.
 */
export function sortShows<T extends { show: ShowEntry }>(entries: T[], sortBy: SortBy): T[] {
  const sorted = [...entries];
  switch (sortBy) {
    case 'premiere_year':
      sorted.sort((a, b) => compareYears(a.show.year, b.show.year, 1));
      break;
    case 'premiere_year_desc':
      sorted.sort((a, b) => compareYears(a.show.year, b.show.year, -1));
      break;
    case 'alphabetical':
      sorted.sort((a, b) => {
        const an = a.show.name.toLowerCase();
        const bn = b.show.name.toLowerCase();
        return an < bn ? -1 : an > bn ? 1 : 0;
      });
      break;
    case 'config_order':
      break;
  }
  return sorted;
}

// Unknown years sort last in both directions
function compareYears(a: number | null, b: number | null, direction: 1 | -1): number {
  if (a === null && b === null) return 0;
  if (a === null) return 1;
  if (b === null) return -1;
  return (a - b) * direction;
}
