import seedrandom from 'seedrandom';
import type {
  BreakPolicy,
  Catalog,
  CommercialRef,
  CursorPosition,
  GenerationResult,
  ProgressCallback,
  ScheduledItem,
  SchedulerShowInput,
  SortBy,
} from '../types/index.js';
import { ShowCursor, sortShows } from './ShowCursor.js';
import { pickSingleCommercial } from './CommercialPicker.js';
import { buildCommercialBlock } from './CommercialBlockBuilder.js';
import { EmptyPlaylistError, NoResolvableShowsError } from './errors.js';
import { durationSecsOf } from '../utils/duration.js';

export interface GenerateOptions {
  playlistName: string;
  shows: SchedulerShowInput[];
  /** Episodes to schedule; 0 or omitted falls back to `defaultEpisodeCount` */
  targetEpisodeCount?: number;
  /** Playlist default (>= 1) */
  defaultEpisodeCount: number;
  resetPositions: boolean;
  sortBy: SortBy;
  breaks: BreakPolicy;
  commercialLibrary: string;
  /** Lower-cased category name -> weight, for block-style breaks */
  categoryWeights?: Map<string, number>;
  /** PRNG seed; the same seed and catalog reproduce the same playlist */
  seed?: string;
  onProgress?: ProgressCallback;
}

/** Where the last break sits in the item list, so a run that ends early can drop a trailing one. */
interface BreakMark {
  start: number;
  secs: number;
}

/**
 * Builds a channel playlist: episodes drawn round-robin across shows, each
 * show continuing from its saved cursor, with commercial breaks inserted
 * every `breaks.frequency` episodes.
 *
 * Generation is synchronous and works only on the catalog and the inputs it
 * is given. Final cursor positions are written back onto the input cursors;
 * persisting them is up to the caller.
 */
export class PlaylistScheduler {
  private catalog: Catalog;

  constructor(catalog: Catalog) {
    this.catalog = catalog;
  }

  generate(options: GenerateOptions): GenerationResult {
    const { playlistName, breaks } = options;

    if (options.shows.length === 0) {
      throw new EmptyPlaylistError(playlistName);
    }

    if (options.resetPositions) {
      for (const entry of options.shows) {
        entry.cursor.season = 1;
        entry.cursor.episode = 1;
      }
    }

    // Resolve shows against the catalog
    const missingShows: string[] = [];
    const resolved: { show: SchedulerShowInput['show']; cursor: CursorPosition; state: ShowCursor }[] = [];
    for (const entry of options.shows) {
      if (!entry.show.enabled) continue;
      const handle = this.catalog.findShow(entry.show.name, entry.show.library);
      if (!handle) {
        console.warn(`[Scheduler] Could not find '${entry.show.name}' in library '${entry.show.library}'`);
        missingShows.push(entry.show.name);
        continue;
      }
      resolved.push({
        show: entry.show,
        cursor: entry.cursor,
        state: new ShowCursor(entry.show, handle, entry.cursor.season, entry.cursor.episode),
      });
    }

    if (resolved.length === 0) {
      throw new NoResolvableShowsError(missingShows);
    }

    // Backfill missing premiere years from the catalog
    for (const entry of resolved) {
      if (entry.show.year === null) {
        const year = this.catalog.yearOf(entry.state.handle);
        if (year !== null) entry.show.year = year;
      }
    }

    const ordered = sortShows(resolved, options.sortBy);
    const cursors = ordered.map(entry => entry.state);

    const target = resolveTarget(options.targetEpisodeCount, options.defaultEpisodeCount);
    const rng = seedrandom(options.seed);

    const breaksEnabled = breaks.enabled && breaks.style !== 'disabled';
    let commercials: CommercialRef[] = [];
    if (breaksEnabled) {
      commercials = this.catalog.listCommercials(options.commercialLibrary);
      if (commercials.length === 0) {
        console.warn(`[Scheduler] No commercials found in '${options.commercialLibrary}'. Generating without breaks.`);
      }
    }
    const weights = options.categoryWeights ?? new Map<string, number>();
    const recentHistory: number[] = [];

    const items: ScheduledItem[] = [];
    const droppedShows: string[] = [];
    let scheduled = 0;
    let totalRuntimeSeconds = 0;
    let commercialBlockCount = 0;
    let commercialTotalSeconds = 0;
    let episodesSinceBreak = 0;
    let trailingBreak: BreakMark | null = null;
    let rotation = 0;

    while (scheduled < target) {
      const active = cursors.filter(c => !c.exhausted);
      if (active.length === 0) {
        console.warn(`[Scheduler] All shows exhausted after ${scheduled} episodes`);
        break;
      }

      const cursor = active[rotation % active.length];
      rotation++;

      const episode = cursor.advance(this.catalog);
      if (!episode) {
        droppedShows.push(cursor.name);
        console.warn(`[Scheduler] '${cursor.name}' has no more episodes after ${cursor.position}`);
        // The next active show takes this turn
        rotation--;
        continue;
      }

      items.push(episode);
      scheduled++;
      totalRuntimeSeconds += durationSecsOf(episode);
      episodesSinceBreak++;
      trailingBreak = null;
      options.onProgress?.(scheduled, target);

      const breakDue = breaksEnabled
        && commercials.length > 0
        && episodesSinceBreak >= breaks.frequency
        && scheduled < target;
      if (!breakDue) continue;

      const start = items.length;
      let breakSecs = 0;
      if (breaks.style === 'block') {
        const block = buildCommercialBlock(commercials, breaks.blockDuration, weights, rng);
        items.push(...block.clips);
        breakSecs = block.totalSecs;
      } else {
        const pick = pickSingleCommercial(commercials, recentHistory, breaks.minGap, rng);
        if (pick.clip) items.push(pick.clip);
        breakSecs = pick.durationSecs;
      }

      if (items.length > start) {
        commercialBlockCount++;
        commercialTotalSeconds += breakSecs;
        totalRuntimeSeconds += breakSecs;
        trailingBreak = { start, secs: breakSecs };
      }
      episodesSinceBreak = 0;
    }

    // A run cut short by exhaustion only learns which episode was last after the fact
    if (trailingBreak) {
      items.splice(trailingBreak.start);
      commercialBlockCount--;
      commercialTotalSeconds -= trailingBreak.secs;
      totalRuntimeSeconds -= trailingBreak.secs;
    }

    // Keyed by show name, which may be any string (including "__proto__")
    const episodesByShow = new Map<string, number>();
    const finalPositions = new Map<string, string>();
    const finalCursors = new Map<string, CursorPosition>();
    for (const entry of ordered) {
      entry.cursor.season = entry.state.season;
      entry.cursor.episode = entry.state.episode;
      episodesByShow.set(entry.show.name, entry.state.episodesAdded);
      finalPositions.set(entry.show.name, entry.state.position);
      finalCursors.set(entry.show.name, { season: entry.state.season, episode: entry.state.episode });
    }

    console.log(
      `[Scheduler] '${playlistName}': ${scheduled} episodes, ${commercialBlockCount} breaks across ${ordered.length} shows`
    );

    return {
      items,
      episodesByShow: Object.fromEntries(episodesByShow),
      finalPositions: Object.fromEntries(finalPositions),
      cursors: Object.fromEntries(finalCursors),
      totalRuntimeSeconds,
      commercialBlockCount,
      commercialTotalSeconds,
      droppedShows,
      missingShows,
      targetEpisodeCount: target,
    };
  }
}

/** Requested count when > 0, else the playlist default (never below 1). */
export function resolveTarget(requested: number | undefined, playlistDefault: number): number {
  if (requested !== undefined && requested > 0) return Math.floor(requested);
  return Math.max(1, Math.floor(playlistDefault));
}
