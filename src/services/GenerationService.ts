import type Database from 'better-sqlite3';
import type {
  Catalog,
  GenerationSummary,
  PlaylistSink,
  ProgressCallback,
  ScheduledItem,
  SchedulerShowInput,
} from '../types/index.js';
import * as queries from '../db/queries.js';
import { DEFAULT_SETTINGS } from '../db/index.js';
import { PlaylistScheduler } from './PlaylistScheduler.js';
import { categoryWeights } from './CommercialBlockBuilder.js';
import { GenerationInProgressError, PlaylistNotFoundError } from './errors.js';
import { generateSeed } from '../utils/crypto.js';
import { formatRuntime } from '../utils/duration.js';

export interface GenerationRequest {
  /** Overrides the playlist's episodes_per_generation when > 0 */
  episodeCount?: number;
  /** Start every show over from S01E01 */
  fromStart?: boolean;
  seed?: string;
  /** Build the playlist without publishing or saving anything */
  preview?: boolean;
  onProgress?: ProgressCallback;
}

export interface GenerationOutcome {
  summary: GenerationSummary;
  items: ScheduledItem[];
}

/**
 * Runs the scheduler for a stored playlist, publishes the result and saves
 * the new show positions. Only one run per playlist at a time.
 */
export class GenerationService {
  private db: Database.Database;
  private catalog: Catalog;
  private sink: PlaylistSink;
  private running: Set<string> = new Set();

  constructor(db: Database.Database, catalog: Catalog, sink: PlaylistSink) {
    this.db = db;
    this.catalog = catalog;
    this.sink = sink;
  }

  isRunning(playlistName: string): boolean {
    return this.running.has(playlistName.toLowerCase());
  }

  async generate(playlistName: string, request: GenerationRequest = {}): Promise<GenerationOutcome> {
    const playlist = queries.getPlaylistByName(this.db, playlistName);
    if (!playlist) throw new PlaylistNotFoundError(playlistName);

    const key = playlist.name.toLowerCase();
    if (this.running.has(key)) throw new GenerationInProgressError(playlist.name);
    this.running.add(key);

    try {
      const preview = request.preview ?? false;
      const memberships = queries.getPlaylistShows(this.db, playlist.id);

      const inputs: (SchedulerShowInput & { showId: number; storedYear: number | null })[] = [];
      for (const membership of memberships) {
        const show = queries.getShowById(this.db, membership.show_id);
        if (!show) continue;
        inputs.push({
          showId: show.id,
          storedYear: show.year,
          show: { name: show.name, library: show.library, year: show.year, enabled: show.enabled },
          cursor: { season: membership.current_season, episode: membership.current_episode },
        });
      }

      const generatedAt = new Date().toISOString();
      const seed = request.seed ?? generateSeed(playlist.name, generatedAt);

      console.log(
        `[Generation] ${preview ? 'Previewing' : 'Generating'} '${playlist.name}' ` +
        `(${inputs.length} shows${request.fromStart ? ', from start' : ''})`
      );

      const scheduler = new PlaylistScheduler(this.catalog);
      const result = scheduler.generate({
        playlistName: playlist.name,
        shows: inputs,
        targetEpisodeCount: request.episodeCount,
        defaultEpisodeCount: playlist.episodes_per_generation,
        resetPositions: request.fromStart ?? false,
        sortBy: playlist.sort_by,
        breaks: playlist.breaks,
        commercialLibrary: this.commercialLibraryName(),
        categoryWeights: categoryWeights(queries.getCommercialCategories(this.db)),
        seed,
        onProgress: request.onProgress,
      });

      const episodeCount = Object.values(result.episodesByShow).reduce((sum, n) => sum + n, 0);

      if (!preview) {
        await this.sink.publish(playlist.name, result.items);

        queries.saveGenerationResults(this.db, {
          playlistId: playlist.id,
          cursors: inputs.map(input => ({
            showId: input.showId,
            season: input.cursor.season,
            episode: input.cursor.episode,
          })),
          years: inputs.flatMap(input =>
            input.storedYear === null && input.show.year !== null
              ? [{ showId: input.showId, year: input.show.year }]
              : []
          ),
          history: {
            timestamp: generatedAt,
            playlist_name: playlist.name,
            episode_count: episodeCount,
            shows: Object.entries(result.episodesByShow).filter(([, n]) => n > 0).map(([name]) => name),
            runtime_secs: result.totalRuntimeSeconds,
          },
          historyLimit: this.historyLimit(),
          items: result.items,
        });
      }

      const summary: GenerationSummary = {
        playlist_name: playlist.name,
        generated_at: generatedAt,
        preview,
        total_items: result.items.length,
        episode_count: episodeCount,
        target_episode_count: result.targetEpisodeCount,
        episodes_by_show: result.episodesByShow,
        show_positions: result.finalPositions,
        runtime: formatRuntime(result.totalRuntimeSeconds),
        total_runtime_secs: result.totalRuntimeSeconds,
        commercial_blocks: result.commercialBlockCount,
        commercial_total_secs: result.commercialTotalSeconds,
        break_style: playlist.breaks.enabled ? playlist.breaks.style : 'disabled',
        dropped_shows: result.droppedShows,
        missing_shows: result.missingShows,
        seed,
      };

      console.log(
        `[Generation] '${playlist.name}': ${episodeCount} episodes, ${summary.runtime}` +
        (preview ? ' (preview)' : '')
      );
      return { summary, items: result.items };
    } finally {
      this.running.delete(key);
    }
  }

  private commercialLibraryName(): string {
    const value = queries.getSetting(this.db, 'commercial_library_name');
    return typeof value === 'string' && value.trim() !== ''
      ? value
      : String(DEFAULT_SETTINGS.commercial_library_name);
  }

  private historyLimit(): number {
    const value = queries.getSetting(this.db, 'history_limit');
    return typeof value === 'number' && Number.isInteger(value) && value > 0
      ? value
      : Number(DEFAULT_SETTINGS.history_limit);
  }
}
