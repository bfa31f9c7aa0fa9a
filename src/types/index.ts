// ─── Stored configuration (SQLite rows) ─────────────────

export type SortBy =
  | 'premiere_year'       // Oldest premiere first, unknown years last
  | 'premiere_year_desc'  // Newest premiere first, unknown years last
  | 'alphabetical'        // Case-insensitive show name
  | 'config_order';       // Order shows were added to the playlist

export const SORT_BY_VALUES: readonly SortBy[] = [
  'premiere_year',
  'premiere_year_desc',
  'alphabetical',
  'config_order',
];

export type BreakStyle = 'single' | 'block' | 'disabled';

export const BREAK_STYLES: readonly BreakStyle[] = ['single', 'block', 'disabled'];

export interface Show {
  id: number;
  name: string;
  library: string;
  year: number | null;
  enabled: number;      // 0/1 in DB
  created_at: string;
}

export interface ShowParsed extends Omit<Show, 'enabled'> {
  enabled: boolean;
}

export interface Playlist {
  id: number;
  name: string;
  episodes_per_generation: number;
  sort_by: SortBy;
  break_enabled: number;      // 0/1 in DB
  break_style: BreakStyle;
  break_frequency: number;
  break_min_gap: number;
  block_min_secs: number;
  block_max_secs: number;
  is_default: number;         // 0/1 in DB
  created_at: string;
}

export interface PlaylistParsed {
  id: number;
  name: string;
  episodes_per_generation: number;
  sort_by: SortBy;
  breaks: BreakPolicy;
  is_default: boolean;
  created_at: string;
}

/** A show's membership in one playlist, with the cursor for the next episode to schedule. */
export interface PlaylistShow {
  playlist_id: number;
  show_id: number;
  show_name: string;
  current_season: number;
  current_episode: number;
  position: number;
}

export interface PlaylistDetail extends PlaylistParsed {
  shows: PlaylistShow[];
}

export interface CommercialCategory {
  id: number;
  name: string;
  search_terms: string[];
  weight: number;
}

export interface HistoryEntry {
  id: number;
  timestamp: string;
  playlist_name: string;
  episode_count: number;
  shows: string[];
  runtime_secs: number;
}

// ─── Engine ────────────────────────────────────────────

export interface DurationRange {
  min: number;
  max: number;
}

export interface BreakPolicy {
  enabled: boolean;
  style: BreakStyle;
  /** Insert a break after every N episodes */
  frequency: number;
  /** No-repeat window for single-clip breaks */
  minGap: number;
  blockDuration: DurationRange;
}

export const DEFAULT_BREAK_POLICY: BreakPolicy = {
  enabled: true,
  style: 'single',
  frequency: 1,
  minGap: 50,
  blockDuration: { min: 30, max: 120 },
};

export interface EpisodeRef {
  kind: 'episode';
  id: string;
  showName: string;
  seasonNumber: number;
  episodeNumber: number;
  title: string;
  durationSeconds: number | null;
}

export interface CommercialRef {
  kind: 'commercial';
  id: string;
  title: string;
  /** Storage path; the parent folder name is the clip's category */
  path: string | null;
  durationSeconds: number | null;
}

export type ScheduledItem = EpisodeRef | CommercialRef;

export interface ShowHandle {
  id: string;
  name: string;
  library: string;
}

/**
 * Read-only view of the media library the scheduler draws from.
 * Lookups are synchronous; implementations serve them from a synced snapshot.
 */
export interface Catalog {
  findShow(name: string, library: string): ShowHandle | null;
  findEpisode(show: ShowHandle, season: number, episode: number): EpisodeRef | null;
  /** Lowest season number greater than `afterSeason`, ignoring specials (season 0). */
  nextSeasonNumber(show: ShowHandle, afterSeason: number): number | null;
  listCommercials(libraryName: string): CommercialRef[];
  yearOf(show: ShowHandle): number | null;
}

/** Destination for a generated playlist. Replaces any playlist with the same name. */
export interface PlaylistSink {
  publish(playlistName: string, items: ScheduledItem[]): Promise<void>;
}

/** Caller-owned show record handed to the scheduler. `year` may be backfilled. */
export interface ShowEntry {
  name: string;
  library: string;
  year: number | null;
  enabled: boolean;
}

/** Caller-owned cursor. The scheduler writes final positions back onto it. */
export interface CursorPosition {
  season: number;
  episode: number;
}

export interface SchedulerShowInput {
  show: ShowEntry;
  cursor: CursorPosition;
}

/** Called once per scheduled episode with the running count and the target. */
export type ProgressCallback = (current: number, total: number) => void;

export interface GenerationResult {
  items: ScheduledItem[];
  episodesByShow: Record<string, number>;
  /** Show name -> next position label, e.g. "S02E05" */
  finalPositions: Record<string, string>;
  cursors: Record<string, CursorPosition>;
  totalRuntimeSeconds: number;
  commercialBlockCount: number;
  commercialTotalSeconds: number;
  /** Shows that ran out of episodes during this run */
  droppedShows: string[];
  /** Configured shows the catalog could not find */
  missingShows: string[];
  /** Episode count the run aimed for */
  targetEpisodeCount: number;
}

export interface GenerationSummary {
  playlist_name: string;
  generated_at: string;
  preview: boolean;
  total_items: number;
  episode_count: number;
  target_episode_count: number;
  episodes_by_show: Record<string, number>;
  show_positions: Record<string, string>;
  runtime: string;
  total_runtime_secs: number;
  commercial_blocks: number;
  commercial_total_secs: number;
  break_style: BreakStyle;
  dropped_shows: string[];
  missing_shows: string[];
  seed: string;
}

// ─── Library snapshot (Jellyfin) ─────────────────────────

export interface JellyfinItem {
  Id: string;
  Name: string;
  Type: string;           // 'Series' | 'Episode' | 'Movie' | 'Video'
  SeriesId?: string;
  SeriesName?: string;
  IndexNumber?: number;   // Episode number
  ParentIndexNumber?: number; // Season number
  RunTimeTicks?: number;
  ProductionYear?: number;
  Path?: string;
}

/** One synced item and the Jellyfin library (view) it came from. */
export interface LibraryEntry {
  library: string;
  item: JellyfinItem;
}

export interface CommercialInventoryRow {
  name: string;
  count: number;
  duration_secs: number;
}

export type WSMessage =
  | { type: 'connected' | 'heartbeat'; payload: { timestamp: string } }
  | { type: 'generate:progress'; payload: { playlist: string; current: number; total: number } }
  | { type: 'generate:complete'; payload: GenerationSummary }
  | { type: 'library:synced'; payload: { shows: number; episodes: number; commercials: number } };

// ─── API inputs ──────────────────────────────────────────

export interface ShowInput {
  name: string;
  library?: string;
  year?: number | null;
  enabled?: boolean;
}

export interface PlaylistInput {
  name: string;
  episodes_per_generation?: number;
  sort_by?: SortBy;
  breaks?: Partial<BreakPolicy>;
}

export interface CommercialCategoryInput {
  name: string;
  search_terms?: string[];
  weight?: number;
}

/** Everything a successful generation run writes back, applied in one transaction. */
export interface GenerationRecord {
  playlistId: number;
  cursors: { showId: number; season: number; episode: number }[];
  years: { showId: number; year: number }[];
  history: Omit<HistoryEntry, 'id'>;
  historyLimit: number;
  /** The item list as published, kept for export */
  items: ScheduledItem[];
}

export interface PublishedItems {
  items: ScheduledItem[];
  published_at: string;
}
