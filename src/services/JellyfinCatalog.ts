import type Database from 'better-sqlite3';
import { Jellyfin } from '@jellyfin/sdk';
import type { Api } from '@jellyfin/sdk';
import { getItemsApi, getUserViewsApi } from '@jellyfin/sdk/lib/utils/api/index.js';
import type { BaseItemDto } from '@jellyfin/sdk/lib/generated-client/models/index.js';
import { randomUUID } from 'crypto';
import type {
  Catalog,
  CommercialInventoryRow,
  CommercialRef,
  EpisodeRef,
  JellyfinItem,
  LibraryEntry,
  ShowHandle,
} from '../types/index.js';
import * as queries from '../db/queries.js';
import { durationSecsOf, ticksToSecs } from '../utils/duration.js';
import { categoryFromPath, UNCATEGORIZED } from './CommercialBlockBuilder.js';
import { UpstreamError } from './errors.js';

export interface JellyfinConnection {
  url: string;
  token: string;
  userId: string;
}

export interface LibrarySyncStats {
  shows: number;
  episodes: number;
  commercials: number;
}

export interface SeriesSummary {
  name: string;
  library: string;
  year: number | null;
  episode_count: number;
}

const PAGE_SIZE = 1000;
const SYNCED_TYPES = ['Series', 'Episode', 'Movie', 'Video'] as const;

export function createJellyfin(): Jellyfin {
  return new Jellyfin({
    clientInfo: {
      name: 'Rerun',
      version: '1.0.0',
    },
    deviceInfo: {
      name: 'Rerun Server',
      id: randomUUID(),
    },
  });
}

function toLibraryItem(dto: BaseItemDto): JellyfinItem | null {
  if (!dto.Id || !dto.Name || !dto.Type) return null;
  return {
    Id: dto.Id,
    Name: dto.Name,
    Type: dto.Type,
    SeriesId: dto.SeriesId ?? undefined,
    SeriesName: dto.SeriesName ?? undefined,
    IndexNumber: dto.IndexNumber ?? undefined,
    ParentIndexNumber: dto.ParentIndexNumber ?? undefined,
    RunTimeTicks: dto.RunTimeTicks ?? undefined,
    ProductionYear: dto.ProductionYear ?? undefined,
    Path: dto.Path ?? undefined,
  };
}

function sameName(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

/**
 * Catalog over a snapshot of the Jellyfin library. The snapshot is pulled
 * with `syncLibrary()` (or restored from the SQLite cache with `hydrate()`),
 * so every lookup the scheduler makes is answered from memory.
 */
export class JellyfinCatalog implements Catalog {
  private db: Database.Database;
  private connection: JellyfinConnection | null;
  private jellyfin: Jellyfin;
  private api: Api | null = null;

  private entries: LibraryEntry[] = [];
  private series: Map<string, LibraryEntry> = new Map();
  private episodes: Map<string, JellyfinItem> = new Map();
  private seasons: Map<string, number[]> = new Map();
  private episodeCounts: Map<string, number> = new Map();

  constructor(db: Database.Database, connection: JellyfinConnection | null, jellyfin: Jellyfin = createJellyfin()) {
    this.db = db;
    this.connection = connection;
    this.jellyfin = jellyfin;
  }

  get isConfigured(): boolean {
    return this.connection !== null;
  }

  get size(): number {
    return this.entries.length;
  }

  private getApi(): Api {
    if (!this.connection) throw new UpstreamError('No Jellyfin server configured (set JELLYFIN_URL and JELLYFIN_TOKEN)');
    if (!this.api) {
      console.log(`[Jellyfin] Creating API connection to ${this.connection.url}`);
      this.api = this.jellyfin.createApi(this.connection.url, this.connection.token);
    }
    return this.api;
  }

  // ─── Sync ─────────────────────────────────────────────

  /** Pull every library (user view) from the server and replace the snapshot. */
  async syncLibrary(): Promise<LibrarySyncStats> {
    const api = this.getApi();
    const userId = this.connection?.userId || undefined;

    let views: BaseItemDto[];
    try {
      const response = await getUserViewsApi(api).getUserViews({ userId });
      views = response.data.Items ?? [];
    } catch (err) {
      throw new UpstreamError('Failed to list Jellyfin libraries', { cause: err });
    }

    console.log(`[Jellyfin] Syncing ${views.length} libraries...`);

    const entries: LibraryEntry[] = [];
    for (const view of views) {
      if (!view.Id || !view.Name) continue;
      const items = await this.fetchItems(view.Id, view.Name);
      for (const item of items) {
        entries.push({ library: view.Name, item });
      }
    }

    this.load(entries);

    try {
      queries.replaceLibraryCache(this.db, entries);
    } catch (err) {
      console.error('[Jellyfin] Failed to cache library in database:', err);
      // Continue - in-memory snapshot still works
    }

    const stats = this.stats();
    console.log(`[Jellyfin] Synced ${stats.shows} shows, ${stats.episodes} episodes, ${stats.commercials} other videos`);
    return stats;
  }

  private async fetchItems(parentId: string, library: string): Promise<JellyfinItem[]> {
    const itemsApi = getItemsApi(this.getApi());
    const items: JellyfinItem[] = [];
    let startIndex = 0;

    while (true) {
      let page: BaseItemDto[];
      let totalCount: number;
      try {
        const response = await itemsApi.getItems({
          userId: this.connection?.userId || undefined,
          parentId,
          includeItemTypes: [...SYNCED_TYPES],
          recursive: true,
          fields: ['Path'],
          enableImages: false,
          startIndex,
          limit: PAGE_SIZE,
          sortBy: ['SortName'],
          sortOrder: ['Ascending'],
        });
        page = response.data.Items ?? [];
        totalCount = response.data.TotalRecordCount ?? 0;
      } catch (err) {
        throw new UpstreamError(`Failed to fetch items from library '${library}'`, { cause: err });
      }

      for (const dto of page) {
        const item = toLibraryItem(dto);
        if (item) items.push(item);
      }

      startIndex += page.length;
      if (page.length === 0 || startIndex >= totalCount) break;
    }

    console.log(`[Jellyfin] Library '${library}': ${items.length} items`);
    return items;
  }

  /** Restore the snapshot from the last sync stored in SQLite. */
  hydrate(): number {
    this.load(queries.getCachedLibrary(this.db));
    return this.entries.length;
  }

  /** Replace the in-memory snapshot and rebuild its indexes. */
  load(entries: LibraryEntry[]): void {
    this.entries = entries;
    this.series.clear();
    this.episodes.clear();
    this.seasons.clear();
    this.episodeCounts.clear();

    for (const entry of entries) {
      const { item } = entry;
      if (item.Type === 'Series') {
        this.series.set(item.Id, entry);
        continue;
      }
      if (item.Type !== 'Episode' || !item.SeriesId) continue;
      if (item.ParentIndexNumber === undefined || item.IndexNumber === undefined) continue;

      this.episodes.set(episodeKey(item.SeriesId, item.ParentIndexNumber, item.IndexNumber), item);
      this.episodeCounts.set(item.SeriesId, (this.episodeCounts.get(item.SeriesId) ?? 0) + 1);

      const seasons = this.seasons.get(item.SeriesId) ?? [];
      if (!seasons.includes(item.ParentIndexNumber)) {
        seasons.push(item.ParentIndexNumber);
        seasons.sort((a, b) => a - b);
      }
      this.seasons.set(item.SeriesId, seasons);
    }
  }

  stats(): LibrarySyncStats {
    let commercials = 0;
    for (const { item } of this.entries) {
      if (item.Type === 'Movie' || item.Type === 'Video') commercials++;
    }
    return { shows: this.series.size, episodes: this.episodes.size, commercials };
  }

  // ─── Catalog ──────────────────────────────────────────

  findShow(name: string, library: string): ShowHandle | null {
    for (const entry of this.series.values()) {
      if (sameName(entry.item.Name, name) && sameName(entry.library, library)) {
        return { id: entry.item.Id, name: entry.item.Name, library: entry.library };
      }
    }
    return null;
  }

  findEpisode(show: ShowHandle, season: number, episode: number): EpisodeRef | null {
    const item = this.episodes.get(episodeKey(show.id, season, episode));
    if (!item) return null;
    return {
      kind: 'episode',
      id: item.Id,
      showName: show.name,
      seasonNumber: season,
      episodeNumber: episode,
      title: item.Name,
      durationSeconds: ticksToSecs(item.RunTimeTicks),
    };
  }

  nextSeasonNumber(show: ShowHandle, afterSeason: number): number | null {
    const seasons = this.seasons.get(show.id) ?? [];
    // Specials live in season 0
    const next = seasons.find(s => s > 0 && s > afterSeason);
    return next ?? null;
  }

  listCommercials(libraryName: string): CommercialRef[] {
    const clips: CommercialRef[] = [];
    for (const { library, item } of this.entries) {
      if (item.Type === 'Series' || !sameName(library, libraryName)) continue;
      clips.push({
        kind: 'commercial',
        id: item.Id,
        title: item.Name,
        path: item.Path ?? null,
        durationSeconds: ticksToSecs(item.RunTimeTicks),
      });
    }
    return clips;
  }

  yearOf(show: ShowHandle): number | null {
    return this.series.get(show.id)?.item.ProductionYear ?? null;
  }

  // ─── Browsing ─────────────────────────────────────────

  listSeries(library?: string): SeriesSummary[] {
    const result: SeriesSummary[] = [];
    for (const entry of this.series.values()) {
      if (library && !sameName(entry.library, library)) continue;
      result.push({
        name: entry.item.Name,
        library: entry.library,
        year: entry.item.ProductionYear ?? null,
        episode_count: this.episodeCounts.get(entry.item.Id) ?? 0,
      });
    }
    return result.sort((a, b) => a.name.localeCompare(b.name));
  }

  /** Clip count and total duration per inferred category, uncategorized first. */
  commercialInventory(libraryName: string): CommercialInventoryRow[] {
    const rows = new Map<string, CommercialInventoryRow>();
    for (const clip of this.listCommercials(libraryName)) {
      const name = categoryFromPath(clip.path);
      const row = rows.get(name.toLowerCase()) ?? { name, count: 0, duration_secs: 0 };
      row.count++;
      row.duration_secs += durationSecsOf(clip);
      rows.set(name.toLowerCase(), row);
    }

    return [...rows.values()].sort((a, b) => {
      if (a.name === UNCATEGORIZED) return -1;
      if (b.name === UNCATEGORIZED) return 1;
      return a.name.localeCompare(b.name);
    });
  }
}

function episodeKey(seriesId: string, season: number, episode: number): string {
  return `${seriesId}:${season}:${episode}`;
}
