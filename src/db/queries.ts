import type Database from 'better-sqlite3';
import type {
  BreakPolicy,
  CommercialCategory,
  CommercialCategoryInput,
  GenerationRecord,
  HistoryEntry,
  JellyfinItem,
  LibraryEntry,
  Playlist,
  PlaylistDetail,
  PlaylistInput,
  PlaylistParsed,
  PlaylistShow,
  PublishedItems,
  ScheduledItem,
  Show,
  ShowInput,
  ShowParsed,
} from '../types/index.js';

function parseStringArray(json: string): string[] {
  const value: unknown = JSON.parse(json);
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : [];
}

// ─── Shows ────────────────────────────────────────────────

function parseShow(row: Show): ShowParsed {
  return { ...row, enabled: row.enabled === 1 };
}

export function getAllShows(db: Database.Database): ShowParsed[] {
  const rows = db.prepare('SELECT * FROM shows ORDER BY id').all() as Show[];
  return rows.map(parseShow);
}

export function getShowById(db: Database.Database, id: number): ShowParsed | undefined {
  const row = db.prepare('SELECT * FROM shows WHERE id = ?').get(id) as Show | undefined;
  return row ? parseShow(row) : undefined;
}

/** Case-insensitive lookup */
export function getShowByName(db: Database.Database, name: string): ShowParsed | undefined {
  const row = db.prepare('SELECT * FROM shows WHERE name = ? COLLATE NOCASE').get(name) as Show | undefined;
  return row ? parseShow(row) : undefined;
}

export function createShow(db: Database.Database, data: ShowInput): ShowParsed {
  const result = db.prepare(
    'INSERT INTO shows (name, library, year, enabled) VALUES (?, ?, ?, ?)'
  ).run(data.name, data.library ?? 'TV Shows', data.year ?? null, data.enabled === false ? 0 : 1);

  const show = getShowById(db, Number(result.lastInsertRowid));
  if (!show) throw new Error(`Show '${data.name}' was not stored`);
  return show;
}

export function updateShow(
  db: Database.Database,
  id: number,
  data: Partial<ShowInput>
): ShowParsed | undefined {
  const fields: string[] = [];
  const values: unknown[] = [];

  if (data.name !== undefined) { fields.push('name = ?'); values.push(data.name); }
  if (data.library !== undefined) { fields.push('library = ?'); values.push(data.library); }
  if (data.year !== undefined) { fields.push('year = ?'); values.push(data.year); }
  if (data.enabled !== undefined) { fields.push('enabled = ?'); values.push(data.enabled ? 1 : 0); }

  if (fields.length === 0) return getShowById(db, id);

  values.push(id);
  db.prepare(`UPDATE shows SET ${fields.join(', ')} WHERE id = ?`).run(...values);
  return getShowById(db, id);
}

/** Also removes the show from every playlist (ON DELETE CASCADE) */
export function deleteShow(db: Database.Database, id: number): boolean {
  const result = db.prepare('DELETE FROM shows WHERE id = ?').run(id);
  return result.changes > 0;
}

// ─── Playlists ────────────────────────────────────────────

function parsePlaylist(row: Playlist): PlaylistParsed {
  return {
    id: row.id,
    name: row.name,
    episodes_per_generation: row.episodes_per_generation,
    sort_by: row.sort_by,
    breaks: {
      enabled: row.break_enabled === 1,
      style: row.break_style,
      frequency: row.break_frequency,
      minGap: row.break_min_gap,
      blockDuration: { min: row.block_min_secs, max: row.block_max_secs },
    },
    is_default: row.is_default === 1,
    created_at: row.created_at,
  };
}

export function getAllPlaylists(db: Database.Database): PlaylistParsed[] {
  const rows = db.prepare('SELECT * FROM playlists ORDER BY id').all() as Playlist[];
  return rows.map(parsePlaylist);
}

export function getPlaylistById(db: Database.Database, id: number): PlaylistParsed | undefined {
  const row = db.prepare('SELECT * FROM playlists WHERE id = ?').get(id) as Playlist | undefined;
  return row ? parsePlaylist(row) : undefined;
}

/** Case-insensitive lookup */
export function getPlaylistByName(db: Database.Database, name: string): PlaylistParsed | undefined {
  const row = db.prepare('SELECT * FROM playlists WHERE name = ? COLLATE NOCASE').get(name) as Playlist | undefined;
  return row ? parsePlaylist(row) : undefined;
}

export function getDefaultPlaylist(db: Database.Database): PlaylistParsed | undefined {
  const row = db.prepare('SELECT * FROM playlists WHERE is_default = 1 LIMIT 1').get() as Playlist | undefined;
  return row ? parsePlaylist(row) : undefined;
}

function breakColumns(breaks: Partial<BreakPolicy>): [string, unknown][] {
  const columns: [string, unknown][] = [];
  if (breaks.enabled !== undefined) columns.push(['break_enabled', breaks.enabled ? 1 : 0]);
  if (breaks.style !== undefined) columns.push(['break_style', breaks.style]);
  if (breaks.frequency !== undefined) columns.push(['break_frequency', breaks.frequency]);
  if (breaks.minGap !== undefined) columns.push(['break_min_gap', breaks.minGap]);
  if (breaks.blockDuration !== undefined) {
    columns.push(['block_min_secs', breaks.blockDuration.min]);
    columns.push(['block_max_secs', breaks.blockDuration.max]);
  }
  return columns;
}

export function createPlaylist(db: Database.Database, data: PlaylistInput): PlaylistParsed {
  // The first playlist becomes the default
  const count = (db.prepare('SELECT COUNT(*) as cnt FROM playlists').get() as { cnt: number }).cnt;

  const columns: [string, unknown][] = [['name', data.name], ['is_default', count === 0 ? 1 : 0]];
  if (data.episodes_per_generation !== undefined) columns.push(['episodes_per_generation', data.episodes_per_generation]);
  if (data.sort_by !== undefined) columns.push(['sort_by', data.sort_by]);
  columns.push(...breakColumns(data.breaks ?? {}));

  const result = db.prepare(
    `INSERT INTO playlists (${columns.map(([c]) => c).join(', ')})
     VALUES (${columns.map(() => '?').join(', ')})`
  ).run(...columns.map(([, v]) => v));

  const playlist = getPlaylistById(db, Number(result.lastInsertRowid));
  if (!playlist) throw new Error(`Playlist '${data.name}' was not stored`);
  return playlist;
}

export function updatePlaylist(
  db: Database.Database,
  id: number,
  data: Partial<PlaylistInput>
): PlaylistParsed | undefined {
  const columns: [string, unknown][] = [];
  if (data.name !== undefined) columns.push(['name', data.name]);
  if (data.episodes_per_generation !== undefined) columns.push(['episodes_per_generation', data.episodes_per_generation]);
  if (data.sort_by !== undefined) columns.push(['sort_by', data.sort_by]);
  columns.push(...breakColumns(data.breaks ?? {}));

  if (columns.length === 0) return getPlaylistById(db, id);

  db.prepare(
    `UPDATE playlists SET ${columns.map(([c]) => `${c} = ?`).join(', ')} WHERE id = ?`
  ).run(...columns.map(([, v]) => v), id);
  return getPlaylistById(db, id);
}

/** Deleting the default playlist hands the flag to the oldest remaining one */
export function deletePlaylist(db: Database.Database, id: number): boolean {
  const txn = db.transaction(() => {
    const result = db.prepare('DELETE FROM playlists WHERE id = ?').run(id);
    if (result.changes === 0) return false;

    const hasDefault = db.prepare('SELECT 1 FROM playlists WHERE is_default = 1').get();
    if (!hasDefault) {
      db.prepare(
        'UPDATE playlists SET is_default = 1 WHERE id = (SELECT MIN(id) FROM playlists)'
      ).run();
    }
    return true;
  });
  return txn();
}

export function setDefaultPlaylist(db: Database.Database, id: number): void {
  const txn = db.transaction(() => {
    db.prepare('UPDATE playlists SET is_default = 0').run();
    db.prepare('UPDATE playlists SET is_default = 1 WHERE id = ?').run(id);
  });
  txn();
}

// ─── Playlist Shows (membership + cursor) ─────────────────

export function getPlaylistShows(db: Database.Database, playlistId: number): PlaylistShow[] {
  return db.prepare(
    `SELECT ps.playlist_id, ps.show_id, s.name AS show_name,
            ps.current_season, ps.current_episode, ps.position
     FROM playlist_shows ps
     JOIN shows s ON s.id = ps.show_id
     WHERE ps.playlist_id = ?
     ORDER BY ps.position, ps.show_id`
  ).all(playlistId) as PlaylistShow[];
}

export function getPlaylistDetail(db: Database.Database, name: string): PlaylistDetail | undefined {
  const playlist = getPlaylistByName(db, name);
  if (!playlist) return undefined;
  return { ...playlist, shows: getPlaylistShows(db, playlist.id) };
}

/** Appends the show at the end of the playlist's order. Returns false if it was already a member. */
export function addShowToPlaylist(db: Database.Database, playlistId: number, showId: number): boolean {
  const result = db.prepare(
    `INSERT OR IGNORE INTO playlist_shows (playlist_id, show_id, position)
     VALUES (?, ?, (SELECT COALESCE(MAX(position), -1) + 1 FROM playlist_shows WHERE playlist_id = ?))`
  ).run(playlistId, showId, playlistId);
  return result.changes > 0;
}

export function removeShowFromPlaylist(db: Database.Database, playlistId: number, showId: number): boolean {
  const result = db.prepare(
    'DELETE FROM playlist_shows WHERE playlist_id = ? AND show_id = ?'
  ).run(playlistId, showId);
  return result.changes > 0;
}

export function setShowPosition(
  db: Database.Database,
  playlistId: number,
  showId: number,
  season: number,
  episode: number
): boolean {
  const result = db.prepare(
    `UPDATE playlist_shows SET current_season = ?, current_episode = ?
     WHERE playlist_id = ? AND show_id = ?`
  ).run(season, episode, playlistId, showId);
  return result.changes > 0;
}

export function resetPlaylistPositions(db: Database.Database, playlistId: number): void {
  db.prepare(
    'UPDATE playlist_shows SET current_season = 1, current_episode = 1 WHERE playlist_id = ?'
  ).run(playlistId);
}

// ─── Commercial Categories ────────────────────────────────

export function getCommercialCategories(db: Database.Database): CommercialCategory[] {
  const rows = db.prepare('SELECT * FROM commercial_categories ORDER BY id').all() as
    { id: number; name: string; search_terms: string; weight: number }[];
  return rows.map(row => ({ ...row, search_terms: parseStringArray(row.search_terms) }));
}

export function replaceCommercialCategories(
  db: Database.Database,
  categories: CommercialCategoryInput[]
): CommercialCategory[] {
  const txn = db.transaction(() => {
    db.prepare('DELETE FROM commercial_categories').run();
    const insert = db.prepare(
      'INSERT INTO commercial_categories (name, search_terms, weight) VALUES (?, ?, ?)'
    );
    for (const cat of categories) {
      insert.run(cat.name, JSON.stringify(cat.search_terms ?? []), cat.weight ?? 1.0);
    }
  });
  txn();
  return getCommercialCategories(db);
}

// ─── Generation History ───────────────────────────────────

/** Newest first */
export function getHistory(db: Database.Database): HistoryEntry[] {
  const rows = db.prepare('SELECT * FROM generation_history ORDER BY id DESC').all() as
    (Omit<HistoryEntry, 'shows'> & { shows: string })[];
  return rows.map(row => ({ ...row, shows: parseStringArray(row.shows) }));
}

/** Append an entry and drop all but the newest `limit` */
export function appendHistory(db: Database.Database, entry: Omit<HistoryEntry, 'id'>, limit: number): void {
  db.prepare(
    `INSERT INTO generation_history (timestamp, playlist_name, episode_count, shows, runtime_secs)
     VALUES (?, ?, ?, ?, ?)`
  ).run(entry.timestamp, entry.playlist_name, entry.episode_count, JSON.stringify(entry.shows), entry.runtime_secs);

  db.prepare(
    `DELETE FROM generation_history
     WHERE id NOT IN (SELECT id FROM generation_history ORDER BY id DESC LIMIT ?)`
  ).run(Math.max(1, limit));
}

/**
 * Persist everything a generation run changed: cursors, backfilled premiere
 * years and the history entry. All or nothing.
 */
export function saveGenerationResults(db: Database.Database, record: GenerationRecord): void {
  const txn = db.transaction(() => {
    for (const cursor of record.cursors) {
      setShowPosition(db, record.playlistId, cursor.showId, cursor.season, cursor.episode);
    }
    const setYear = db.prepare('UPDATE shows SET year = ? WHERE id = ? AND year IS NULL');
    for (const { showId, year } of record.years) {
      setYear.run(year, showId);
    }
    appendHistory(db, record.history, record.historyLimit);
    db.prepare(
      `INSERT INTO published_items (playlist_id, items, published_at) VALUES (?, ?, ?)
       ON CONFLICT(playlist_id) DO UPDATE SET items = excluded.items, published_at = excluded.published_at`
    ).run(record.playlistId, JSON.stringify(record.items), record.history.timestamp);
  });
  txn();
}

/** Items of the playlist's last published run */
export function getPublishedItems(db: Database.Database, playlistId: number): PublishedItems | undefined {
  const row = db.prepare('SELECT items, published_at FROM published_items WHERE playlist_id = ?').get(playlistId) as
    { items: string; published_at: string } | undefined;
  if (!row) return undefined;
  const items: ScheduledItem[] = JSON.parse(row.items);
  return { items, published_at: row.published_at };
}

// ─── Settings ─────────────────────────────────────────────

export function getSetting(db: Database.Database, key: string): unknown {
  const row = db.prepare('SELECT value FROM settings WHERE key = ?').get(key) as { value: string } | undefined;
  return row ? JSON.parse(row.value) : undefined;
}

export function setSetting(db: Database.Database, key: string, value: unknown): void {
  db.prepare(
    'INSERT INTO settings (key, value) VALUES (?, ?) ON CONFLICT(key) DO UPDATE SET value = excluded.value'
  ).run(key, JSON.stringify(value));
}

export function getAllSettings(db: Database.Database): Record<string, unknown> {
  const rows = db.prepare('SELECT * FROM settings').all() as { key: string; value: string }[];
  const result: Record<string, unknown> = {};
  for (const row of rows) {
    result[row.key] = JSON.parse(row.value);
  }
  return result;
}

// ─── Library Cache ────────────────────────────────────────

export function getCachedLibrary(db: Database.Database): LibraryEntry[] {
  const rows = db.prepare('SELECT library, data FROM library_cache ORDER BY rowid').all() as { library: string; data: string }[];
  return rows.map(r => {
    const item: JellyfinItem = JSON.parse(r.data);
    return { library: r.library, item };
  });
}

/** Swap the whole cached snapshot for a freshly synced one */
export function replaceLibraryCache(db: Database.Database, entries: LibraryEntry[]): void {
  const txn = db.transaction(() => {
    db.prepare('DELETE FROM library_cache').run();
    const insert = db.prepare(
      `INSERT INTO library_cache (id, library, data, updated_at)
       VALUES (?, ?, ?, datetime('now'))
       ON CONFLICT(id) DO UPDATE SET
         library = excluded.library,
         data = excluded.data,
         updated_at = excluded.updated_at`
    );
    for (const entry of entries) {
      insert.run(entry.item.Id, entry.library, JSON.stringify(entry.item));
    }
  });
  txn();
}
