import Database from 'better-sqlite3';
import path from 'path';
import { fileURLToPath } from 'url';
import fs from 'fs';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

export const DEFAULT_SETTINGS: Record<string, unknown> = {
  commercial_library_name: 'Commercials',
  history_limit: 5,
};

export function initDatabase(): Database.Database {
  const dataDir = process.env.DATA_DIR || path.join(__dirname, '../../data');

  if (!fs.existsSync(dataDir)) {
    fs.mkdirSync(dataDir, { recursive: true });
  }

  const dbPath = path.join(dataDir, 'rerun.db');
  const db = new Database(dbPath);

  // Enable WAL mode for better concurrent read performance
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');

  runMigrations(db);
  console.log(`[Database] Opened ${dbPath}`);

  return db;
}

export function runMigrations(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS shows (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT NOT NULL COLLATE NOCASE UNIQUE,
      library TEXT NOT NULL DEFAULT 'TV Shows',
      year INTEGER,
      enabled INTEGER NOT NULL DEFAULT 1,
      created_at TEXT NOT NULL DEFAULT (datetime('now'))
    );

    CREATE TABLE IF NOT EXISTS playlists (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT NOT NULL COLLATE NOCASE UNIQUE,
      episodes_per_generation INTEGER NOT NULL DEFAULT 30
        CHECK(episodes_per_generation >= 1),
      sort_by TEXT NOT NULL DEFAULT 'premiere_year'
        CHECK(sort_by IN ('premiere_year', 'premiere_year_desc', 'alphabetical', 'config_order')),
      break_enabled INTEGER NOT NULL DEFAULT 1,
      break_style TEXT NOT NULL DEFAULT 'single'
        CHECK(break_style IN ('single', 'block', 'disabled')),
      break_frequency INTEGER NOT NULL DEFAULT 1,
      break_min_gap INTEGER NOT NULL DEFAULT 50,
      block_min_secs INTEGER NOT NULL DEFAULT 30,
      block_max_secs INTEGER NOT NULL DEFAULT 120,
      is_default INTEGER NOT NULL DEFAULT 0,
      created_at TEXT NOT NULL DEFAULT (datetime('now'))
    );

    CREATE TABLE IF NOT EXISTS playlist_shows (
      playlist_id INTEGER NOT NULL,
      show_id INTEGER NOT NULL,
      current_season INTEGER NOT NULL DEFAULT 1,
      current_episode INTEGER NOT NULL DEFAULT 1,
      position INTEGER NOT NULL DEFAULT 0,
      PRIMARY KEY (playlist_id, show_id),
      FOREIGN KEY (playlist_id) REFERENCES playlists(id) ON DELETE CASCADE,
      FOREIGN KEY (show_id) REFERENCES shows(id) ON DELETE CASCADE
    );

    CREATE TABLE IF NOT EXISTS commercial_categories (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT NOT NULL COLLATE NOCASE UNIQUE,
      search_terms TEXT NOT NULL DEFAULT '[]',
      weight REAL NOT NULL DEFAULT 1.0
    );

    CREATE TABLE IF NOT EXISTS settings (
      key TEXT PRIMARY KEY,
      value TEXT NOT NULL DEFAULT '{}'
    );

    CREATE TABLE IF NOT EXISTS generation_history (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      timestamp TEXT NOT NULL,
      playlist_name TEXT NOT NULL,
      episode_count INTEGER NOT NULL,
      shows TEXT NOT NULL DEFAULT '[]',
      runtime_secs REAL NOT NULL DEFAULT 0
    );

    CREATE TABLE IF NOT EXISTS published_items (
      playlist_id INTEGER PRIMARY KEY,
      items TEXT NOT NULL DEFAULT '[]',
      published_at TEXT NOT NULL,
      FOREIGN KEY (playlist_id) REFERENCES playlists(id) ON DELETE CASCADE
    );

    CREATE TABLE IF NOT EXISTS library_cache (
      id TEXT PRIMARY KEY,
      library TEXT NOT NULL,
      data TEXT NOT NULL,
      updated_at TEXT NOT NULL DEFAULT (datetime('now'))
    );

    -- Indexes
    CREATE INDEX IF NOT EXISTS idx_playlist_shows_order
      ON playlist_shows(playlist_id, position);

    CREATE INDEX IF NOT EXISTS idx_library_cache_library
      ON library_cache(library);
  `);

  // Insert default settings if not present
  const insertSetting = db.prepare(
    `INSERT OR IGNORE INTO settings (key, value) VALUES (?, ?)`
  );
  for (const [key, value] of Object.entries(DEFAULT_SETTINGS)) {
    insertSetting.run(key, JSON.stringify(value));
  }
}
