import 'dotenv/config';
import { createServer } from 'http';
import { initDatabase } from './db/index.js';
import { initWebSocket, broadcast } from './websocket/index.js';
import { createApp } from './app.js';
import { JellyfinCatalog } from './services/JellyfinCatalog.js';
import type { JellyfinConnection } from './services/JellyfinCatalog.js';
import { JellyfinPlaylistSink } from './services/JellyfinPlaylistSink.js';
import { GenerationService } from './services/GenerationService.js';
import { errorMessage } from './services/errors.js';

const PORT = parseInt(process.env.PORT || '3080', 10);

function jellyfinConnection(): JellyfinConnection | null {
  const url = process.env.JELLYFIN_URL?.trim();
  const token = process.env.JELLYFIN_TOKEN?.trim();
  if (!url || !token) return null;
  return {
    url: url.replace(/\/$/, ''),
    token,
    userId: process.env.JELLYFIN_USER_ID?.trim() ?? '',
  };
}

function librarySyncHours(): number {
  const parsed = parseInt(process.env.LIBRARY_SYNC_HOURS || '6', 10);
  return Math.max(1, Math.min(168, Number.isFinite(parsed) ? parsed : 6));
}

// Initialize database
const db = initDatabase();

// Initialize services
const connection = jellyfinConnection();
const catalog = new JellyfinCatalog(db, connection);
const sink = new JellyfinPlaylistSink(connection);
const generationService = new GenerationService(db, catalog, sink);

const allowedOrigins = process.env.ALLOWED_ORIGINS
  ? process.env.ALLOWED_ORIGINS.split(',').map(o => o.trim())
  : undefined;

const app = createApp(
  { db, catalog, generationService },
  {
    allowedOrigins,
    trustProxy: process.env.TRUST_PROXY === '1' || process.env.TRUST_PROXY === 'true',
  }
);
const server = createServer(app);

// Initialize WebSocket
const wss = initWebSocket(server);
app.locals.wss = wss;

server.listen(PORT, '0.0.0.0', () => {
  console.log(`[Rerun] Server running on http://0.0.0.0:${PORT}`);

  bootSequence().catch(err => {
    console.error('[Rerun] Boot sequence error:', err);
  });
});

async function syncLibrary(): Promise<void> {
  const stats = await catalog.syncLibrary();
  broadcast(wss, { type: 'library:synced', payload: stats });
}

async function bootSequence(): Promise<void> {
  const cached = catalog.hydrate();
  if (cached > 0) {
    console.log(`[Rerun] Loaded ${cached} library items from cache`);
  }

  if (!catalog.isConfigured) {
    console.log('[Rerun] No Jellyfin server configured. Set JELLYFIN_URL and JELLYFIN_TOKEN.');
    return;
  }

  try {
    console.log('[Rerun] Syncing Jellyfin library...');
    await syncLibrary();
    console.log('[Rerun] Boot sequence complete!');
  } catch (err) {
    console.error('[Rerun] Library sync failed, using cached library:', errorMessage(err));
  }

  const hours = librarySyncHours();
  console.log(`[Rerun] Library re-sync every ${hours}h`);
  setInterval(async () => {
    try {
      await syncLibrary();
    } catch (err) {
      console.error('[Rerun] Scheduled library sync error:', errorMessage(err));
    }
  }, hours * 60 * 60 * 1000);
}
