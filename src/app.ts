import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import type { AppLocals } from './routes/locals.js';
import { showRoutes } from './routes/shows.js';
import { playlistRoutes } from './routes/playlists.js';
import { commercialRoutes } from './routes/commercials.js';
import { libraryRoutes } from './routes/library.js';
import { historyRoutes } from './routes/history.js';
import { settingsRoutes } from './routes/settings.js';
import { defaultPlaylistRoutes } from './routes/defaults.js';

export interface AppOptions {
  allowedOrigins?: string[];
  trustProxy?: boolean;
}

export function createApp(locals: AppLocals, options: AppOptions = {}): express.Express {
  const app = express();

  // ─── Security middleware ──────────────────────────────

  // Trust proxy when behind reverse proxy (nginx, Caddy, etc.)
  if (options.trustProxy) {
    app.set('trust proxy', 1);
  }

  app.use(helmet());

  // CORS: restrict to configured origins, or allow all in dev/LAN mode
  app.use(cors(options.allowedOrigins ? { origin: options.allowedOrigins } : undefined));

  // Body size limit
  app.use(express.json({ limit: '1mb' }));

  // Global rate limiter: 200 requests per 15 minutes per IP
  app.use('/api', rateLimit({
    windowMs: 15 * 60 * 1000,
    max: 200,
    standardHeaders: true,
    legacyHeaders: false,
    message: { error: 'Too many requests, please try again later.' },
  }));

  // Generation and sync hit the media server; keep them on a shorter leash
  const strictLimiter = rateLimit({
    windowMs: 15 * 60 * 1000,
    max: 30,
    standardHeaders: true,
    legacyHeaders: false,
    message: { error: 'Too many requests, please try again later.' },
  });
  app.use('/api/playlists/:name/generate', strictLimiter);
  app.use('/api/generate', strictLimiter);
  app.use('/api/library/sync', strictLimiter);

  // Make services available to routes
  app.locals.db = locals.db;
  app.locals.catalog = locals.catalog;
  app.locals.generationService = locals.generationService;
  app.locals.wss = locals.wss;

  app.get('/api/health', (_req, res) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      library: { configured: locals.catalog.isConfigured, items: locals.catalog.size },
    });
  });

  // ─── API Routes ───────────────────────────────────────
  app.use('/api/shows', showRoutes);
  app.use('/api/playlists', playlistRoutes);
  app.use('/api/commercials', commercialRoutes);
  app.use('/api/library', libraryRoutes);
  app.use('/api/history', historyRoutes);
  app.use('/api/settings', settingsRoutes);
  app.use('/api', defaultPlaylistRoutes);

  app.use('/api', (_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  return app;
}
