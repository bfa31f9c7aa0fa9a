import { Router } from 'express';
import type { Request } from 'express';
import * as queries from '../db/queries.js';
import { getLocals } from './locals.js';
import { NoDefaultPlaylistError } from '../services/errors.js';
import { exportHandler, generateHandler, previewHandler } from './playlists.js';

/** Shortcuts that act on the default playlist */
export const defaultPlaylistRoutes = Router();

function defaultPlaylist(req: Request): string {
  const playlist = queries.getDefaultPlaylist(getLocals(req).db);
  if (!playlist) throw new NoDefaultPlaylistError();
  return playlist.name;
}

// POST /api/generate
defaultPlaylistRoutes.post('/generate', generateHandler(defaultPlaylist));

// POST /api/preview
defaultPlaylistRoutes.post('/preview', previewHandler(defaultPlaylist));

// GET /api/export
defaultPlaylistRoutes.get('/export', exportHandler(defaultPlaylist));
