import { Router } from 'express';
import type { Request, Response } from 'express';
import { getLocals } from './locals.js';
import { broadcast } from '../websocket/index.js';
import { errorMessage, errorStatus } from '../services/errors.js';

export const libraryRoutes = Router();

// POST /api/library/sync - Re-read the Jellyfin library
libraryRoutes.post('/sync', async (req: Request, res: Response) => {
  try {
    const { catalog, wss } = getLocals(req);
    const stats = await catalog.syncLibrary();
    if (wss) broadcast(wss, { type: 'library:synced', payload: stats });
    res.json(stats);
  } catch (err) {
    console.error('[Jellyfin] Library sync failed:', errorMessage(err));
    res.status(errorStatus(err)).json({ error: errorMessage(err) });
  }
});

// GET /api/library/shows?library=TV%20Shows - Series in the synced library
libraryRoutes.get('/shows', (req: Request, res: Response) => {
  try {
    const { catalog } = getLocals(req);
    const library = typeof req.query.library === 'string' ? req.query.library : undefined;
    res.json(catalog.listSeries(library));
  } catch (err) {
    res.status(500).json({ error: errorMessage(err) });
  }
});
