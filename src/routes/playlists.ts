import { Router } from 'express';
import type { Request, Response } from 'express';
import type Database from 'better-sqlite3';
import * as queries from '../db/queries.js';
import type { PlaylistParsed, ScheduledItem } from '../types/index.js';
import { DEFAULT_BREAK_POLICY } from '../types/index.js';
import { getLocals } from './locals.js';
import type { AppLocals } from './locals.js';
import { broadcast } from '../websocket/index.js';
import { NothingPublishedError, PlaylistNotFoundError, errorMessage, errorStatus } from '../services/errors.js';
import { exportRows, toCsv } from '../utils/export.js';
import {
  mergeBreakPolicy,
  parseExportQuery,
  parseGenerateRequest,
  parsePlaylistInput,
  parsePlaylistUpdate,
  parsePositionUpdate,
} from '../utils/validation.js';

export const playlistRoutes = Router();

function requirePlaylist(db: Database.Database, name: string): PlaylistParsed {
  const playlist = queries.getPlaylistByName(db, name);
  if (!playlist) throw new PlaylistNotFoundError(name);
  return playlist;
}

// GET /api/playlists - List playlists with their shows
playlistRoutes.get('/', (req: Request, res: Response) => {
  try {
    const { db } = getLocals(req);
    const playlists = queries.getAllPlaylists(db).map(p => ({
      ...p,
      shows: queries.getPlaylistShows(db, p.id),
    }));
    res.json(playlists);
  } catch (err) {
    res.status(500).json({ error: errorMessage(err) });
  }
});

// POST /api/playlists - Create a playlist (the first one becomes the default)
playlistRoutes.post('/', (req: Request, res: Response) => {
  try {
    const { db } = getLocals(req);
    const input = parsePlaylistInput(req.body);

    if (queries.getPlaylistByName(db, input.name)) {
      res.status(409).json({ error: `Playlist '${input.name}' already exists` });
      return;
    }

    const playlist = queries.createPlaylist(db, {
      ...input,
      breaks: mergeBreakPolicy(DEFAULT_BREAK_POLICY, input.breaks),
    });
    res.status(201).json({ ...playlist, shows: [] });
  } catch (err) {
    res.status(errorStatus(err)).json({ error: errorMessage(err) });
  }
});

// GET /api/playlists/:name - Playlist with shows and positions
playlistRoutes.get('/:name', (req: Request, res: Response) => {
  try {
    const { db } = getLocals(req);
    const detail = queries.getPlaylistDetail(db, req.params.name);
    if (!detail) throw new PlaylistNotFoundError(req.params.name);
    res.json(detail);
  } catch (err) {
    res.status(errorStatus(err)).json({ error: errorMessage(err) });
  }
});

// PUT /api/playlists/:name - Update settings, break policy or name
playlistRoutes.put('/:name', (req: Request, res: Response) => {
  try {
    const { db } = getLocals(req);
    const playlist = requirePlaylist(db, req.params.name);
    const update = parsePlaylistUpdate(req.body);

    if (update.name !== undefined) {
      const clash = queries.getPlaylistByName(db, update.name);
      if (clash && clash.id !== playlist.id) {
        res.status(409).json({ error: `Playlist '${update.name}' already exists` });
        return;
      }
    }
    if (update.breaks !== undefined) {
      update.breaks = mergeBreakPolicy(playlist.breaks, update.breaks);
    }

    queries.updatePlaylist(db, playlist.id, update);
    res.json(queries.getPlaylistDetail(db, update.name ?? playlist.name));
  } catch (err) {
    res.status(errorStatus(err)).json({ error: errorMessage(err) });
  }
});

// DELETE /api/playlists/:name
playlistRoutes.delete('/:name', (req: Request, res: Response) => {
  try {
    const { db } = getLocals(req);
    const playlist = requirePlaylist(db, req.params.name);
    queries.deletePlaylist(db, playlist.id);
    res.json({ success: true });
  } catch (err) {
    res.status(errorStatus(err)).json({ error: errorMessage(err) });
  }
});

// POST /api/playlists/:name/default - Make this the default playlist
playlistRoutes.post('/:name/default', (req: Request, res: Response) => {
  try {
    const { db } = getLocals(req);
    const playlist = requirePlaylist(db, req.params.name);
    queries.setDefaultPlaylist(db, playlist.id);
    res.json(queries.getPlaylistDetail(db, playlist.name));
  } catch (err) {
    res.status(errorStatus(err)).json({ error: errorMessage(err) });
  }
});

// ─── Membership ───────────────────────────────────────

// POST /api/playlists/:name/shows - Add a show from the pool, starting at S01E01
playlistRoutes.post('/:name/shows', (req: Request, res: Response) => {
  try {
    const { db } = getLocals(req);
    const playlist = requirePlaylist(db, req.params.name);
    const showName: unknown = req.body?.show;
    if (typeof showName !== 'string' || showName.trim() === '') {
      res.status(400).json({ error: 'show is required' });
      return;
    }

    const show = queries.getShowByName(db, showName.trim());
    if (!show) {
      res.status(404).json({ error: `Show '${showName}' not found` });
      return;
    }
    if (!queries.addShowToPlaylist(db, playlist.id, show.id)) {
      res.status(409).json({ error: `'${show.name}' is already in '${playlist.name}'` });
      return;
    }

    res.status(201).json(queries.getPlaylistDetail(db, playlist.name));
  } catch (err) {
    res.status(errorStatus(err)).json({ error: errorMessage(err) });
  }
});

// POST /api/playlists/:name/shows/all - Add every enabled show not yet in the playlist
playlistRoutes.post('/:name/shows/all', (req: Request, res: Response) => {
  try {
    const { db } = getLocals(req);
    const playlist = requirePlaylist(db, req.params.name);

    const added: string[] = [];
    for (const show of queries.getAllShows(db)) {
      if (show.enabled && queries.addShowToPlaylist(db, playlist.id, show.id)) {
        added.push(show.name);
      }
    }

    res.json({ added, playlist: queries.getPlaylistDetail(db, playlist.name) });
  } catch (err) {
    res.status(errorStatus(err)).json({ error: errorMessage(err) });
  }
});

// DELETE /api/playlists/:name/shows/:showName
playlistRoutes.delete('/:name/shows/:showName', (req: Request, res: Response) => {
  try {
    const { db } = getLocals(req);
    const playlist = requirePlaylist(db, req.params.name);
    const show = queries.getShowByName(db, req.params.showName);
    if (!show || !queries.removeShowFromPlaylist(db, playlist.id, show.id)) {
      res.status(404).json({ error: `'${req.params.showName}' is not in '${playlist.name}'` });
      return;
    }
    res.json(queries.getPlaylistDetail(db, playlist.name));
  } catch (err) {
    res.status(errorStatus(err)).json({ error: errorMessage(err) });
  }
});

// PUT /api/playlists/:name/positions - Set one show's next episode, or { reset: true } for all
playlistRoutes.put('/:name/positions', (req: Request, res: Response) => {
  try {
    const { db } = getLocals(req);
    const playlist = requirePlaylist(db, req.params.name);
    const update = parsePositionUpdate(req.body);

    if ('reset' in update) {
      queries.resetPlaylistPositions(db, playlist.id);
    } else {
      const show = queries.getShowByName(db, update.show);
      if (!show || !queries.setShowPosition(db, playlist.id, show.id, update.season, update.episode)) {
        res.status(404).json({ error: `'${update.show}' is not in '${playlist.name}'` });
        return;
      }
    }

    res.json(queries.getPlaylistDetail(db, playlist.name));
  } catch (err) {
    res.status(errorStatus(err)).json({ error: errorMessage(err) });
  }
});

// ─── Generation ───────────────────────────────────────

type GenerateRequest = ReturnType<typeof parseGenerateRequest>;

/** Picks the playlist a generation route acts on */
export type PlaylistResolver = (req: Request) => string;

const namedPlaylist: PlaylistResolver = req => req.params.name;

async function runGeneration(locals: AppLocals, name: string, request: GenerateRequest, preview: boolean) {
  const { generationService, wss } = locals;

  const outcome = await generationService.generate(name, {
    ...request,
    preview,
    onProgress: (current, total) => {
      if (wss) broadcast(wss, { type: 'generate:progress', payload: { playlist: name, current, total } });
    },
  });

  if (wss && !preview) broadcast(wss, { type: 'generate:complete', payload: outcome.summary });
  return outcome;
}

export function generateHandler(resolve: PlaylistResolver) {
  return async (req: Request, res: Response) => {
    let name: string | undefined;
    try {
      name = resolve(req);
      const { summary } = await runGeneration(getLocals(req), name, parseGenerateRequest(req.body), false);
      res.json(summary);
    } catch (err) {
      console.error(`[Generation] '${name ?? 'default'}' failed:`, errorMessage(err));
      res.status(errorStatus(err)).json({ error: errorMessage(err) });
    }
  };
}

export function previewHandler(resolve: PlaylistResolver) {
  return async (req: Request, res: Response) => {
    try {
      const name = resolve(req);
      const { summary, items } = await runGeneration(getLocals(req), name, parseGenerateRequest(req.body), true);
      res.json({ ...summary, items });
    } catch (err) {
      res.status(errorStatus(err)).json({ error: errorMessage(err) });
    }
  };
}

export function exportHandler(resolve: PlaylistResolver) {
  return async (req: Request, res: Response) => {
    try {
      const locals = getLocals(req);
      const name = resolve(req);
      const request = parseExportQuery(req.query);

      let items: ScheduledItem[];
      if (request.source === 'preview') {
        const generate: GenerateRequest = { fromStart: false };
        if (request.episodeCount !== undefined) generate.episodeCount = request.episodeCount;
        items = (await runGeneration(locals, name, generate, true)).items;
      } else {
        const playlist = requirePlaylist(locals.db, name);
        const published = queries.getPublishedItems(locals.db, playlist.id);
        if (!published) throw new NothingPublishedError(playlist.name);
        items = published.items;
      }

      const rows = exportRows(items);
      if (request.format === 'json') {
        res.json(rows);
        return;
      }
      const filename = name.replace(/[^A-Za-z0-9._-]+/g, '_');
      res.setHeader('Content-Type', 'text/csv; charset=utf-8');
      res.setHeader('Content-Disposition', `attachment; filename="${filename}.csv"`);
      res.send(toCsv(rows));
    } catch (err) {
      res.status(errorStatus(err)).json({ error: errorMessage(err) });
    }
  };
}

// POST /api/playlists/:name/generate - Build the playlist and publish it
playlistRoutes.post('/:name/generate', generateHandler(namedPlaylist));

// POST /api/playlists/:name/preview - Same as generate, but nothing is published or saved
playlistRoutes.post('/:name/preview', previewHandler(namedPlaylist));

// GET /api/playlists/:name/export?format=csv|json&source=last|preview
playlistRoutes.get('/:name/export', exportHandler(namedPlaylist));
