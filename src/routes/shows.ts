import { Router } from 'express';
import type { Request, Response } from 'express';
import * as queries from '../db/queries.js';
import { getLocals } from './locals.js';
import { parseInteger, parseShowInput, parseShowUpdate } from '../utils/validation.js';
import { resolveShow } from '../services/ShowMatcher.js';
import type { JellyfinCatalog, SeriesSummary } from '../services/JellyfinCatalog.js';
import {
  AmbiguousShowError,
  ShowHasNoEpisodesError,
  ShowNotFoundError,
  errorMessage,
  errorStatus,
} from '../services/errors.js';

export const showRoutes = Router();

// GET /api/shows - List all shows
showRoutes.get('/', (req: Request, res: Response) => {
  try {
    const { db } = getLocals(req);
    res.json(queries.getAllShows(db));
  } catch (err) {
    res.status(500).json({ error: errorMessage(err) });
  }
});

/** Find the library series a typed name refers to, optionally within one library. */
function matchSeries(catalog: JellyfinCatalog, query: string, library?: string): SeriesSummary {
  const series = catalog.listSeries(library);
  if (series.length === 0) {
    throw new ShowNotFoundError(
      library ? `No shows found in library '${library}'` : 'No shows found in the library. Run a library sync first.'
    );
  }

  const resolution = resolveShow(query, series);
  if (resolution.kind === 'none') {
    throw new ShowNotFoundError(`No match found for '${query}'. Check the show name or library.`);
  }
  if (resolution.kind === 'ambiguous') {
    throw new AmbiguousShowError(query, resolution.candidates);
  }
  if (resolution.series.episode_count === 0) {
    throw new ShowHasNoEpisodesError(resolution.series.name);
  }
  return resolution.series;
}

// POST /api/shows - Add a library show to the pool under its library title
showRoutes.post('/', (req: Request, res: Response) => {
  try {
    const { db, catalog } = getLocals(req);
    const input = parseShowInput(req.body);

    if (queries.getShowByName(db, input.name)) {
      res.status(409).json({ error: `Show '${input.name}' already exists` });
      return;
    }

    const series = matchSeries(catalog, input.name, input.library);
    if (queries.getShowByName(db, series.name)) {
      res.status(409).json({ error: `Show '${series.name}' already exists` });
      return;
    }

    const show = queries.createShow(db, {
      name: series.name,
      library: series.library,
      year: series.year ?? input.year ?? null,
      enabled: input.enabled,
    });
    console.log(`[Shows] Added '${show.name}' from '${show.library}' (${series.episode_count} episodes)`);
    res.status(201).json(show);
  } catch (err) {
    const candidates = err instanceof AmbiguousShowError ? { candidates: err.candidates } : {};
    res.status(errorStatus(err)).json({ error: errorMessage(err), ...candidates });
  }
});

// PUT /api/shows/:id - Update a show
showRoutes.put('/:id', (req: Request, res: Response) => {
  try {
    const { db } = getLocals(req);
    const id = parseInteger(req.params.id, 'id', 1);
    const update = parseShowUpdate(req.body);

    if (update.name !== undefined) {
      const clash = queries.getShowByName(db, update.name);
      if (clash && clash.id !== id) {
        res.status(409).json({ error: `Show '${update.name}' already exists` });
        return;
      }
    }

    const show = queries.updateShow(db, id, update);
    if (!show) {
      res.status(404).json({ error: 'Show not found' });
      return;
    }
    res.json(show);
  } catch (err) {
    res.status(errorStatus(err)).json({ error: errorMessage(err) });
  }
});

// DELETE /api/shows/:id - Remove a show (and its playlist memberships)
showRoutes.delete('/:id', (req: Request, res: Response) => {
  try {
    const { db } = getLocals(req);
    const id = parseInteger(req.params.id, 'id', 1);
    if (!queries.deleteShow(db, id)) {
      res.status(404).json({ error: 'Show not found' });
      return;
    }
    res.json({ success: true });
  } catch (err) {
    res.status(errorStatus(err)).json({ error: errorMessage(err) });
  }
});
