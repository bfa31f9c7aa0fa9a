import { Router } from 'express';
import type { Request, Response } from 'express';
import * as queries from '../db/queries.js';
import { DEFAULT_SETTINGS } from '../db/index.js';
import { getLocals } from './locals.js';
import { parseCategories } from '../utils/validation.js';
import { errorMessage, errorStatus } from '../services/errors.js';

export const commercialRoutes = Router();

// GET /api/commercials/categories - Category weights used by block-style breaks
commercialRoutes.get('/categories', (req: Request, res: Response) => {
  try {
    const { db } = getLocals(req);
    res.json(queries.getCommercialCategories(db));
  } catch (err) {
    res.status(500).json({ error: errorMessage(err) });
  }
});

// PUT /api/commercials/categories - Replace the category list
commercialRoutes.put('/categories', (req: Request, res: Response) => {
  try {
    const { db } = getLocals(req);
    const categories = parseCategories(req.body);
    res.json(queries.replaceCommercialCategories(db, categories));
  } catch (err) {
    res.status(errorStatus(err)).json({ error: errorMessage(err) });
  }
});

// GET /api/commercials/inventory - Clips per folder in the commercial library
commercialRoutes.get('/inventory', (req: Request, res: Response) => {
  try {
    const { db, catalog } = getLocals(req);
    const setting = queries.getSetting(db, 'commercial_library_name');
    const library = typeof setting === 'string' && setting.trim() !== ''
      ? setting
      : String(DEFAULT_SETTINGS.commercial_library_name);

    res.json({ library, categories: catalog.commercialInventory(library) });
  } catch (err) {
    res.status(500).json({ error: errorMessage(err) });
  }
});
