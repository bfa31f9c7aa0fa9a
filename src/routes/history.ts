import { Router } from 'express';
import type { Request, Response } from 'express';
import * as queries from '../db/queries.js';
import { getLocals } from './locals.js';
import { errorMessage } from '../services/errors.js';

export const historyRoutes = Router();

// GET /api/history - Recent generation runs, newest first
historyRoutes.get('/', (req: Request, res: Response) => {
  try {
    const { db } = getLocals(req);
    res.json(queries.getHistory(db));
  } catch (err) {
    res.status(500).json({ error: errorMessage(err) });
  }
});
