import { Router } from 'express';
import type { Request, Response } from 'express';
import * as queries from '../db/queries.js';
import { getLocals } from './locals.js';
import { isRecord } from '../utils/validation.js';
import { errorMessage } from '../services/errors.js';

export const settingsRoutes = Router();

/** Known setting keys and the check each value must pass. */
const SETTING_VALIDATORS = new Map<string, (value: unknown) => string | null>([
  ['commercial_library_name', value =>
    typeof value === 'string' && value.trim() !== '' ? null : 'must be a non-empty string'],
  ['history_limit', value =>
    typeof value === 'number' && Number.isInteger(value) && value >= 1 ? null : 'must be an integer >= 1'],
]);

// GET /api/settings - Get all settings
settingsRoutes.get('/', (req: Request, res: Response) => {
  try {
    const { db } = getLocals(req);
    res.json(queries.getAllSettings(db));
  } catch (err) {
    res.status(500).json({ error: errorMessage(err) });
  }
});

// PUT /api/settings - Update settings
settingsRoutes.put('/', (req: Request, res: Response) => {
  try {
    const { db } = getLocals(req);
    const updates: unknown = req.body;

    if (!isRecord(updates)) {
      res.status(400).json({ error: 'Request body must be an object' });
      return;
    }

    // Reject unknown keys
    const unknownKeys = Object.keys(updates).filter(k => !SETTING_VALIDATORS.has(k));
    if (unknownKeys.length > 0) {
      res.status(400).json({ error: `Unknown setting key(s): ${unknownKeys.join(', ')}` });
      return;
    }

    for (const [key, value] of Object.entries(updates)) {
      const problem = SETTING_VALIDATORS.get(key)?.(value) ?? null;
      if (problem) {
        res.status(400).json({ error: `${key} ${problem}` });
        return;
      }
    }

    for (const [key, value] of Object.entries(updates)) {
      queries.setSetting(db, key, value);
    }

    res.json(queries.getAllSettings(db));
  } catch (err) {
    res.status(500).json({ error: errorMessage(err) });
  }
});

// GET /api/settings/:key - Get a specific setting
settingsRoutes.get('/:key', (req: Request, res: Response) => {
  try {
    const { db } = getLocals(req);
    const key = req.params.key;
    if (!SETTING_VALIDATORS.has(key)) {
      res.status(400).json({ error: `Unknown setting key: ${key}` });
      return;
    }
    const value = queries.getSetting(db, key);
    if (value === undefined) {
      res.status(404).json({ error: 'Setting not found' });
      return;
    }
    res.json({ key, value });
  } catch (err) {
    res.status(500).json({ error: errorMessage(err) });
  }
});
