import type { Request } from 'express';
import type Database from 'better-sqlite3';
import type { WebSocketServer } from 'ws';
import type { JellyfinCatalog } from '../services/JellyfinCatalog.js';
import type { GenerationService } from '../services/GenerationService.js';

/** Services the entry point stores on `app.locals` */
export interface AppLocals {
  db: Database.Database;
  catalog: JellyfinCatalog;
  generationService: GenerationService;
  wss?: WebSocketServer;
}

export function getLocals(req: Request): AppLocals {
  const { db, catalog, generationService, wss } = req.app.locals;
  return { db, catalog, generationService, wss };
}
