/**
 * Request body validation. Each parser takes the raw JSON body and either
 * returns a typed value or throws a ValidationError (HTTP 400).
 */
import type {
  BreakPolicy,
  BreakStyle,
  CommercialCategoryInput,
  PlaylistInput,
  ShowInput,
  SortBy,
} from '../types/index.js';
import { BREAK_STYLES, SORT_BY_VALUES } from '../types/index.js';
import { ValidationError } from '../services/errors.js';
import type { ExportFormat } from './export.js';

/** Longest commercial block a playlist may ask for, in seconds */
export const MAX_BLOCK_SECS = 3600;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireRecord(value: unknown, what: string): Record<string, unknown> {
  if (!isRecord(value)) throw new ValidationError(`${what} must be an object`);
  return value;
}

function parseName(value: unknown, field: string): string {
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ValidationError(`${field} is required`);
  }
  return value.trim();
}

export function parseInteger(value: unknown, field: string, min: number, max?: number): number {
  const n = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
  if (typeof n !== 'number' || !Number.isInteger(n) || n < min) {
    throw new ValidationError(`${field} must be an integer >= ${min}`);
  }
  if (max !== undefined && n > max) {
    throw new ValidationError(`${field} must be an integer <= ${max}`);
  }
  return n;
}

function parseBoolean(value: unknown, field: string): boolean {
  if (typeof value !== 'boolean') throw new ValidationError(`${field} must be true or false`);
  return value;
}

function isSortBy(value: unknown): value is SortBy {
  return SORT_BY_VALUES.some(v => v === value);
}

function isBreakStyle(value: unknown): value is BreakStyle {
  return BREAK_STYLES.some(v => v === value);
}

// ─── Shows ────────────────────────────────────────────

export function parseShowInput(body: unknown): ShowInput {
  const data = requireRecord(body, 'Request body');
  return { name: parseName(data.name, 'name'), ...parseShowFields(data) };
}

export function parseShowUpdate(body: unknown): Partial<ShowInput> {
  const data = requireRecord(body, 'Request body');
  const update: Partial<ShowInput> = parseShowFields(data);
  if (data.name !== undefined) update.name = parseName(data.name, 'name');
  return update;
}

function parseShowFields(data: Record<string, unknown>): Omit<Partial<ShowInput>, 'name'> {
  const fields: Omit<Partial<ShowInput>, 'name'> = {};
  if (data.library !== undefined) fields.library = parseName(data.library, 'library');
  if (data.year !== undefined) {
    fields.year = data.year === null ? null : parseInteger(data.year, 'year', 1);
  }
  if (data.enabled !== undefined) fields.enabled = parseBoolean(data.enabled, 'enabled');
  return fields;
}

// ─── Playlists ────────────────────────────────────────

export function parsePlaylistInput(body: unknown): PlaylistInput {
  const data = requireRecord(body, 'Request body');
  return { name: parseName(data.name, 'name'), ...parsePlaylistFields(data) };
}

export function parsePlaylistUpdate(body: unknown): Partial<PlaylistInput> {
  const data = requireRecord(body, 'Request body');
  const update: Partial<PlaylistInput> = parsePlaylistFields(data);
  if (data.name !== undefined) update.name = parseName(data.name, 'name');
  return update;
}

function parsePlaylistFields(data: Record<string, unknown>): Omit<Partial<PlaylistInput>, 'name'> {
  const fields: Omit<Partial<PlaylistInput>, 'name'> = {};
  if (data.episodes_per_generation !== undefined) {
    fields.episodes_per_generation = parseInteger(data.episodes_per_generation, 'episodes_per_generation', 1);
  }
  if (data.sort_by !== undefined) {
    if (!isSortBy(data.sort_by)) {
      throw new ValidationError(`sort_by must be one of: ${SORT_BY_VALUES.join(', ')}`);
    }
    fields.sort_by = data.sort_by;
  }
  if (data.breaks !== undefined) fields.breaks = parseBreakPolicy(data.breaks);
  return fields;
}

export function parseBreakPolicy(value: unknown): Partial<BreakPolicy> {
  const data = requireRecord(value, 'breaks');
  const policy: Partial<BreakPolicy> = {};

  if (data.enabled !== undefined) policy.enabled = parseBoolean(data.enabled, 'breaks.enabled');
  if (data.style !== undefined) {
    if (!isBreakStyle(data.style)) {
      throw new ValidationError(`breaks.style must be one of: ${BREAK_STYLES.join(', ')}`);
    }
    policy.style = data.style;
  }
  if (data.frequency !== undefined) policy.frequency = parseInteger(data.frequency, 'breaks.frequency', 1);
  if (data.minGap !== undefined) policy.minGap = parseInteger(data.minGap, 'breaks.minGap', 1);
  if (data.blockDuration !== undefined) {
    const range = requireRecord(data.blockDuration, 'breaks.blockDuration');
    policy.blockDuration = {
      min: parseInteger(range.min, 'breaks.blockDuration.min', 1, MAX_BLOCK_SECS),
      max: parseInteger(range.max, 'breaks.blockDuration.max', 1, MAX_BLOCK_SECS),
    };
  }
  return policy;
}

/** Fill a partial policy from `base` and check the block range. */
export function mergeBreakPolicy(base: BreakPolicy, update: Partial<BreakPolicy> = {}): BreakPolicy {
  const merged: BreakPolicy = {
    ...base,
    ...update,
    blockDuration: { ...(update.blockDuration ?? base.blockDuration) },
  };
  if (merged.blockDuration.min > merged.blockDuration.max) {
    throw new ValidationError('breaks.blockDuration.min must not exceed breaks.blockDuration.max');
  }
  return merged;
}

export function parsePositionUpdate(body: unknown): { show: string; season: number; episode: number } | { reset: true } {
  const data = requireRecord(body, 'Request body');
  if (data.reset === true) return { reset: true };
  return {
    show: parseName(data.show, 'show'),
    season: parseInteger(data.season, 'season', 1),
    episode: parseInteger(data.episode, 'episode', 1),
  };
}

export function parseGenerateRequest(body: unknown): { episodeCount?: number; fromStart: boolean; seed?: string } {
  const data = body === undefined || body === null ? {} : requireRecord(body, 'Request body');
  const request: { episodeCount?: number; fromStart: boolean; seed?: string } = { fromStart: false };
  if (data.episode_count !== undefined && data.episode_count !== null) {
    request.episodeCount = parseInteger(data.episode_count, 'episode_count', 0);
  }
  if (data.from_start !== undefined) request.fromStart = parseBoolean(data.from_start, 'from_start');
  if (data.seed !== undefined) request.seed = parseName(data.seed, 'seed');
  return request;
}

const EXPORT_FORMATS: readonly ExportFormat[] = ['csv', 'json'];
const EXPORT_SOURCES = ['last', 'preview'] as const;

export interface ExportRequest {
  format: ExportFormat;
  /** 'last' reads the last published run; 'preview' builds a fresh one */
  source: (typeof EXPORT_SOURCES)[number];
  episodeCount?: number;
}

function isExportFormat(value: unknown): value is ExportFormat {
  return EXPORT_FORMATS.some(v => v === value);
}

function isExportSource(value: unknown): value is ExportRequest['source'] {
  return EXPORT_SOURCES.some(v => v === value);
}

export function parseExportQuery(query: Record<string, unknown>): ExportRequest {
  const format = query.format ?? 'csv';
  if (!isExportFormat(format)) throw new ValidationError('format must be csv or json');
  const source = query.source ?? 'last';
  if (!isExportSource(source)) throw new ValidationError('source must be last or preview');

  const request: ExportRequest = { format, source };
  if (query.episode_count !== undefined) {
    request.episodeCount = parseInteger(query.episode_count, 'episode_count', 0);
  }
  return request;
}

// ─── Commercial categories ────────────────────────────

export function parseCategories(body: unknown): CommercialCategoryInput[] {
  const list = isRecord(body) ? body.categories : body;
  if (!Array.isArray(list)) throw new ValidationError('categories must be an array');

  const seen = new Set<string>();
  return list.map((value: unknown, i) => {
    const data = requireRecord(value, `categories[${i}]`);
    const name = parseName(data.name, `categories[${i}].name`);
    if (seen.has(name.toLowerCase())) {
      throw new ValidationError(`Duplicate category name: ${name}`);
    }
    seen.add(name.toLowerCase());

    const category: CommercialCategoryInput = { name };
    if (data.search_terms !== undefined) {
      if (!Array.isArray(data.search_terms) || !data.search_terms.every(t => typeof t === 'string')) {
        throw new ValidationError(`categories[${i}].search_terms must be an array of strings`);
      }
      category.search_terms = data.search_terms.filter((t): t is string => typeof t === 'string');
    }
    if (data.weight !== undefined) {
      if (typeof data.weight !== 'number' || !Number.isFinite(data.weight) || data.weight <= 0) {
        throw new ValidationError(`categories[${i}].weight must be a number > 0`);
      }
      category.weight = data.weight;
    }
    return category;
  });
}
