/**
 * Tabular export of a generated item list (CSV or JSON rows).
 */
import type { ScheduledItem } from '../types/index.js';
import { categoryFromPath } from '../services/CommercialBlockBuilder.js';
import { formatPosition } from './duration.js';

export type ExportFormat = 'csv' | 'json';

export const EXPORT_COLUMNS = ['#', 'Type', 'Title', 'Duration', 'Show/Category'] as const;

export interface ExportRow {
  '#': number;
  Type: 'Episode' | 'Commercial';
  Title: string;
  /** m:ss */
  Duration: string;
  'Show/Category': string;
}

/**
 * Format seconds as m:ss. Unknown or negative durations read 0:00.
 */
export function formatClock(secs: number | null): string {
  const total = secs !== null && Number.isFinite(secs) && secs > 0 ? Math.round(secs) : 0;
  const minutes = Math.floor(total / 60);
  const seconds = total % 60;
  return `${minutes}:${String(seconds).padStart(2, '0')}`;
}

export function exportRows(items: ScheduledItem[]): ExportRow[] {
  return items.map((item, i) => {
    if (item.kind === 'episode') {
      return {
        '#': i + 1,
        Type: 'Episode',
        Title: `${item.showName} ${formatPosition(item.seasonNumber, item.episodeNumber)}: ${item.title}`,
        Duration: formatClock(item.durationSeconds),
        'Show/Category': item.showName,
      };
    }
    return {
      '#': i + 1,
      Type: 'Commercial',
      Title: item.title,
      Duration: formatClock(item.durationSeconds),
      'Show/Category': categoryFromPath(item.path),
    };
  });
}

function csvField(value: string | number): string {
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

/** RFC 4180 CSV with a header row and CRLF line endings */
export function toCsv(rows: ExportRow[]): string {
  const lines = [EXPORT_COLUMNS.join(',')];
  for (const row of rows) {
    lines.push(EXPORT_COLUMNS.map(col => csvField(row[col])).join(','));
  }
  return lines.join('\r\n') + '\r\n';
}
