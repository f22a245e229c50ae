/**
 * CSV export of time entries
 */

import { writeFile, mkdir } from 'fs/promises';
import { dirname, resolve } from 'path';
import type { TimeEntry } from '../../types/index.js';
import { formatDuration } from '../time/duration.js';
import { secondsBetween } from '../time/timestamps.js';
import { logger } from '../../utils/logger.js';

export const CSV_HEADER = ['ID', 'Project', 'Task', 'Notes', 'Start', 'End', 'Duration'] as const;

const NEEDS_QUOTING = /[",\r\n]/;

export interface ExportResult {
  path: string;
  rows: number;
}

/**
 * Quote a field when it holds a comma, quote or line break
 */
export function escapeCsvField(value: string | number | null): string {
  const text = value === null ? '' : String(value);
  return NEEDS_QUOTING.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

/**
 * Stored duration, or end - start when the cached value is missing
 */
function exportDuration(entry: TimeEntry): number {
  if (entry.duration !== null) return entry.duration;
  if (entry.end !== null) return secondsBetween(entry.start, entry.end);
  return 0;
}

export function renderCsv(rows: TimeEntry[]): string {
  const lines = [CSV_HEADER.join(',')];
  for (const entry of rows) {
    lines.push(
      [
        entry.id,
        entry.project,
        entry.task,
        entry.notes,
        entry.start,
        entry.end,
        formatDuration(exportDuration(entry)),
      ]
        .map(escapeCsvField)
        .join(',')
    );
  }
  return `${lines.join('\r\n')}\r\n`;
}

/**
 * Write entries to a CSV file, creating parent directories
 */
export async function exportRows(rows: TimeEntry[], destination: string): Promise<ExportResult> {
  const path = resolve(destination);
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, renderCsv(rows), 'utf-8');

  logger.info(`Exported ${rows.length} entries to ${path}`);
  return { path, rows: rows.length };
}
