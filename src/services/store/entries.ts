/**
 * Time entry storage
 *
 * An entry is open while end_ts is NULL. Whenever end_ts is set, duration_s
 * is rewritten from the stored start and end in the same statement.
 */

import Database from 'better-sqlite3';
import type { EntryUpdate, TimeEntry } from '../../types/index.js';
import { formatTimestamp, normalizeTimestamp, nowToSecond, secondsBetween } from '../time/timestamps.js';
import { requireProjectName, upsertProjectByName } from './projects.js';
import { logger } from '../../utils/logger.js';

export const UNTITLED_TASK = '(untitled)';

export interface EntryRow {
  id: number;
  project_id: number;
  project: string;
  task: string;
  notes: string | null;
  start_ts: string;
  end_ts: string | null;
  duration_s: number | null;
}

export const SELECT_ENTRY = `
SELECT e.id, e.project_id, p.name AS project, e.task, e.notes, e.start_ts, e.end_ts, e.duration_s
FROM entries e JOIN projects p ON e.project_id = p.id`;

export function toTimeEntry(row: EntryRow): TimeEntry {
  return {
    id: row.id,
    projectId: row.project_id,
    project: row.project,
    task: row.task,
    notes: row.notes,
    start: row.start_ts,
    end: row.end_ts,
    duration: row.duration_s,
  };
}

function normalizeTask(task: string): string {
  return task.trim() || UNTITLED_TASK;
}

/**
 * Close one open entry at `end`. Returns false when the id is missing or
 * the entry is already closed.
 */
function closeEntry(db: Database.Database, id: number, end: Date): boolean {
  const row = db
    .prepare<[number], { start_ts: string }>('SELECT start_ts FROM entries WHERE id = ? AND end_ts IS NULL')
    .get(id);
  if (!row) return false;

  const endTs = formatTimestamp(end);
  const duration = secondsBetween(row.start_ts, endTs);
  db.prepare<[string, number, number]>('UPDATE entries SET end_ts = ?, duration_s = ? WHERE id = ?').run(
    endTs,
    duration,
    id
  );
  logger.debug(`Closed entry ${id}`, { end: endTs, duration });
  return true;
}

/**
 * Start a new running entry, closing whatever is running first.
 * Both steps commit together or not at all.
 */
export function startEntry(
  db: Database.Database,
  projectName: string,
  task: string,
  notes = '',
  now: Date = new Date()
): number {
  const startedAt = nowToSecond(now);

  const start = db.transaction((): number => {
    const projectId = upsertProjectByName(db, projectName);

    const open = db
      .prepare<[], { id: number }>('SELECT id FROM entries WHERE end_ts IS NULL')
      .all();
    for (const { id } of open) {
      closeEntry(db, id, startedAt);
      logger.info(`Auto-stopped entry ${id}`);
    }

    const result = db
      .prepare<[number, string, string, string]>(
        'INSERT INTO entries (project_id, task, notes, start_ts) VALUES (?, ?, ?, ?)'
      )
      .run(projectId, normalizeTask(task), notes.trim(), formatTimestamp(startedAt));
    return Number(result.lastInsertRowid);
  });

  const id = start();
  logger.info(`Started entry ${id} for project "${projectName.trim()}"`);
  return id;
}

/**
 * Stop a running entry. Missing or closed ids are left alone.
 */
export function stopEntry(db: Database.Database, id: number, now: Date = new Date()): boolean {
  const stopped = closeEntry(db, id, nowToSecond(now));
  if (stopped) {
    logger.info(`Stopped entry ${id}`);
  }
  return stopped;
}

/**
 * The open entry; with several open, the latest start (then highest id)
 */
export function getRunningEntry(db: Database.Database): TimeEntry | null {
  const row = db
    .prepare<[], EntryRow>(
      `${SELECT_ENTRY} WHERE e.end_ts IS NULL ORDER BY e.start_ts DESC, e.id DESC LIMIT 1`
    )
    .get();
  return row ? toTimeEntry(row) : null;
}

export function getEntry(db: Database.Database, id: number): TimeEntry | null {
  const row = db.prepare<[number], EntryRow>(`${SELECT_ENTRY} WHERE e.id = ?`).get(id);
  return row ? toTimeEntry(row) : null;
}

/**
 * Delete an entry; deleting a missing id is not an error
 */
export function deleteEntry(db: Database.Database, id: number): boolean {
  const result = db.prepare<[number]>('DELETE FROM entries WHERE id = ?').run(id);
  if (result.changes > 0) {
    logger.info(`Deleted entry ${id}`);
  }
  return result.changes > 0;
}

/**
 * Overwrite every editable field of an entry. A blank or null end re-opens
 * the entry. Returns false when the id does not exist.
 */
export function updateEntry(db: Database.Database, id: number, update: EntryUpdate): boolean {
  requireProjectName(update.projectName);
  const start = normalizeTimestamp(update.start, 'start');
  const end = update.end === null || !update.end.trim() ? null : normalizeTimestamp(update.end, 'end');
  const duration = end === null ? null : secondsBetween(start, end);

  const apply = db.transaction((): boolean => {
    const existing = db.prepare<[number], { id: number }>('SELECT id FROM entries WHERE id = ?').get(id);
    if (!existing) return false;

    if (end === null) {
      const otherOpen = db
        .prepare<[number], { id: number }>('SELECT id FROM entries WHERE end_ts IS NULL AND id != ? LIMIT 1')
        .get(id);
      if (otherOpen) {
        logger.warn(`Entry ${id} re-opened while entry ${otherOpen.id} is still running`);
      }
    }

    const projectId = upsertProjectByName(db, update.projectName);
    db.prepare<[number, string, string, string, string | null, number | null, number]>(
      'UPDATE entries SET project_id = ?, task = ?, notes = ?, start_ts = ?, end_ts = ?, duration_s = ? WHERE id = ?'
    ).run(projectId, normalizeTask(update.task), update.notes.trim(), start, end, duration, id);
    return true;
  });

  const updated = apply();
  if (updated) {
    logger.info(`Updated entry ${id}`, { start, end, duration });
  }
  return updated;
}
