/**
 * Entry range queries
 */

import Database from 'better-sqlite3';
import type { EntryRange, TimeEntry } from '../../types/index.js';
import { SELECT_ENTRY, toTimeEntry, type EntryRow } from '../store/entries.js';
import { dayWindow, formatBoundary, formatDay, formatTimestamp, parseDay, type DayWindow } from '../time/timestamps.js';
import { ValidationError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

export interface ResolvedRange {
  from: Date;
  to: Date;
  window: DayWindow; // start of `from` to end of `to`
  project: string | undefined;
}

/**
 * Validate a range and expand it to full-day boundaries
 */
export function resolveRange(range: EntryRange): ResolvedRange {
  const from = parseDay(range.from, 'from');
  const to = parseDay(range.to, 'to');
  if (to.getTime() < from.getTime()) {
    throw new ValidationError(
      `Invalid date range: end ${formatDay(to)} is before start ${formatDay(from)}`,
      'to'
    );
  }

  const project = range.project?.trim() || undefined;
  return {
    from,
    to,
    window: { start: dayWindow(from).start, end: dayWindow(to).end },
    project,
  };
}

/**
 * Entries whose start falls inside the range, newest first
 */
export function queryEntries(db: Database.Database, range: EntryRange): TimeEntry[] {
  const { window, project } = resolveRange(range);

  let sql = `${SELECT_ENTRY} WHERE e.start_ts BETWEEN ? AND ?`;
  const params: string[] = [formatTimestamp(window.start), formatBoundary(window.end)];
  if (project !== undefined) {
    sql += ' AND p.name = ?';
    params.push(project);
  }
  sql += ' ORDER BY e.start_ts DESC, e.id DESC';

  const rows = db.prepare<string[], EntryRow>(sql).all(...params);
  logger.debug(`Query matched ${rows.length} entries`, { from: params[0], to: params[1], project });
  return rows.map(toTimeEntry);
}

/**
 * Entries whose interval touches the window; open entries count as
 * running until now.
 */
export function queryOverlapping(
  db: Database.Database,
  window: DayWindow,
  project?: string
): TimeEntry[] {
  let sql = `${SELECT_ENTRY} WHERE e.start_ts <= ? AND (e.end_ts IS NULL OR e.end_ts >= ?)`;
  const params: string[] = [formatBoundary(window.end), formatTimestamp(window.start)];
  if (project !== undefined) {
    sql += ' AND p.name = ?';
    params.push(project);
  }
  sql += ' ORDER BY e.start_ts ASC, e.id ASC';

  return db.prepare<string[], EntryRow>(sql).all(...params).map(toTimeEntry);
}
