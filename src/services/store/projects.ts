/**
 * Project storage
 *
 * Names are unique exactly as written (the column is a plain UNIQUE), while
 * listings sort without regard to case.
 */

import Database from 'better-sqlite3';
import { ValidationError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

/**
 * Trimmed project name; empty names are rejected
 */
export function requireProjectName(name: string): string {
  const trimmed = name.trim();
  if (!trimmed) {
    throw new ValidationError('Project name cannot be empty', 'project');
  }
  return trimmed;
}

/**
 * Return the id of the named project, creating it on first use
 */
export function upsertProjectByName(db: Database.Database, name: string): number {
  const trimmed = requireProjectName(name);

  const inserted = db.prepare<[string]>('INSERT OR IGNORE INTO projects (name) VALUES (?)').run(trimmed);
  if (inserted.changes > 0) {
    logger.debug(`Created project: ${trimmed}`);
  }

  const row = db
    .prepare<[string], { id: number }>('SELECT id FROM projects WHERE name = ?')
    .get(trimmed);
  if (!row) {
    throw new Error(`Project "${trimmed}" missing after insert`);
  }
  return row.id;
}

/**
 * All project names, case-insensitive order
 */
export function listProjectNames(db: Database.Database): string[] {
  return db
    .prepare<[], { name: string }>('SELECT name FROM projects ORDER BY name COLLATE NOCASE')
    .all()
    .map((row) => row.name);
}
