/**
 * SQLite schema and initialization
 *
 * The connection used by the tools is owned by the store manager in
 * manager.ts. Table and column names match databases written by the earlier
 * single-file tracker, so those open without conversion.
 */

import Database from 'better-sqlite3';
import { logger } from '../../utils/logger.js';

export const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS projects (
    id INTEGER PRIMARY KEY,
    name TEXT NOT NULL UNIQUE
);

CREATE TABLE IF NOT EXISTS entries (
    id INTEGER PRIMARY KEY,
    project_id INTEGER NOT NULL,
    task TEXT NOT NULL,
    notes TEXT,
    start_ts TEXT NOT NULL,
    end_ts TEXT,
    duration_s INTEGER,
    FOREIGN KEY (project_id) REFERENCES projects(id)
);

CREATE INDEX IF NOT EXISTS idx_entries_start ON entries(start_ts);

CREATE TABLE IF NOT EXISTS schema_version (
    version INTEGER PRIMARY KEY
);
`;

// Applied in order; each runs once per database
const MIGRATIONS: ReadonlyArray<{ version: number; sql: string }> = [
  { version: 1, sql: SCHEMA_SQL },
  {
    version: 2,
    sql: 'CREATE INDEX IF NOT EXISTS idx_entries_open ON entries(end_ts) WHERE end_ts IS NULL;',
  },
];

export const SCHEMA_VERSION = MIGRATIONS.length;

function storedVersion(db: Database.Database): number {
  const versioned = db
    .prepare<[], { n: number }>(
      "SELECT COUNT(*) AS n FROM sqlite_master WHERE type = 'table' AND name = 'schema_version'"
    )
    .get();
  if (!versioned?.n) return 0;

  const row = db
    .prepare<[], { version: number | null }>('SELECT MAX(version) AS version FROM schema_version')
    .get();
  return row?.version ?? 0;
}

/**
 * Bring the schema up to SCHEMA_VERSION. Pending migrations commit together.
 */
export function initializeSchema(db: Database.Database): void {
  const current = storedVersion(db);
  const pending = MIGRATIONS.filter((m) => m.version > current);
  if (pending.length === 0) return;

  logger.debug(`Migrating database from version ${current} to ${SCHEMA_VERSION}`);

  db.exec('BEGIN');
  try {
    for (const migration of pending) {
      db.exec(migration.sql);
      db.prepare<[number]>('INSERT OR REPLACE INTO schema_version (version) VALUES (?)').run(migration.version);
    }
    db.exec('COMMIT');
  } catch (error) {
    db.exec('ROLLBACK');
    logger.error('Database migration failed', error);
    throw error;
  }
}

/**
 * Open (creating if needed) and initialize a database file
 */
export function createDatabase(dbPath: string): Database.Database {
  logger.info(`Opening database at: ${dbPath}`);

  const db = new Database(dbPath);
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');

  initializeSchema(db);

  return db;
}
