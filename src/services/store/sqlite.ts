/**
 * SQLite database schema and initialization utilities
 *
 * The connection itself is owned by manager.ts; this module only knows how to
 * create the schema and bring an existing file up to date.
 */

import Database from 'better-sqlite3';
import { logger } from '../../utils/logger.js';
import {
  DEFAULT_EXPECTED_WORKDAY_HOURS,
  EXPECTED_WORKDAY_HOURS_KEY,
} from '../../types/ledger.js';

// Schema version for migrations
export const SCHEMA_VERSION = 1;

export const WORK_HOURS_TABLE = 'work_hours';
export const NOTES_TABLE = 'notes';
export const CONFIG_TABLE = 'config';

export const SCHEMA_SQL = `
-- One row per calendar date
CREATE TABLE IF NOT EXISTS work_hours (
    date TEXT PRIMARY KEY,
    start_time TEXT,
    end_time TEXT,
    break_minutes REAL
);

-- Free-text notes; AUTOINCREMENT keeps ids from being reused after deletes
CREATE TABLE IF NOT EXISTS notes (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    date TEXT NOT NULL,
    text TEXT NOT NULL
);

-- Flat key/value settings
CREATE TABLE IF NOT EXISTS config (
    key TEXT PRIMARY KEY,
    value TEXT NOT NULL
);

-- Schema version tracking
CREATE TABLE IF NOT EXISTS schema_version (
    version INTEGER PRIMARY KEY
);

CREATE INDEX IF NOT EXISTS idx_notes_date ON notes(date);
`;

/**
 * Read the highest applied schema version (0 for a fresh database)
 */
export function getSchemaVersion(db: Database.Database): number {
  const hasVersionTable = db
    .prepare("SELECT name FROM sqlite_master WHERE type='table' AND name='schema_version'")
    .get();

  if (!hasVersionTable) return 0;

  const row = db
    .prepare('SELECT version FROM schema_version ORDER BY version DESC LIMIT 1')
    .get() as { version: number } | undefined;
  return row?.version ?? 0;
}

/**
 * Initialize database schema
 */
export function initializeSchema(db: Database.Database): void {
  const currentVersion = getSchemaVersion(db);

  if (currentVersion < SCHEMA_VERSION) {
    logger.debug(`Migrating database from version ${currentVersion} to ${SCHEMA_VERSION}`);
    runMigrations(db, currentVersion);
  }
}

/**
 * Run database migrations
 */
function runMigrations(db: Database.Database, fromVersion: number): void {
  db.exec('BEGIN TRANSACTION');

  try {
    if (fromVersion < 1) {
      db.exec(SCHEMA_SQL);
      db.prepare(`INSERT OR IGNORE INTO ${CONFIG_TABLE} (key, value) VALUES (?, ?)`).run(
        EXPECTED_WORKDAY_HOURS_KEY,
        String(DEFAULT_EXPECTED_WORKDAY_HOURS)
      );
      db.prepare('INSERT OR REPLACE INTO schema_version (version) VALUES (?)').run(1);
    }

    // Future migrations go here:
    // if (fromVersion < 2) { ... }

    db.exec('COMMIT');
    logger.debug('Database migration completed');
  } catch (error) {
    db.exec('ROLLBACK');
    logger.error('Database migration failed', error);
    throw error;
  }
}

/**
 * Create and initialize a new database connection
 */
export function createDatabase(dbPath: string): Database.Database {
  logger.info(`Opening database at: ${dbPath}`);

  const db = new Database(dbPath);
  if (dbPath !== ':memory:') {
    db.pragma('journal_mode = WAL');
  }

  initializeSchema(db);

  return db;
}
