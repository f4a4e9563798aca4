/**
 * Database connection manager
 * Holds the single ledger connection for the process
 */

import Database from 'better-sqlite3';
import { mkdirSync } from 'fs';
import { dirname } from 'path';
import { getConfig } from '../../config/index.js';
import { createDatabase } from './sqlite.js';
import { logger } from '../../utils/logger.js';

let connection: Database.Database | null = null;

/**
 * Get or open the ledger database at the configured path
 */
export function getDatabase(): Database.Database {
  if (connection?.open) {
    return connection;
  }

  const { databasePath } = getConfig();
  if (databasePath !== ':memory:') {
    mkdirSync(dirname(databasePath), { recursive: true });
  }

  connection = createDatabase(databasePath);
  return connection;
}

/**
 * Close the connection if one is open
 */
export function closeDatabase(): void {
  if (connection?.open) {
    connection.close();
    logger.debug('Database connection closed');
  }
  connection = null;
}
