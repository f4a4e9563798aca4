/**
 * Key/value settings table
 *
 * Plain passthrough storage: values are strings and are never merged.
 */

import Database from 'better-sqlite3';
import { logger } from '../../utils/logger.js';
import type { Setting } from '../../types/ledger.js';

export class SettingNotFoundError extends Error {
  constructor(public readonly key: string) {
    super(`Setting not found: ${key}`);
    this.name = 'SettingNotFoundError';
  }
}

export class SettingsStore {
  private readonly statements: {
    get: Database.Statement<[string], { value: string }>;
    set: Database.Statement<[string, string]>;
    delete: Database.Statement<[string]>;
    list: Database.Statement<[], Setting>;
  };

  constructor(db: Database.Database) {
    this.statements = {
      get: db.prepare<[string], { value: string }>('SELECT value FROM config WHERE key = ?'),
      set: db.prepare<[string, string]>(
        `INSERT INTO config (key, value) VALUES (?, ?)
         ON CONFLICT(key) DO UPDATE SET value = excluded.value`
      ),
      delete: db.prepare<[string]>('DELETE FROM config WHERE key = ?'),
      list: db.prepare<[], Setting>('SELECT key, value FROM config ORDER BY key'),
    };
  }

  /**
   * Look up a setting; a missing key is an explicit failure
   */
  get(key: string): string {
    const row = this.statements.get.get(key);
    if (!row) {
      throw new SettingNotFoundError(key);
    }
    return row.value;
  }

  /**
   * Look up a setting, returning null when it is absent
   */
  find(key: string): string | null {
    return this.statements.get.get(key)?.value ?? null;
  }

  set(key: string, value: string): void {
    this.statements.set.run(key, value);
    logger.debug(`Set config ${key}`, { value });
  }

  /**
   * Remove a setting; an absent key is a no-op
   */
  delete(key: string): boolean {
    const { changes } = this.statements.delete.run(key);
    logger.debug(`Deleted config ${key}`, { removed: changes > 0 });
    return changes > 0;
  }

  list(): Setting[] {
    return this.statements.list.all();
  }
}
