/**
 * Storage services
 */

export {
  createDatabase,
  initializeSchema,
  getSchemaVersion,
  SCHEMA_VERSION,
  WORK_HOURS_TABLE,
  NOTES_TABLE,
  CONFIG_TABLE,
} from './sqlite.js';
export { RecordStore, emptyDay } from './record-store.js';
export type { DayPredicate } from './record-store.js';
export { SettingsStore, SettingNotFoundError } from './settings-store.js';
export { getDatabase, closeDatabase } from './manager.js';
