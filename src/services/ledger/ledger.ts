/**
 * Ledger operations
 *
 * The write path runs updates through the merge policy before they reach the
 * store; the read path aggregates the full history and then selects the
 * requested window.
 */

import Database from 'better-sqlite3';
import { RecordStore } from '../store/record-store.js';
import { SettingsStore } from '../store/settings-store.js';
import { mergeDayRecord } from './merge.js';
import { aggregateOvertime } from './overtime.js';
import { selectDays } from './selector.js';
import { logger } from '../../utils/logger.js';
import {
  DAY_FIELDS,
  DEFAULT_EXPECTED_WORKDAY_HOURS,
  EXPECTED_WORKDAY_HOURS_KEY,
} from '../../types/ledger.js';
import type {
  DayFilter,
  DayKey,
  DayRecord,
  DayUpdate,
  DayView,
  IncompleteDay,
  Setting,
} from '../../types/ledger.js';

export interface QueryOptions {
  includeNotes?: boolean | undefined;
  now?: Date | undefined;
}

export class Ledger {
  readonly records: RecordStore;
  readonly settings: SettingsStore;

  constructor(db: Database.Database) {
    this.records = new RecordStore(db);
    this.settings = new SettingsStore(db);
  }

  /**
   * Apply a partial update to a day under the merge policy and return the
   * stored result
   */
  addOrUpdateDay(date: DayKey, update: DayUpdate, overwrite = true): DayRecord {
    return this.records.transaction(() => {
      const existing = this.records.get(date);
      const merged = mergeDayRecord(date, existing, update, overwrite);
      this.records.upsert(merged);
      logger.debug(existing ? `Updated day ${date}` : `Created day ${date}`, { overwrite });
      return merged;
    });
  }

  addNote(date: DayKey, text: string): number {
    return this.records.addNote(date, text);
  }

  removeNote(id: number): boolean {
    return this.records.deleteNote(id);
  }

  removeDay(date: DayKey): boolean {
    return this.records.delete(date);
  }

  /**
   * Days in the filter window with derived overtime fields, ascending by date.
   * The running balance is computed over the whole history.
   */
  queryDays(filter: DayFilter, options: QueryOptions = {}): DayView[] {
    return this.records.transaction(() => {
      const history = this.records.allRecords();
      const aggregated = aggregateOvertime(history, this.expectedWorkdayHours());
      return selectDays(aggregated, filter, {
        includeNotes: options.includeNotes ?? false,
        notesFor: (date) => this.records.notesFor(date),
        now: options.now,
      });
    });
  }

  /**
   * Days missing any of start time, end time or break, in date order
   */
  listIncomplete(): IncompleteDay[] {
    const incomplete: IncompleteDay[] = [];
    for (const record of this.records.allRecords()) {
      const missing = DAY_FIELDS.filter((field) => record[field] === null);
      if (missing.length > 0) {
        incomplete.push({ date: record.date, missing });
      }
    }
    return incomplete;
  }

  /**
   * The expected workday length. Falls back to the default when the setting
   * is missing or not a finite number.
   */
  expectedWorkdayHours(): number {
    const raw = this.settings.find(EXPECTED_WORKDAY_HOURS_KEY);
    if (raw === null) {
      logger.warn(
        `${EXPECTED_WORKDAY_HOURS_KEY} is not set, using ${DEFAULT_EXPECTED_WORKDAY_HOURS}`
      );
      return DEFAULT_EXPECTED_WORKDAY_HOURS;
    }

    const value = Number(raw);
    if (raw.trim() === '' || !Number.isFinite(value)) {
      logger.warn(
        `${EXPECTED_WORKDAY_HOURS_KEY} has non-numeric value "${raw}", using ${DEFAULT_EXPECTED_WORKDAY_HOURS}`
      );
      return DEFAULT_EXPECTED_WORKDAY_HOURS;
    }
    return value;
  }

  getSetting(key: string): string {
    return this.settings.get(key);
  }

  setSetting(key: string, value: string): void {
    this.settings.set(key, value);
  }

  deleteSetting(key: string): boolean {
    return this.settings.delete(key);
  }

  listSettings(): Setting[] {
    return this.settings.list();
  }
}

/**
 * One diagnostic line per missing field
 */
export function formatIncomplete(days: readonly IncompleteDay[]): string[] {
  return days.flatMap((day) => day.missing.map((field) => `Missing ${field} for ${day.date}`));
}
