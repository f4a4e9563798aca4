/**
 * Durable storage for day records and their notes
 *
 * This layer has no partial-update semantics: `upsert` replaces the whole
 * row. Combining an update with what is already stored is the merge policy's
 * job (services/ledger/merge.ts).
 */

import Database from 'better-sqlite3';
import { logger } from '../../utils/logger.js';
import type { DayKey, DayRecord, Note } from '../../types/ledger.js';

interface NoteRow {
  id: number;
  date: string;
  text: string;
}

export type DayPredicate = (record: DayRecord) => boolean;

export function emptyDay(date: DayKey): DayRecord {
  return { date, start_time: null, end_time: null, break_minutes: null };
}

export class RecordStore {
  private readonly statements: {
    get: Database.Statement<[string], DayRecord>;
    upsert: Database.Statement<[DayRecord]>;
    insertEmpty: Database.Statement<[string]>;
    deleteDay: Database.Statement<[string]>;
    all: Database.Statement<[], DayRecord>;
    insertNote: Database.Statement<[string, string]>;
    deleteNote: Database.Statement<[number]>;
    notesFor: Database.Statement<[string], NoteRow>;
    allNotes: Database.Statement<[], NoteRow>;
  };

  constructor(private readonly db: Database.Database) {
    this.statements = {
      get: db.prepare<[string], DayRecord>(
        'SELECT date, start_time, end_time, break_minutes FROM work_hours WHERE date = ?'
      ),
      upsert: db.prepare<DayRecord>(
        `INSERT INTO work_hours (date, start_time, end_time, break_minutes)
         VALUES (@date, @start_time, @end_time, @break_minutes)
         ON CONFLICT(date) DO UPDATE SET
           start_time = excluded.start_time,
           end_time = excluded.end_time,
           break_minutes = excluded.break_minutes`
      ),
      insertEmpty: db.prepare<[string]>('INSERT OR IGNORE INTO work_hours (date) VALUES (?)'),
      deleteDay: db.prepare<[string]>('DELETE FROM work_hours WHERE date = ?'),
      all: db.prepare<[], DayRecord>(
        'SELECT date, start_time, end_time, break_minutes FROM work_hours ORDER BY date'
      ),
      insertNote: db.prepare<[string, string]>('INSERT INTO notes (date, text) VALUES (?, ?)'),
      deleteNote: db.prepare<[number]>('DELETE FROM notes WHERE id = ?'),
      notesFor: db.prepare<[string], NoteRow>('SELECT id, date, text FROM notes WHERE date = ? ORDER BY id'),
      allNotes: db.prepare<[], NoteRow>('SELECT id, date, text FROM notes ORDER BY id'),
    };
  }

  get(date: DayKey): DayRecord | null {
    return this.statements.get.get(date) ?? null;
  }

  has(date: DayKey): boolean {
    return this.get(date) !== null;
  }

  /**
   * Replace the stored record for `record.date` entirely
   */
  upsert(record: DayRecord): void {
    this.statements.upsert.run(record);
    logger.debug(`Upserted day ${record.date}`, record);
  }

  /**
   * Remove the record for a date. Returns whether a row existed; an absent
   * record is not an error. Notes for the date are left in place.
   */
  delete(date: DayKey): boolean {
    const { changes } = this.statements.deleteDay.run(date);
    logger.debug(`Deleted day ${date}`, { removed: changes > 0 });
    return changes > 0;
  }

  /**
   * Create an empty record for the date unless one exists. Returns whether a
   * record was created.
   */
  ensureDay(date: DayKey): boolean {
    const { changes } = this.statements.insertEmpty.run(date);
    if (changes > 0) {
      logger.debug(`Created empty day ${date}`);
    }
    return changes > 0;
  }

  /**
   * Append a note. A day with no record first gets an empty one, so every
   * note refers to an existing day.
   */
  addNote(date: DayKey, text: string): number {
    const insert = this.db.transaction((noteDate: string, noteText: string): number => {
      this.ensureDay(noteDate);
      const { lastInsertRowid } = this.statements.insertNote.run(noteDate, noteText);
      return Number(lastInsertRowid);
    });

    const id = insert(date, text);
    logger.debug(`Added note ${id} for ${date}`);
    return id;
  }

  deleteNote(id: number): boolean {
    const { changes } = this.statements.deleteNote.run(id);
    logger.debug(`Deleted note ${id}`, { removed: changes > 0 });
    return changes > 0;
  }

  /**
   * All records matching the predicate, ascending by date
   */
  allRecords(predicate?: DayPredicate): DayRecord[] {
    const rows = this.statements.all.all();
    return predicate ? rows.filter(predicate) : rows;
  }

  /**
   * Notes for one date in insertion order
   */
  notesFor(date: DayKey): Note[] {
    return this.statements.notesFor.all(date);
  }

  allNotes(): Note[] {
    return this.statements.allNotes.all();
  }

  /**
   * Run `fn` as one atomic unit against the database
   */
  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }
}
