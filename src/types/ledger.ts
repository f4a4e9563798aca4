/**
 * Ledger data model
 */

// Wall-clock time of day, HH:MM (naive local time)
export type WallClockTime = string;

// Calendar date, YYYY-MM-DD. Lexicographic order is chronological order.
export type DayKey = string;

export const DAY_FIELDS = ['start_time', 'end_time', 'break_minutes'] as const;

export type DayField = (typeof DAY_FIELDS)[number];

// Stored record for one calendar date. Every field but the key may be absent.
export interface DayRecord {
  date: DayKey;
  start_time: WallClockTime | null;
  end_time: WallClockTime | null;
  break_minutes: number | null;
}

// Incoming partial update; an undefined or null field means "not supplied"
export interface DayUpdate {
  start_time?: WallClockTime | null | undefined;
  end_time?: WallClockTime | null | undefined;
  break_minutes?: number | null | undefined;
}

export interface Note {
  id: number;
  date: DayKey;
  text: string;
}

// Computed on read, never stored
export interface DerivedFields {
  working_hours: number | null;
  overtime_hours: number | null;
  cumulative_overtime_hours: number;
}

export type AggregatedDay = DayRecord & DerivedFields;

// Query result row. `notes` is present only when notes were requested.
export interface DayView extends AggregatedDay {
  notes?: Note[];
}

export type DayFilter =
  | { kind: 'date'; date: DayKey }
  | { kind: 'month'; month: string; year?: string | undefined }
  | { kind: 'year'; year: string }
  | { kind: 'all' };

export interface IncompleteDay {
  date: DayKey;
  missing: DayField[];
}

export const EXPECTED_WORKDAY_HOURS_KEY = 'expected_workday_hours';
export const DEFAULT_EXPECTED_WORKDAY_HOURS = 7.8;

export interface Setting {
  key: string;
  value: string;
}
