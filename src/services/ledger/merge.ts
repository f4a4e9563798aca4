/**
 * Merge policy for partial day updates
 *
 * Each field is resolved on its own:
 * - no stored record: take the update (absent stays absent)
 * - overwrite: take the update when supplied, else keep the stored value
 * - fill gaps: keep the stored value when set, else take the update
 */

import type { DayKey, DayRecord, DayUpdate } from '../../types/ledger.js';

function supplied<T>(value: T | null | undefined): value is T {
  return value !== null && value !== undefined;
}

function resolveField<T>(
  existing: T | null | undefined,
  incoming: T | null | undefined,
  overwrite: boolean
): T | null {
  if (overwrite) {
    return supplied(incoming) ? incoming : existing ?? null;
  }
  return supplied(existing) ? existing : incoming ?? null;
}

/**
 * Combine an update with the stored record for `date`, if any
 */
export function mergeDayRecord(
  date: DayKey,
  existing: DayRecord | null,
  update: DayUpdate,
  overwrite: boolean
): DayRecord {
  if (!existing) {
    return {
      date,
      start_time: update.start_time ?? null,
      end_time: update.end_time ?? null,
      break_minutes: update.break_minutes ?? null,
    };
  }

  return {
    date,
    start_time: resolveField(existing.start_time, update.start_time, overwrite),
    end_time: resolveField(existing.end_time, update.end_time, overwrite),
    break_minutes: resolveField(existing.break_minutes, update.break_minutes, overwrite),
  };
}

/**
 * True when the update supplies at least one field
 */
export function hasDayFields(update: DayUpdate): boolean {
  return (
    supplied(update.start_time) || supplied(update.end_time) || supplied(update.break_minutes)
  );
}
