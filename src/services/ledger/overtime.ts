/**
 * Working-hours and overtime aggregation
 *
 * One forward pass over the full history in date order, carrying a single
 * running balance. Days without both a start and an end time contribute
 * nothing and report the balance as it stood. The balance keeps full
 * precision; only the reported values are rounded.
 */

import type { AggregatedDay, DayRecord } from '../../types/ledger.js';
import { roundHours, toMinutes } from '../../utils/time.js';

/**
 * Hours worked on a day, or null when start or end is missing.
 * A missing break counts as zero. Negative results pass through unchanged.
 */
export function workingHours(record: DayRecord): number | null {
  if (record.start_time === null || record.end_time === null) {
    return null;
  }
  const elapsed = toMinutes(record.end_time) - toMinutes(record.start_time);
  return (elapsed - (record.break_minutes ?? 0)) / 60;
}

function byDate(a: DayRecord, b: DayRecord): number {
  if (a.date < b.date) return -1;
  if (a.date > b.date) return 1;
  return 0;
}

export function aggregateOvertime(
  history: readonly DayRecord[],
  expectedWorkdayHours: number
): AggregatedDay[] {
  const ordered = [...history].sort(byDate);
  let cumulative = 0;

  return ordered.map((record) => {
    const working = workingHours(record);
    let overtime: number | null = null;

    if (working !== null) {
      overtime = working - expectedWorkdayHours;
      cumulative += overtime;
    }

    return {
      ...record,
      working_hours: working === null ? null : roundHours(working),
      overtime_hours: overtime === null ? null : roundHours(overtime),
      cumulative_overtime_hours: roundHours(cumulative),
    };
  });
}
