/**
 * Record selection by date window
 */

import type { DayFilter, DayRecord, DayView, Note, AggregatedDay } from '../../types/ledger.js';
import { currentYear, normalizeMonth } from '../../utils/time.js';

/**
 * Key prefix (or exact key) a filter matches on; null matches everything
 */
export function filterKey(filter: DayFilter, now: Date = new Date()): string | null {
  switch (filter.kind) {
    case 'date':
      return filter.date;
    case 'month':
      return `${filter.year ?? currentYear(now)}-${normalizeMonth(filter.month)}-`;
    case 'year':
      return `${filter.year}-`;
    case 'all':
      return null;
  }
}

export function matchesFilter(
  filter: DayFilter,
  now: Date = new Date()
): (record: DayRecord) => boolean {
  const key = filterKey(filter, now);
  return (record: DayRecord): boolean => {
    if (key === null) return true;
    return filter.kind === 'date' ? record.date === key : record.date.startsWith(key);
  };
}

export interface SelectOptions {
  includeNotes: boolean;
  notesFor: (date: string) => Note[];
  now?: Date | undefined;
}

/**
 * Cut the window out of an aggregated history and attach notes on request.
 * `aggregated` must cover the full history so the running balance is right.
 */
export function selectDays(
  aggregated: readonly AggregatedDay[],
  filter: DayFilter,
  options: SelectOptions
): DayView[] {
  const matches = matchesFilter(filter, options.now);
  const selected = aggregated
    .filter(matches)
    .sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));

  if (!options.includeNotes) {
    return selected.map((day) => ({ ...day }));
  }
  return selected.map((day) => ({ ...day, notes: options.notesFor(day.date) }));
}
