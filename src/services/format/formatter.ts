/**
 * Query result formatter
 * Renders day views as JSON, a pipe table or markdown
 */

import type { DayView } from '../../types/ledger.js';

export const OUTPUT_FORMATS = ['table', 'json', 'markdown'] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export interface FormattedResult {
  format: OutputFormat;
  output: string;
  data: DayView[];
}

type Row = Record<string, string | number | null>;

const DAY_COLUMNS = [
  'date',
  'start_time',
  'end_time',
  'break_minutes',
  'working_hours',
  'overtime_hours',
  'cumulative_overtime_hours',
] as const;

const NOTE_COLUMNS = ['note_id', 'note'] as const;

/**
 * Format a value for display
 */
function formatValue(value: string | number | null | undefined): string {
  if (value === null || value === undefined) {
    return '-';
  }
  return String(value);
}

/**
 * Escape table cell content
 */
function escapeCell(value: string): string {
  return value.replace(/\|/g, '\\|').replace(/\n/g, ' ');
}

function padString(str: string, width: number): string {
  return str + ' '.repeat(Math.max(0, width - str.length));
}

function dayRow(day: DayView): Row {
  return {
    date: day.date,
    start_time: day.start_time,
    end_time: day.end_time,
    break_minutes: day.break_minutes,
    working_hours: day.working_hours,
    overtime_hours: day.overtime_hours,
    cumulative_overtime_hours: day.cumulative_overtime_hours,
  };
}

/**
 * Flatten days into table rows. With notes, a day gets one row per note, or a
 * single row with empty note cells when it has none.
 */
function toRows(days: readonly DayView[]): { headers: string[]; rows: Row[] } {
  const withNotes = days.some((day) => day.notes !== undefined);
  const headers: string[] = withNotes ? [...DAY_COLUMNS, ...NOTE_COLUMNS] : [...DAY_COLUMNS];
  const rows: Row[] = [];

  for (const day of days) {
    const base = dayRow(day);
    if (!withNotes) {
      rows.push(base);
      continue;
    }
    const notes = day.notes ?? [];
    if (notes.length === 0) {
      rows.push({ ...base, note_id: null, note: null });
      continue;
    }
    for (const note of notes) {
      rows.push({ ...base, note_id: note.id, note: note.text });
    }
  }

  return { headers, rows };
}

/**
 * Format days as a pipe table
 */
export function formatAsTable(days: readonly DayView[]): string {
  if (days.length === 0) {
    return '*No results*';
  }

  const { headers, rows } = toRows(days);
  const cells = rows.map((row) => headers.map((h) => escapeCell(formatValue(row[h]))));
  const widths = headers.map((h, i) =>
    Math.max(h.length, ...cells.map((line) => line[i]?.length ?? 0))
  );

  const lines: string[] = [];
  lines.push(`| ${headers.map((h, i) => padString(h, widths[i] ?? 0)).join(' | ')} |`);
  lines.push(`| ${widths.map((w) => '-'.repeat(w)).join(' | ')} |`);
  for (const line of cells) {
    lines.push(`| ${line.map((cell, i) => padString(cell, widths[i] ?? 0)).join(' | ')} |`);
  }

  return lines.join('\n');
}

/**
 * Format days as markdown: a heading per day, its hours, then its notes
 */
export function formatAsMarkdown(days: readonly DayView[]): string {
  if (days.length === 0) {
    return '*No results*';
  }

  const sections = days.map((day) => {
    const lines = [`## ${day.date}`, ''];
    if (day.working_hours !== null && day.overtime_hours !== null) {
      lines.push(
        `${formatValue(day.start_time)}-${formatValue(day.end_time)}, ` +
          `break ${day.break_minutes ?? 0} min: ${day.working_hours} h ` +
          `(overtime ${day.overtime_hours} h, balance ${day.cumulative_overtime_hours} h)`
      );
    } else {
      lines.push(`Balance ${day.cumulative_overtime_hours} h`);
    }
    if (day.notes && day.notes.length > 0) {
      lines.push('');
      for (const note of day.notes) {
        lines.push(`- ${note.text}`);
      }
    }
    return lines.join('\n');
  });

  return `${sections.join('\n\n')}\n`;
}

export function formatAsJson(days: readonly DayView[]): string {
  return JSON.stringify(days, null, 2);
}

/**
 * Format results in the specified format
 */
export function formatResult(days: DayView[], format: OutputFormat): FormattedResult {
  let output: string;

  switch (format) {
    case 'table':
      output = formatAsTable(days);
      break;
    case 'markdown':
      output = formatAsMarkdown(days);
      break;
    case 'json':
      output = formatAsJson(days);
      break;
  }

  return { format, output, data: days };
}
