/**
 * Plain-text table dump
 *
 * Writes one `<table>.dump` file per table: a header line of column names,
 * then one line per row. Values are joined by ", " and absent values are
 * written as "None". REAL columns always carry a decimal point.
 */

import { mkdir, writeFile } from 'fs/promises';
import { join, resolve } from 'path';
import { NOTES_TABLE, WORK_HOURS_TABLE } from '../store/sqlite.js';
import type { RecordStore } from '../store/record-store.js';
import { logger } from '../../utils/logger.js';

export interface DumpResult {
  destination: string;
  files: Array<{ table: string; path: string; rows: number }>;
}

type Cell = string | number | null;

export function dumpValue(value: Cell): string {
  return value === null ? 'None' : String(value);
}

export function realValue(value: number | null): string | null {
  if (value === null) return null;
  return Number.isInteger(value) ? value.toFixed(1) : String(value);
}

export function renderDump(columns: readonly string[], rows: readonly Cell[][]): string {
  const lines = [columns.join(', ')];
  for (const row of rows) {
    lines.push(row.map(dumpValue).join(', '));
  }
  return `${lines.join('\n')}\n`;
}

export async function dumpTables(store: RecordStore, destination: string): Promise<DumpResult> {
  const dir = resolve(destination);
  await mkdir(dir, { recursive: true });

  const notes = store.allNotes();
  const days = store.allRecords();

  const tables: Array<{ table: string; columns: string[]; rows: Cell[][] }> = [
    {
      table: NOTES_TABLE,
      columns: ['id', 'date', 'text'],
      rows: notes.map((n) => [n.id, n.date, n.text]),
    },
    {
      table: WORK_HOURS_TABLE,
      columns: ['date', 'start_time', 'end_time', 'break_minutes'],
      rows: days.map((d) => [d.date, d.start_time, d.end_time, realValue(d.break_minutes)]),
    },
  ];

  const files: DumpResult['files'] = [];
  for (const { table, columns, rows } of tables) {
    const path = join(dir, `${table}.dump`);
    await writeFile(path, renderDump(columns, rows), 'utf-8');
    files.push({ table, path, rows: rows.length });
  }

  logger.info(`Dumped ${files.length} tables to ${dir}`);
  return { destination: dir, files };
}
