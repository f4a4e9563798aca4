/**
 * ledger_add - Record times, break and notes for a day
 */

import { z } from 'zod';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { ToolResult } from '../types/config.js';
import type { DayRecord, DayUpdate } from '../types/ledger.js';
import { getLedger } from '../services/ledger/index.js';
import { hasDayFields } from '../services/ledger/merge.js';
import { logger } from '../utils/logger.js';
import {
  dateParamSchema,
  timeParamSchema,
  resolveDateParam,
  resolveTimeParam,
  formatValidationError,
} from '../utils/params.js';

const inputSchema = z
  .object({
    date: dateParamSchema.optional(),
    start_time: timeParamSchema.optional(),
    end_time: timeParamSchema.optional(),
    break_minutes: z.number().int().nonnegative().optional(),
    note: z.string().min(1, 'Note cannot be empty').optional(),
    overwrite: z.boolean().optional().default(true),
  })
  .refine((v) => hasDayFields(v) || v.note !== undefined, {
    message: 'At least one of start_time, end_time, break_minutes or note needs to be set',
  });

export interface LedgerAddOutput {
  date: string;
  record: DayRecord;
  note_id?: number;
  message: string;
}

export const addTool: Tool = {
  name: 'ledger_add',
  description: `Record start time, end time, break and/or a note for a day. Date defaults to today; times accept "now".

With overwrite (default true) supplied fields replace stored ones. With overwrite: false only fields that are still empty get filled; stored values are kept. Notes are always appended.`,
  inputSchema: {
    type: 'object',
    properties: {
      date: {
        type: 'string',
        description: 'Date in YYYY-MM-DD format (defaults to today)',
      },
      start_time: {
        type: 'string',
        description: 'Start time in HH:MM format, or "now"',
      },
      end_time: {
        type: 'string',
        description: 'End time in HH:MM format, or "now"',
      },
      break_minutes: {
        type: 'number',
        description: 'Break duration in minutes',
      },
      note: {
        type: 'string',
        description: 'Note to add for the day',
      },
      overwrite: {
        type: 'boolean',
        description: 'Replace stored values (default: true). false only fills empty fields.',
      },
    },
  },
};

export async function addHandler(args: Record<string, unknown>): Promise<ToolResult> {
  const parseResult = inputSchema.safeParse(args);
  if (!parseResult.success) {
    return {
      success: false,
      error: formatValidationError(parseResult.error),
      code: 'VALIDATION_ERROR',
    };
  }

  const input = parseResult.data;

  try {
    const ledger = getLedger();
    const now = new Date();
    const date = resolveDateParam(input.date, now);

    const update: DayUpdate = {
      start_time: resolveTimeParam(input.start_time, now),
      end_time: resolveTimeParam(input.end_time, now),
      break_minutes: input.break_minutes,
    };

    const record = ledger.addOrUpdateDay(date, update, input.overwrite);

    const output: LedgerAddOutput = {
      date,
      record,
      message: `Recorded ${date}`,
    };

    if (input.note !== undefined) {
      const noteId = ledger.addNote(date, input.note);
      output.note_id = noteId;
      output.message = `Recorded ${date} with note ${noteId}`;
    }

    logger.info(output.message, { overwrite: input.overwrite });

    return { success: true, data: output };
  } catch (error) {
    logger.error('ledger_add failed', error);
    return {
      success: false,
      error: error instanceof Error ? error.message : String(error),
      code: 'ADD_ERROR',
    };
  }
}
