/**
 * ledger_remove - Remove a note by id or a day by date
 */

import { z } from 'zod';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { ToolResult } from '../types/config.js';
import { getLedger } from '../services/ledger/index.js';
import { logger } from '../utils/logger.js';
import { dateParamSchema, formatValidationError } from '../utils/params.js';

type RemoveTarget = { target: 'note'; id: number } | { target: 'day'; date: string };

const inputSchema = z
  .object({
    id: z.number().int().positive().optional(),
    date: dateParamSchema.optional(),
  })
  .refine((v) => v.id === undefined || v.date === undefined, {
    message: 'id and date cannot both be set',
  })
  .transform((v, ctx): RemoveTarget => {
    if (v.id !== undefined) return { target: 'note', id: v.id };
    if (v.date !== undefined) return { target: 'day', date: v.date };
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'At least one of id or date needs to be set',
    });
    return z.NEVER;
  });

export interface LedgerRemoveOutput {
  target: 'note' | 'day';
  id?: number;
  date?: string;
  removed: boolean;
  message: string;
}

export const removeTool: Tool = {
  name: 'ledger_remove',
  description:
    'Remove a note (by id) or a whole day record (by date). Removing something that does not exist is not an error. Notes of a removed day are kept.',
  inputSchema: {
    type: 'object',
    properties: {
      id: {
        type: 'number',
        description: 'ID of the note to remove',
      },
      date: {
        type: 'string',
        description: 'Date (YYYY-MM-DD) of the day record to remove',
      },
    },
  },
};

export async function removeHandler(args: Record<string, unknown>): Promise<ToolResult> {
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
    let output: LedgerRemoveOutput;

    if (input.target === 'note') {
      const { id } = input;
      const removed = ledger.removeNote(id);
      output = {
        target: 'note',
        id,
        removed,
        message: removed ? `Removed note ${id}` : `No note with id ${id}`,
      };
    } else {
      const { date } = input;
      const removed = ledger.removeDay(date);
      output = {
        target: 'day',
        date,
        removed,
        message: removed ? `Removed ${date}` : `No record for ${date}`,
      };
    }

    logger.info(output.message);
    return { success: true, data: output };
  } catch (error) {
    logger.error('ledger_remove failed', error);
    return {
      success: false,
      error: error instanceof Error ? error.message : String(error),
      code: 'REMOVE_ERROR',
    };
  }
}
