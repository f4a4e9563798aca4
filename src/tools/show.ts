/**
 * ledger_show - Show days with working hours and overtime
 *
 * Filters are exclusive: date, month (optionally with year), year, or all.
 * Without a filter the current month is shown.
 */

import { z } from 'zod';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { ToolResult } from '../types/config.js';
import type { DayFilter } from '../types/ledger.js';
import { getLedger } from '../services/ledger/index.js';
import { formatResult, OUTPUT_FORMATS } from '../services/format/index.js';
import type { OutputFormat } from '../services/format/index.js';
import { logger } from '../utils/logger.js';
import { currentMonth } from '../utils/time.js';
import {
  dateParamSchema,
  monthParamSchema,
  yearParamSchema,
  formatValidationError,
} from '../utils/params.js';

const inputSchema = z
  .object({
    date: dateParamSchema.optional(),
    month: monthParamSchema.optional(),
    year: yearParamSchema.optional(),
    all: z.boolean().optional(),
    notes: z.boolean().optional().default(false),
    format: z.enum(OUTPUT_FORMATS).optional().default('table'),
  })
  .superRefine((v, ctx) => {
    const all = v.all === true;
    if (v.date !== undefined && (v.month !== undefined || v.year !== undefined || all)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'If date is set, month, year and all must not be set',
      });
    } else if (all && (v.month !== undefined || v.year !== undefined)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'If all is set, date, month and year must not be set',
      });
    }
  });

export interface LedgerShowOutput {
  filter: DayFilter;
  count: number;
  format: OutputFormat;
  output: string;
}

export const showTool: Tool = {
  name: 'ledger_show',
  description: `Show recorded days with working hours, daily overtime and the running overtime balance. The balance always covers the full history, whatever window is shown.

Pick one window: date, month (with optional year, defaults to this year), year, or all. Defaults to the current month. Set notes: true to include each day's notes.`,
  inputSchema: {
    type: 'object',
    properties: {
      date: {
        type: 'string',
        description: 'Single date in YYYY-MM-DD format',
      },
      month: {
        oneOf: [{ type: 'string' }, { type: 'number' }],
        description: 'Month (1-12 or MM)',
      },
      year: {
        oneOf: [{ type: 'string' }, { type: 'number' }],
        description: 'Year (YYYY)',
      },
      all: {
        type: 'boolean',
        description: 'Show all records',
      },
      notes: {
        type: 'boolean',
        description: 'Include notes (default: false)',
      },
      format: {
        type: 'string',
        enum: [...OUTPUT_FORMATS],
        description: 'Output format (default: table)',
      },
    },
  },
};

/**
 * Build the day filter from validated input
 */
export function buildFilter(
  input: { date?: string | undefined; month?: string | undefined; year?: string | undefined; all?: boolean | undefined },
  now: Date = new Date()
): DayFilter {
  if (input.date !== undefined) return { kind: 'date', date: input.date };
  if (input.all === true) return { kind: 'all' };
  if (input.month !== undefined) return { kind: 'month', month: input.month, year: input.year };
  if (input.year !== undefined) return { kind: 'year', year: input.year };
  return { kind: 'month', month: currentMonth(now) };
}

export async function showHandler(args: Record<string, unknown>): Promise<ToolResult> {
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
    const filter = buildFilter(input);
    const days = getLedger().queryDays(filter, { includeNotes: input.notes });
    const formatted = formatResult(days, input.format);

    logger.debug(`ledger_show returned ${days.length} days`, filter);

    const output: LedgerShowOutput = {
      filter,
      count: days.length,
      format: formatted.format,
      output: formatted.output,
    };
    return { success: true, data: output };
  } catch (error) {
    logger.error('ledger_show failed', error);
    return {
      success: false,
      error: error instanceof Error ? error.message : String(error),
      code: 'SHOW_ERROR',
    };
  }
}
