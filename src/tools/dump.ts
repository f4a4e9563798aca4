/**
 * ledger_dump - Dump all tables to plain-text files
 */

import { z } from 'zod';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { ToolResult } from '../types/config.js';
import { getLedger, dumpTables } from '../services/ledger/index.js';
import { logger } from '../utils/logger.js';
import { formatValidationError } from '../utils/params.js';

const inputSchema = z.object({
  destination: z.string().min(1, 'Destination is required'),
});

export const dumpTool: Tool = {
  name: 'ledger_dump',
  description:
    'Dump the notes and work_hours tables to notes.dump and work_hours.dump in the destination directory (created if needed).',
  inputSchema: {
    type: 'object',
    properties: {
      destination: {
        type: 'string',
        description: 'Destination directory',
      },
    },
    required: ['destination'],
  },
};

export async function dumpHandler(args: Record<string, unknown>): Promise<ToolResult> {
  const parseResult = inputSchema.safeParse(args);
  if (!parseResult.success) {
    return {
      success: false,
      error: formatValidationError(parseResult.error),
      code: 'VALIDATION_ERROR',
    };
  }

  try {
    const result = await dumpTables(getLedger().records, parseResult.data.destination);
    return { success: true, data: result };
  } catch (error) {
    logger.error('ledger_dump failed', error);
    return {
      success: false,
      error: error instanceof Error ? error.message : String(error),
      code: 'DUMP_ERROR',
    };
  }
}
