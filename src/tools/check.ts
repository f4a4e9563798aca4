/**
 * ledger_check - Report days with missing start time, end time or break
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { ToolResult } from '../types/config.js';
import type { IncompleteDay } from '../types/ledger.js';
import { getLedger, formatIncomplete } from '../services/ledger/index.js';
import { logger } from '../utils/logger.js';

export interface LedgerCheckOutput {
  complete: boolean;
  incomplete: IncompleteDay[];
  lines: string[];
}

export const checkTool: Tool = {
  name: 'ledger_check',
  description:
    'Check recorded days for completeness. Lists every day missing a start time, end time or break duration, one line per missing field.',
  inputSchema: {
    type: 'object',
    properties: {},
  },
};

export async function checkHandler(_args: Record<string, unknown>): Promise<ToolResult> {
  try {
    const incomplete = getLedger().listIncomplete();
    const lines = formatIncomplete(incomplete);

    if (lines.length > 0) {
      logger.debug(`Found ${incomplete.length} incomplete days`);
    }

    const output: LedgerCheckOutput = {
      complete: incomplete.length === 0,
      incomplete,
      lines,
    };
    return { success: true, data: output };
  } catch (error) {
    logger.error('ledger_check failed', error);
    return {
      success: false,
      error: error instanceof Error ? error.message : String(error),
      code: 'CHECK_ERROR',
    };
  }
}
