/**
 * ledger_config - Read and change stored settings
 *
 * Plain key/value access to the config table. expected_workday_hours is the
 * setting the overtime calculation reads.
 */

import { z } from 'zod';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { ToolResult } from '../types/config.js';
import { getLedger } from '../services/ledger/index.js';
import { SettingNotFoundError } from '../services/store/settings-store.js';
import { logger } from '../utils/logger.js';
import { formatValidationError } from '../utils/params.js';

const inputSchema = z.discriminatedUnion('action', [
  z.object({ action: z.literal('list') }),
  z.object({ action: z.literal('get'), key: z.string().min(1) }),
  z.object({
    action: z.literal('set'),
    key: z.string().min(1),
    value: z.union([z.string(), z.number()]).transform(String),
  }),
  z.object({ action: z.literal('delete'), key: z.string().min(1) }),
]);

export const configTool: Tool = {
  name: 'ledger_config',
  description: `Manage ledger settings stored in the database.

Actions: list (all settings), get (one key), set (key + value), delete (one key).
The overtime calculation reads expected_workday_hours (default 7.8).`,
  inputSchema: {
    type: 'object',
    properties: {
      action: {
        type: 'string',
        enum: ['list', 'get', 'set', 'delete'],
        description: 'What to do',
      },
      key: {
        type: 'string',
        description: 'Setting name (get, set, delete)',
      },
      value: {
        oneOf: [{ type: 'string' }, { type: 'number' }],
        description: 'New value (set)',
      },
    },
    required: ['action'],
  },
};

export async function configHandler(args: Record<string, unknown>): Promise<ToolResult> {
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

    switch (input.action) {
      case 'list':
        return { success: true, data: { settings: ledger.listSettings() } };
      case 'get':
        return { success: true, data: { key: input.key, value: ledger.getSetting(input.key) } };
      case 'set':
        ledger.setSetting(input.key, input.value);
        logger.info(`Set ${input.key} = ${input.value}`);
        return { success: true, data: { key: input.key, value: input.value } };
      case 'delete': {
        const removed = ledger.deleteSetting(input.key);
        logger.info(`Deleted setting ${input.key}`, { removed });
        return { success: true, data: { key: input.key, removed } };
      }
    }
  } catch (error) {
    if (error instanceof SettingNotFoundError) {
      return { success: false, error: error.message, code: 'NOT_FOUND' };
    }
    logger.error('ledger_config failed', error);
    return {
      success: false,
      error: error instanceof Error ? error.message : String(error),
      code: 'CONFIG_ERROR',
    };
  }
}
