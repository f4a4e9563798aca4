/**
 * Tool registration and dispatch
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { ToolResult } from '../types/config.js';

import { addTool, addHandler } from './add.js';
import { removeTool, removeHandler } from './remove.js';
import { showTool, showHandler } from './show.js';
import { checkTool, checkHandler } from './check.js';
import { dumpTool, dumpHandler } from './dump.js';
import { configTool, configHandler } from './config.js';

type ToolHandler = (args: Record<string, unknown>) => Promise<ToolResult>;

// Tool registry
const tools: Map<string, Tool> = new Map();
const handlers: Map<string, ToolHandler> = new Map();

function register(tool: Tool, handler: ToolHandler): void {
  tools.set(tool.name, tool);
  handlers.set(tool.name, handler);
}

/**
 * Register all tools
 */
export function registerTools(): void {
  // Writes
  register(addTool, addHandler);
  register(removeTool, removeHandler);

  // Reads
  register(showTool, showHandler);
  register(checkTool, checkHandler);
  register(dumpTool, dumpHandler);

  // Settings
  register(configTool, configHandler);
}

/**
 * Get all tool definitions
 */
export function getToolDefinitions(): Tool[] {
  if (tools.size === 0) {
    registerTools();
  }
  return Array.from(tools.values());
}

/**
 * Handle a tool call
 */
export async function handleToolCall(
  name: string,
  args: Record<string, unknown>
): Promise<ToolResult> {
  if (handlers.size === 0) {
    registerTools();
  }

  const handler = handlers.get(name);
  if (!handler) {
    return {
      success: false,
      error: `Unknown tool: ${name}`,
      code: 'UNKNOWN_TOOL',
    };
  }

  return handler(args);
}
