/**
 * Tool registration and dispatch
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { ToolResult } from '../types/index.js';

import { startTool, startHandler } from './start.js';
import { stopTool, stopHandler } from './stop.js';
import { statusTool, statusHandler } from './status.js';
import { projectsTool, projectsHandler } from './projects.js';
import { entriesTool, entriesHandler } from './entries.js';
import { updateTool, updateHandler } from './update.js';
import { deleteTool, deleteHandler } from './delete.js';
import { summaryTool, summaryHandler } from './summary.js';
import { exportTool, exportHandler } from './export.js';

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
  // Timer
  register(startTool, startHandler);
  register(stopTool, stopHandler);
  register(statusTool, statusHandler);

  // History
  register(projectsTool, projectsHandler);
  register(entriesTool, entriesHandler);
  register(updateTool, updateHandler);
  register(deleteTool, deleteHandler);

  // Reporting
  register(summaryTool, summaryHandler);
  register(exportTool, exportHandler);
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
