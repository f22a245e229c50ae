/**
 * timeledger_status tool
 *
 * Polled by clients for the live timer and today's total.
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { ToolResult } from '../types/index.js';
import { getSessionController } from '../services/session/index.js';
import { formatDuration } from '../services/time/duration.js';
import { toEntryView, toolFailure, type EntryView } from '../utils/tool-result.js';

export interface StatusOutput {
  running: EntryView | null;
  elapsed_seconds: number;
  elapsed_formatted: string;
  today_seconds: number;
  today_formatted: string;
}

export const statusTool: Tool = {
  name: 'timeledger_status',
  description:
    "Show the running timer with its elapsed time, and the total tracked today (entries crossing midnight count only their part of today; a running entry counts up to now).",
  inputSchema: {
    type: 'object',
    properties: {},
  },
};

export async function statusHandler(_args: Record<string, unknown>): Promise<ToolResult<StatusOutput>> {
  try {
    const controller = await getSessionController();
    const status = controller.status();

    return {
      success: true,
      data: {
        running: status.running ? toEntryView(status.running) : null,
        elapsed_seconds: status.elapsedSeconds,
        elapsed_formatted: formatDuration(status.elapsedSeconds),
        today_seconds: status.todaySeconds,
        today_formatted: formatDuration(status.todaySeconds),
      },
    };
  } catch (error) {
    return toolFailure(error, 'STATUS_ERROR');
  }
}
