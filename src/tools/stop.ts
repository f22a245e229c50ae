/**
 * timeledger_stop tool
 */

import { z } from 'zod';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { TimeEntry, ToolResult } from '../types/index.js';
import { getStoreManager } from '../services/store/manager.js';
import { getEntry, stopEntry } from '../services/store/entries.js';
import { getSessionController } from '../services/session/index.js';
import { invalidInput, toEntryView, toolFailure, type EntryView } from '../utils/tool-result.js';

const inputSchema = z.object({
  id: z.number().int().positive().optional(),
});

export interface StopOutput {
  stopped: boolean;
  entry: EntryView | null;
  message: string;
}

export const stopTool: Tool = {
  name: 'timeledger_stop',
  description:
    'Stop the running timer, or a specific open entry by id. Stopping when nothing is running, or an id that is missing or already stopped, changes nothing.',
  inputSchema: {
    type: 'object',
    properties: {
      id: {
        type: 'number',
        description: 'Entry id to stop (defaults to the running entry)',
      },
    },
  },
};

export async function stopHandler(args: Record<string, unknown>): Promise<ToolResult<StopOutput>> {
  const parseResult = inputSchema.safeParse(args);
  if (!parseResult.success) {
    return invalidInput(parseResult.error);
  }

  const input = parseResult.data;

  try {
    const controller = await getSessionController();
    let entry: TimeEntry | null;

    if (input.id === undefined) {
      entry = controller.stop();
    } else {
      const db = await getStoreManager().getStore();
      entry = stopEntry(db, input.id) ? getEntry(db, input.id) : null;
      controller.afterMutation();
    }

    return {
      success: true,
      data: {
        stopped: entry !== null,
        entry: entry ? toEntryView(entry) : null,
        message: entry
          ? `Stopped "${entry.task}" on "${entry.project}" after ${toEntryView(entry).duration_formatted}`
          : 'Nothing to stop',
      },
    };
  } catch (error) {
    return toolFailure(error, 'TIMER_STOP_ERROR');
  }
}
