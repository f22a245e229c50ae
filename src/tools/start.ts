/**
 * timeledger_start tool
 *
 * Starts a timer. Whatever was running is stopped at the same instant.
 */

import { z } from 'zod';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { ToolResult } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { getSessionController } from '../services/session/index.js';
import { invalidInput, toEntryView, toolFailure, type EntryView } from '../utils/tool-result.js';

const inputSchema = z.object({
  project: z.string().trim().min(1, 'Project is required'),
  task: z.string().optional().default(''),
  notes: z.string().optional().default(''),
});

export interface StartOutput {
  entry: EntryView;
  stopped_previous: number | null;
  message: string;
}

export const startTool: Tool = {
  name: 'timeledger_start',
  description:
    'Start tracking time on a project task. If a timer is already running it is stopped first, so only one timer ever runs. The project is created on first use.',
  inputSchema: {
    type: 'object',
    properties: {
      project: {
        type: 'string',
        description: 'Project name (required)',
      },
      task: {
        type: 'string',
        description: 'What is being worked on (defaults to "(untitled)")',
      },
      notes: {
        type: 'string',
        description: 'Optional notes',
      },
    },
    required: ['project'],
  },
};

export async function startHandler(args: Record<string, unknown>): Promise<ToolResult<StartOutput>> {
  const parseResult = inputSchema.safeParse(args);
  if (!parseResult.success) {
    return invalidInput(parseResult.error);
  }

  const input = parseResult.data;

  try {
    const controller = await getSessionController();
    const previous = controller.refresh();
    const entry = controller.start(input.project, input.task, input.notes);
    const stoppedPrevious = previous && previous.id !== entry.id ? previous.id : null;

    logger.info(`Timer started: ${entry.project} / ${entry.task}`);

    return {
      success: true,
      data: {
        entry: toEntryView(entry),
        stopped_previous: stoppedPrevious,
        message:
          stoppedPrevious === null
            ? `Started "${entry.task}" on "${entry.project}"`
            : `Stopped entry ${stoppedPrevious} and started "${entry.task}" on "${entry.project}"`,
      },
    };
  } catch (error) {
    return toolFailure(error, 'TIMER_START_ERROR');
  }
}
