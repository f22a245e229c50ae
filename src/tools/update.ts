/**
 * timeledger_update tool
 *
 * Edits an entry. Fields left out keep their stored values; the duration is
 * always recomputed from start and end.
 */

import { z } from 'zod';
import { addSeconds } from 'date-fns';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { ToolResult } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { ValidationError } from '../utils/errors.js';
import { getStoreManager } from '../services/store/manager.js';
import { getEntry, updateEntry } from '../services/store/entries.js';
import { getSessionController } from '../services/session/index.js';
import { parseClock } from '../services/time/duration.js';
import { formatTimestamp, parseTimestamp } from '../services/time/timestamps.js';
import { invalidInput, toEntryView, toolFailure, type EntryView } from '../utils/tool-result.js';

const inputSchema = z.object({
  id: z.number().int().positive(),
  project: z.string().optional(),
  task: z.string().optional(),
  notes: z.string().optional(),
  start: z.string().optional(),
  end: z.string().nullable().optional(),
  duration: z.string().optional(),
});

export interface UpdateOutput {
  updated: boolean;
  entry: EntryView | null;
  message: string;
}

export const updateTool: Tool = {
  name: 'timeledger_update',
  description:
    'Edit a time entry: project, task, notes, start and end (ISO-8601). Pass end as null to re-open the entry, or give a duration (H:MM or H:MM:SS) to set end = start + duration. Omitted fields are kept.',
  inputSchema: {
    type: 'object',
    properties: {
      id: {
        type: 'number',
        description: 'Entry id (required)',
      },
      project: {
        type: 'string',
        description: 'Project name (created if new)',
      },
      task: {
        type: 'string',
        description: 'Task title',
      },
      notes: {
        type: 'string',
        description: 'Notes',
      },
      start: {
        type: 'string',
        description: 'Start timestamp, e.g. 2026-03-02T09:00:00',
      },
      end: {
        type: ['string', 'null'],
        description: 'End timestamp, or null to mark the entry as running',
      },
      duration: {
        type: 'string',
        description: 'Alternative to end: length as H:MM or H:MM:SS',
      },
    },
    required: ['id'],
  },
};

export async function updateHandler(args: Record<string, unknown>): Promise<ToolResult<UpdateOutput>> {
  const parseResult = inputSchema.safeParse(args);
  if (!parseResult.success) {
    return invalidInput(parseResult.error);
  }

  const input = parseResult.data;

  try {
    const db = await getStoreManager().getStore();
    const existing = getEntry(db, input.id);
    if (!existing) {
      return {
        success: true,
        data: { updated: false, entry: null, message: `Entry ${input.id} not found` },
      };
    }

    const start = input.start ?? existing.start;
    let end = input.end !== undefined ? input.end : existing.end;

    if (input.duration !== undefined) {
      if (input.end !== undefined) {
        throw new ValidationError('Give either end or duration, not both', 'duration');
      }
      const seconds = parseClock(input.duration);
      if (seconds === null) {
        throw new ValidationError(
          `Invalid duration: "${input.duration}" must be H:MM or H:MM:SS`,
          'duration'
        );
      }
      end = formatTimestamp(addSeconds(parseTimestamp(start, 'start'), seconds));
    }

    const updated = updateEntry(db, input.id, {
      projectName: input.project ?? existing.project,
      task: input.task ?? existing.task,
      notes: input.notes ?? existing.notes ?? '',
      start,
      end,
    });

    const controller = await getSessionController();
    controller.afterMutation();

    const entry = getEntry(db, input.id);
    logger.debug(`Entry ${input.id} edited`, { updated });

    return {
      success: true,
      data: {
        updated,
        entry: entry ? toEntryView(entry) : null,
        message: updated ? `Updated entry ${input.id}` : `Entry ${input.id} not found`,
      },
    };
  } catch (error) {
    return toolFailure(error, 'UPDATE_ERROR');
  }
}
