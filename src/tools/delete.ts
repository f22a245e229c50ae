/**
 * timeledger_delete tool
 */

import { z } from 'zod';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { ToolResult } from '../types/index.js';
import { getStoreManager } from '../services/store/manager.js';
import { deleteEntry } from '../services/store/entries.js';
import { getSessionController } from '../services/session/index.js';
import { invalidInput, toolFailure } from '../utils/tool-result.js';

const inputSchema = z.object({
  id: z.number().int().positive(),
});

export interface DeleteOutput {
  id: number;
  deleted: boolean;
  message: string;
}

export const deleteTool: Tool = {
  name: 'timeledger_delete',
  description: 'Delete a time entry by id. Deleting an id that does not exist is not an error.',
  inputSchema: {
    type: 'object',
    properties: {
      id: {
        type: 'number',
        description: 'Entry id (required)',
      },
    },
    required: ['id'],
  },
};

export async function deleteHandler(args: Record<string, unknown>): Promise<ToolResult<DeleteOutput>> {
  const parseResult = inputSchema.safeParse(args);
  if (!parseResult.success) {
    return invalidInput(parseResult.error);
  }

  const { id } = parseResult.data;

  try {
    const db = await getStoreManager().getStore();
    const deleted = deleteEntry(db, id);
    (await getSessionController()).afterMutation();

    return {
      success: true,
      data: {
        id,
        deleted,
        message: deleted ? `Deleted entry ${id}` : `Entry ${id} did not exist`,
      },
    };
  } catch (error) {
    return toolFailure(error, 'DELETE_ERROR');
  }
}
