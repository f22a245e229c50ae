/**
 * timeledger_entries tool
 *
 * History listing filtered by date range and project.
 */

import { z } from 'zod';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { ToolResult } from '../types/index.js';
import { getStoreManager } from '../services/store/manager.js';
import { queryEntries } from '../services/query/entries.js';
import { rangeParamProperties, rangeParamShape, resolveRangeParam } from '../utils/range-param.js';
import { invalidInput, toEntryView, toolFailure, type EntryView } from '../utils/tool-result.js';

const inputSchema = z.object(rangeParamShape);

export interface EntriesOutput {
  from: string;
  to: string;
  project: string | null;
  entries: EntryView[];
  count: number;
}

export const entriesTool: Tool = {
  name: 'timeledger_entries',
  description:
    'List time entries that started within a date range (whole days, inclusive), newest first. Optionally restricted to one project.',
  inputSchema: {
    type: 'object',
    properties: {
      ...rangeParamProperties,
    },
  },
};

export async function entriesHandler(args: Record<string, unknown>): Promise<ToolResult<EntriesOutput>> {
  const parseResult = inputSchema.safeParse(args);
  if (!parseResult.success) {
    return invalidInput(parseResult.error);
  }

  try {
    const range = resolveRangeParam(parseResult.data);
    const db = await getStoreManager().getStore();
    const entries = queryEntries(db, range);
    const now = new Date();

    return {
      success: true,
      data: {
        from: range.from,
        to: range.to,
        project: range.project ?? null,
        entries: entries.map((entry) => toEntryView(entry, now)),
        count: entries.length,
      },
    };
  } catch (error) {
    return toolFailure(error, 'QUERY_ERROR');
  }
}
