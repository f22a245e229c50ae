/**
 * timeledger_export tool
 *
 * Writes the entries of a date range to a CSV file.
 */

import { join } from 'path';
import { z } from 'zod';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { ToolResult } from '../types/index.js';
import { getConfig } from '../config/index.js';
import { getStoreManager } from '../services/store/manager.js';
import { queryEntries } from '../services/query/entries.js';
import { exportRows } from '../services/export/csv.js';
import { rangeParamProperties, rangeParamShape, resolveRangeParam } from '../utils/range-param.js';
import { invalidInput, toolFailure } from '../utils/tool-result.js';

const inputSchema = z.object({
  ...rangeParamShape,
  path: z.string().min(1).optional(),
});

export interface ExportOutput {
  exported: boolean;
  path: string | null;
  rows: number;
  message: string;
}

export const exportTool: Tool = {
  name: 'timeledger_export',
  description:
    'Export the entries of a date range to CSV (columns ID, Project, Task, Notes, Start, End, Duration). Without a path the file is named timeledger_<from>_<to>.csv in the export directory.',
  inputSchema: {
    type: 'object',
    properties: {
      ...rangeParamProperties,
      path: {
        type: 'string',
        description: 'Destination file (defaults to the configured export directory)',
      },
    },
  },
};

export function defaultExportFilename(from: string, to: string): string {
  return `timeledger_${from}_${to}.csv`;
}

export async function exportHandler(args: Record<string, unknown>): Promise<ToolResult<ExportOutput>> {
  const parseResult = inputSchema.safeParse(args);
  if (!parseResult.success) {
    return invalidInput(parseResult.error);
  }

  const input = parseResult.data;

  try {
    const range = resolveRangeParam(input);
    const db = await getStoreManager().getStore();
    const rows = queryEntries(db, range);

    if (rows.length === 0) {
      return {
        success: true,
        data: { exported: false, path: null, rows: 0, message: 'No entries for the selected filter' },
      };
    }

    const destination = input.path ?? join(getConfig().exportDir, defaultExportFilename(range.from, range.to));
    const result = await exportRows(rows, destination);

    return {
      success: true,
      data: {
        exported: true,
        path: result.path,
        rows: result.rows,
        message: `Saved ${result.rows} entries to ${result.path}`,
      },
    };
  } catch (error) {
    return toolFailure(error, 'EXPORT_ERROR');
  }
}
