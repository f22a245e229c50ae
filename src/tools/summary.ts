/**
 * timeledger_summary tool
 *
 * Totals per project or per day over a date range.
 */

import { z } from 'zod';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { SummaryResult, ToolResult } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { getStoreManager } from '../services/store/manager.js';
import { aggregateRange } from '../services/query/aggregator.js';
import { rangeParamProperties, rangeParamShape, resolveRangeParam } from '../utils/range-param.js';
import { invalidInput, toolFailure } from '../utils/tool-result.js';

const GROUP_BY_OPTIONS = ['project', 'date'] as const;

const inputSchema = z.object({
  ...rangeParamShape,
  group_by: z.enum(GROUP_BY_OPTIONS).optional().default('project'),
});

export const summaryTool: Tool = {
  name: 'timeledger_summary',
  description:
    'Total tracked time over a date range, grouped by project or by day. Entries are cut at the range (and day) boundaries; a running entry counts up to now.',
  inputSchema: {
    type: 'object',
    properties: {
      ...rangeParamProperties,
      group_by: {
        type: 'string',
        description: 'Group results by dimension (default: project)',
        enum: [...GROUP_BY_OPTIONS],
      },
    },
  },
};

export async function summaryHandler(args: Record<string, unknown>): Promise<ToolResult<SummaryResult>> {
  const parseResult = inputSchema.safeParse(args);
  if (!parseResult.success) {
    return invalidInput(parseResult.error);
  }

  const input = parseResult.data;

  try {
    const db = await getStoreManager().getStore();
    const result = aggregateRange(db, resolveRangeParam(input), input.group_by);

    logger.info(`Time summary: ${result.total_entries} entries, ${result.grand_total_formatted} total`);

    return { success: true, data: result };
  } catch (error) {
    return toolFailure(error, 'SUMMARY_ERROR');
  }
}
