/**
 * Date range parameters shared by the query, summary and export tools
 */

import { z } from 'zod';
import { startOfMonth } from 'date-fns';
import type { EntryRange } from '../types/index.js';
import { formatDay } from '../services/time/timestamps.js';

const daySchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Must be YYYY-MM-DD');

export const rangeParamShape = {
  from: daySchema.optional(),
  to: daySchema.optional(),
  project: z.string().optional(),
};

export const rangeParamProperties = {
  from: {
    type: 'string',
    description: 'First day, YYYY-MM-DD (defaults to the first of the current month)',
  },
  to: {
    type: 'string',
    description: 'Last day, inclusive, YYYY-MM-DD (defaults to today)',
  },
  project: {
    type: 'string',
    description: 'Only entries of this exact project name',
  },
};

/**
 * Fill in the default range: first of this month through today
 */
export function resolveRangeParam(
  input: { from?: string | undefined; to?: string | undefined; project?: string | undefined },
  now: Date = new Date()
): EntryRange & { from: string; to: string } {
  return {
    from: input.from ?? formatDay(startOfMonth(now)),
    to: input.to ?? formatDay(now),
    project: input.project,
  };
}
