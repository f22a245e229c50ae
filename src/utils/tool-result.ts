/**
 * Shared tool response helpers
 */

import type { ZodError } from 'zod';
import type { TimeEntry, ToolError } from '../types/index.js';
import { elapsedSeconds } from '../services/query/aggregator.js';
import { formatDuration } from '../services/time/duration.js';
import { errorMessage, isValidationError } from './errors.js';
import { logger } from './logger.js';

export interface EntryView {
  id: number;
  project: string;
  task: string;
  notes: string;
  start: string;
  end: string | null;
  running: boolean;
  duration_seconds: number;
  duration_formatted: string;
}

/**
 * Entry as returned to clients; running entries report live elapsed time
 */
export function toEntryView(entry: TimeEntry, now: Date = new Date()): EntryView {
  const seconds = elapsedSeconds(entry, now);
  return {
    id: entry.id,
    project: entry.project,
    task: entry.task,
    notes: entry.notes ?? '',
    start: entry.start,
    end: entry.end,
    running: entry.end === null,
    duration_seconds: seconds,
    duration_formatted: formatDuration(seconds),
  };
}

export function invalidInput(error: ZodError): ToolError {
  return {
    success: false,
    error: error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; '),
    code: 'VALIDATION_ERROR',
  };
}

/**
 * Map a thrown error to a tool failure. Validation errors keep their own code;
 * anything else is logged and reported under `code`.
 */
export function toolFailure(error: unknown, code: string): ToolError {
  if (isValidationError(error)) {
    return { success: false, error: error.message, code: 'VALIDATION_ERROR' };
  }
  logger.error(`${code}: ${errorMessage(error)}`, error);
  return { success: false, error: errorMessage(error), code };
}
