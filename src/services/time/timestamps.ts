/**
 * Local-naive timestamp codec and day windows
 *
 * Stored timestamps are `yyyy-MM-ddTHH:mm:ss` in host local time, with no
 * offset. They sort lexically in chronological order, which the range
 * queries rely on.
 */

import {
  differenceInSeconds,
  endOfDay,
  format,
  isValid,
  parseISO,
  startOfDay,
  startOfSecond,
} from 'date-fns';
import { ValidationError } from '../../utils/errors.js';

const TIMESTAMP_FORMAT = "yyyy-MM-dd'T'HH:mm:ss";
const BOUNDARY_FORMAT = "yyyy-MM-dd'T'HH:mm:ss.SSS";
const DAY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export interface DayWindow {
  start: Date;
  end: Date;
}

/**
 * Format a date as a stored timestamp (second precision)
 */
export function formatTimestamp(date: Date): string {
  return format(date, TIMESTAMP_FORMAT);
}

/**
 * Format a window boundary for comparison against stored timestamps
 */
export function formatBoundary(date: Date): string {
  return format(date, BOUNDARY_FORMAT);
}

export function formatDay(date: Date): string {
  return format(date, 'yyyy-MM-dd');
}

/**
 * Current time truncated to the second, so stored values and computed
 * durations agree exactly.
 */
export function nowToSecond(now: Date = new Date()): Date {
  return startOfSecond(now);
}

/**
 * Parse an ISO-8601 timestamp. Inputs with an offset are converted to host
 * local time.
 */
export function parseTimestamp(text: string, field = 'timestamp'): Date {
  const trimmed = text.trim();
  const parsed = parseISO(trimmed);
  if (!trimmed || !isValid(parsed)) {
    throw new ValidationError(`Invalid ${field}: "${text}" is not an ISO-8601 timestamp`, field);
  }
  return parsed;
}

/**
 * Rewrite any accepted timestamp into the stored form
 */
export function normalizeTimestamp(text: string, field = 'timestamp'): string {
  return formatTimestamp(startOfSecond(parseTimestamp(text, field)));
}

/**
 * Resolve a YYYY-MM-DD string or a Date to the start of that local day
 */
export function parseDay(input: Date | string, field = 'date'): Date {
  if (input instanceof Date) {
    if (!isValid(input)) {
      throw new ValidationError(`Invalid ${field}: not a valid date`, field);
    }
    return startOfDay(input);
  }

  const trimmed = input.trim();
  const parsed = parseISO(trimmed);
  if (!DAY_PATTERN.test(trimmed) || !isValid(parsed)) {
    throw new ValidationError(`Invalid ${field}: "${input}" must be YYYY-MM-DD`, field);
  }
  return startOfDay(parsed);
}

/**
 * 00:00:00.000 to 23:59:59.999 of the given day
 */
export function dayWindow(day: Date): DayWindow {
  return { start: startOfDay(day), end: endOfDay(day) };
}

/**
 * Whole seconds from start to end of two stored timestamps; negative when
 * end precedes start.
 */
export function secondsBetween(start: string, end: string): number {
  return differenceInSeconds(parseISO(end), parseISO(start));
}
