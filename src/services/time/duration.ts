/**
 * Duration formatting and interval math
 */

const CLOCK_FIELD = /^[+-]?\d+$/;

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Format seconds as [-]HH:MM:SS. Hours grow past two digits as needed.
 */
export function formatDuration(seconds: number): string {
  const negative = seconds < 0;
  const total = Math.trunc(Math.abs(seconds));
  const hours = Math.floor(total / 3600);
  const minutes = Math.floor((total % 3600) / 60);
  const secs = total % 60;
  return `${negative ? '-' : ''}${pad2(hours)}:${pad2(minutes)}:${pad2(secs)}`;
}

/**
 * Parse H:MM or H:MM:SS into seconds; null when the text is not a clock value.
 * Minutes and seconds must be in [0, 60). Hours are any integer.
 */
export function parseClock(text: string): number | null {
  const parts = text.trim().split(':');
  if (parts.length !== 2 && parts.length !== 3) return null;
  if (!parts.every((part) => CLOCK_FIELD.test(part))) return null;

  const [hours, minutes, seconds = 0] = parts.map((part) => parseInt(part, 10));
  if (hours === undefined || minutes === undefined) return null;
  if (minutes < 0 || minutes >= 60 || seconds < 0 || seconds >= 60) return null;

  return hours * 3600 + minutes * 60 + seconds;
}

export interface Interval {
  start: number; // epoch ms
  end: number;
}

/**
 * Intersect [start, end] with a window. An interval with end <= start
 * contributes nothing.
 */
export function clampInterval(
  start: number,
  end: number,
  windowStart: number,
  windowEnd: number
): Interval {
  return {
    start: Math.max(start, windowStart),
    end: Math.min(end, windowEnd),
  };
}

/**
 * Whole seconds covered by an interval, 0 when empty
 */
export function intervalSeconds(interval: Interval): number {
  if (interval.end <= interval.start) return 0;
  return Math.floor((interval.end - interval.start) / 1000);
}
