/**
 * Time aggregation
 *
 * Totals are computed from each entry's interval clamped to the window being
 * reported on, so entries crossing midnight or still running are split
 * correctly. Nothing is cached: an open entry's share grows with `now`.
 */

import Database from 'better-sqlite3';
import { eachDayOfInterval, parseISO } from 'date-fns';
import type {
  EntryRange,
  GroupBy,
  SummaryGroup,
  SummaryResult,
  TimeEntry,
} from '../../types/index.js';
import { clampInterval, formatDuration, intervalSeconds, type Interval } from '../time/duration.js';
import { dayWindow, formatDay, secondsBetween, type DayWindow } from '../time/timestamps.js';
import { queryOverlapping, resolveRange } from './entries.js';
import { logger } from '../../utils/logger.js';

/**
 * Entry interval in epoch ms; an open entry ends at `now`
 */
export function entryInterval(entry: Pick<TimeEntry, 'start' | 'end'>, now: Date): Interval {
  return {
    start: parseISO(entry.start).getTime(),
    end: entry.end ? parseISO(entry.end).getTime() : now.getTime(),
  };
}

function secondsWithin(interval: Interval, window: DayWindow): number {
  return intervalSeconds(
    clampInterval(interval.start, interval.end, window.start.getTime(), window.end.getTime())
  );
}

/**
 * Seconds elapsed on an entry: live for a running entry, stored otherwise
 */
export function elapsedSeconds(entry: TimeEntry, now: Date = new Date()): number {
  if (entry.end === null) {
    return Math.floor((now.getTime() - parseISO(entry.start).getTime()) / 1000);
  }
  return entry.duration ?? secondsBetween(entry.start, entry.end);
}

/**
 * Total seconds worked today, including the running entry up to now
 */
export function sumToday(db: Database.Database, now: Date = new Date()): number {
  const today = dayWindow(now);
  const entries = queryOverlapping(db, today);

  let total = 0;
  for (const entry of entries) {
    total += secondsWithin(entryInterval(entry, now), today);
  }
  return total;
}

/**
 * Aggregate a date range by project or by day
 */
export function aggregateRange(
  db: Database.Database,
  range: EntryRange,
  groupBy: GroupBy = 'project',
  now: Date = new Date()
): SummaryResult {
  const resolved = resolveRange(range);
  const entries = queryOverlapping(db, resolved.window, resolved.project);
  logger.debug(`Aggregating ${entries.length} entries by ${groupBy}`);

  const totals = new Map<string, { seconds: number; count: number }>();
  const add = (key: string, seconds: number): void => {
    const group = totals.get(key) ?? { seconds: 0, count: 0 };
    group.seconds += seconds;
    group.count += 1;
    totals.set(key, group);
  };

  const days =
    groupBy === 'date' ? eachDayOfInterval({ start: resolved.from, end: resolved.to }).map(dayWindow) : [];
  const contributing = new Set<number>();

  for (const entry of entries) {
    const interval = entryInterval(entry, now);

    if (groupBy === 'project') {
      const seconds = secondsWithin(interval, resolved.window);
      if (seconds > 0) {
        add(entry.project, seconds);
        contributing.add(entry.id);
      }
      continue;
    }

    for (const day of days) {
      const seconds = secondsWithin(interval, day);
      if (seconds > 0) {
        add(formatDay(day.start), seconds);
        contributing.add(entry.id);
      }
    }
  }

  const groups: SummaryGroup[] = Array.from(totals, ([key, { seconds, count }]) => ({
    key,
    total_seconds: seconds,
    total_formatted: formatDuration(seconds),
    entry_count: count,
  }));

  if (groupBy === 'project') {
    groups.sort((a, b) => b.total_seconds - a.total_seconds || a.key.localeCompare(b.key));
  } else {
    groups.sort((a, b) => a.key.localeCompare(b.key));
  }

  const grandTotal = groups.reduce((sum, g) => sum + g.total_seconds, 0);

  return {
    from: formatDay(resolved.from),
    to: formatDay(resolved.to),
    group_by: groupBy,
    groups,
    grand_total_seconds: grandTotal,
    grand_total_formatted: formatDuration(grandTotal),
    total_entries: contributing.size,
  };
}
