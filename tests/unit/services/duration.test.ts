/**
 * Tests for duration and timestamp utilities
 */

import { describe, it, expect } from 'vitest';
import {
  formatDuration,
  parseClock,
  clampInterval,
  intervalSeconds,
} from '../../../src/services/time/duration.js';
import {
  formatTimestamp,
  normalizeTimestamp,
  parseTimestamp,
  parseDay,
  dayWindow,
  secondsBetween,
  nowToSecond,
} from '../../../src/services/time/timestamps.js';
import { ValidationError } from '../../../src/utils/errors.js';

describe('Time utilities', () => {
  describe('formatDuration', () => {
    it('formats hours, minutes and seconds', () => {
      expect(formatDuration(3661)).toBe('01:01:01');
      expect(formatDuration(0)).toBe('00:00:00');
      expect(formatDuration(59)).toBe('00:00:59');
    });

    it('prefixes negative values with a sign', () => {
      expect(formatDuration(-5)).toBe('-00:00:05');
      expect(formatDuration(-3661)).toBe('-01:01:01');
    });

    it('lets hours grow past two digits', () => {
      expect(formatDuration(360000)).toBe('100:00:00');
    });

    it('drops fractional seconds', () => {
      expect(formatDuration(59.9)).toBe('00:00:59');
    });
  });

  describe('parseClock', () => {
    it('parses H:MM', () => {
      expect(parseClock('9:30')).toBe(34200);
      expect(parseClock('0:05')).toBe(300);
    });

    it('parses H:MM:SS', () => {
      expect(parseClock('1:02:03')).toBe(3723);
    });

    it('trims surrounding whitespace', () => {
      expect(parseClock(' 2:05 ')).toBe(7500);
    });

    it('rejects minutes or seconds outside [0, 60)', () => {
      expect(parseClock('1:60')).toBeNull();
      expect(parseClock('1:30:60')).toBeNull();
    });

    it('rejects the wrong number of fields', () => {
      expect(parseClock('bad')).toBeNull();
      expect(parseClock('')).toBeNull();
      expect(parseClock('1:2:3:4')).toBeNull();
    });

    it('rejects non-numeric fields', () => {
      expect(parseClock('1:xx')).toBeNull();
      expect(parseClock('a:30')).toBeNull();
      expect(parseClock('1.5:30')).toBeNull();
    });

    it('parses signed hours as a plain integer', () => {
      expect(parseClock('-1:30')).toBe(-1800);
      expect(parseClock('+1:30')).toBe(5400);
    });
  });

  describe('clampInterval', () => {
    it('intersects an interval with a window', () => {
      expect(clampInterval(0, 100, 10, 50)).toEqual({ start: 10, end: 50 });
      expect(clampInterval(20, 30, 10, 50)).toEqual({ start: 20, end: 30 });
    });

    it('yields an empty interval when there is no overlap', () => {
      const clamped = clampInterval(0, 5, 10, 50);
      expect(clamped).toEqual({ start: 10, end: 5 });
      expect(intervalSeconds(clamped)).toBe(0);
    });
  });

  describe('intervalSeconds', () => {
    it('floors to whole seconds', () => {
      expect(intervalSeconds({ start: 0, end: 1999 })).toBe(1);
      expect(intervalSeconds({ start: 1000, end: 4000 })).toBe(3);
    });

    it('returns 0 for empty intervals', () => {
      expect(intervalSeconds({ start: 5000, end: 5000 })).toBe(0);
    });
  });

  describe('timestamps', () => {
    it('formats local-naive timestamps with second precision', () => {
      expect(formatTimestamp(new Date(2026, 5, 10, 9, 5, 7, 800))).toBe('2026-06-10T09:05:07');
    });

    it('truncates the current time to the second', () => {
      const truncated = nowToSecond(new Date(2026, 5, 10, 9, 5, 7, 800));
      expect(truncated.getMilliseconds()).toBe(0);
      expect(truncated.getSeconds()).toBe(7);
    });

    it('normalizes accepted inputs to the stored form', () => {
      expect(normalizeTimestamp('2026-06-10T09:05')).toBe('2026-06-10T09:05:00');
      expect(normalizeTimestamp('  2026-06-10T09:05:07  ')).toBe('2026-06-10T09:05:07');
      expect(normalizeTimestamp('2026-06-10')).toBe('2026-06-10T00:00:00');
    });

    it('rejects unparseable timestamps', () => {
      expect(() => parseTimestamp('yesterday', 'start')).toThrow(ValidationError);
      expect(() => parseTimestamp('', 'end')).toThrow(ValidationError);
    });

    it('names the rejected field', () => {
      try {
        parseTimestamp('nope', 'end');
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(ValidationError);
        expect(error instanceof ValidationError ? error.field : undefined).toBe('end');
      }
    });

    it('computes signed whole seconds between timestamps', () => {
      expect(secondsBetween('2026-06-10T09:00:00', '2026-06-10T10:30:15')).toBe(5415);
      expect(secondsBetween('2026-06-10T10:30:15', '2026-06-10T09:00:00')).toBe(-5415);
    });
  });

  describe('days', () => {
    it('parses YYYY-MM-DD to local midnight', () => {
      expect(parseDay('2026-06-10').getTime()).toBe(new Date(2026, 5, 10).getTime());
    });

    it('accepts Date values', () => {
      expect(parseDay(new Date(2026, 5, 10, 15, 30)).getTime()).toBe(new Date(2026, 5, 10).getTime());
    });

    it('rejects malformed or impossible days', () => {
      expect(() => parseDay('2026-6-1')).toThrow(ValidationError);
      expect(() => parseDay('2026/06/10')).toThrow(ValidationError);
      expect(() => parseDay('2026-02-30')).toThrow(ValidationError);
      expect(() => parseDay(new Date(Number.NaN))).toThrow(ValidationError);
    });

    it('spans a full day', () => {
      const window = dayWindow(new Date(2026, 5, 10, 15, 30));
      expect(formatTimestamp(window.start)).toBe('2026-06-10T00:00:00');
      expect(formatTimestamp(window.end)).toBe('2026-06-10T23:59:59');
      expect(window.end.getMilliseconds()).toBe(999);
    });
  });
});
