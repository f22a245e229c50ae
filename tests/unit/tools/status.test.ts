/**
 * Tests for timeledger_status tool
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

vi.mock('../../../src/utils/logger.js', () => ({
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn(), setLevel: vi.fn() },
}));

import { statusHandler } from '../../../src/tools/status.js';
import { startEntry, stopEntry } from '../../../src/services/store/entries.js';
import { expectSuccess, openTestStore, type TestStore } from '../../helpers.js';

describe('timeledger_status tool', () => {
  let store: TestStore;

  beforeEach(async () => {
    store = await openTestStore('status');
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date(2026, 5, 10, 12, 0, 0));
  });

  afterEach(async () => {
    vi.useRealTimers();
    await store.cleanup();
  });

  it('reports an idle timer', async () => {
    const data = expectSuccess(await statusHandler({}));
    expect(data).toEqual({
      running: null,
      elapsed_seconds: 0,
      elapsed_formatted: '00:00:00',
      today_seconds: 0,
      today_formatted: '00:00:00',
    });
  });

  it('reports the running timer and today total', async () => {
    const done = startEntry(store.db, 'Alpha', 'Morning', '', new Date(2026, 5, 10, 8, 0, 0));
    stopEntry(store.db, done, new Date(2026, 5, 10, 9, 0, 0));
    startEntry(store.db, 'Beta', 'Now', '', new Date(2026, 5, 10, 11, 30, 0));

    const data = expectSuccess(await statusHandler({}));
    expect(data.running).toMatchObject({ project: 'Beta', task: 'Now', running: true, duration_seconds: 1800 });
    expect(data.elapsed_seconds).toBe(1800);
    expect(data.elapsed_formatted).toBe('00:30:00');
    expect(data.today_seconds).toBe(5400);
    expect(data.today_formatted).toBe('01:30:00');
  });

  it('advances while the timer runs', async () => {
    startEntry(store.db, 'Alpha', 'Task', '', new Date(2026, 5, 10, 11, 59, 0));
    expect(expectSuccess(await statusHandler({})).elapsed_seconds).toBe(60);

    vi.setSystemTime(new Date(2026, 5, 10, 12, 1, 0));
    expect(expectSuccess(await statusHandler({})).elapsed_seconds).toBe(120);
  });
});
