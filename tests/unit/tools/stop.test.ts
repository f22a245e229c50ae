/**
 * Tests for timeledger_stop tool
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

vi.mock('../../../src/utils/logger.js', () => ({
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn(), setLevel: vi.fn() },
}));

import { stopHandler } from '../../../src/tools/stop.js';
import { startEntry, stopEntry, getEntry, getRunningEntry } from '../../../src/services/store/entries.js';
import { errorCode, expectSuccess, openTestStore, type TestStore } from '../../helpers.js';

describe('timeledger_stop tool', () => {
  let store: TestStore;

  beforeEach(async () => {
    store = await openTestStore('stop');
  });

  afterEach(async () => {
    await store.cleanup();
  });

  it('rejects a non-integer id', async () => {
    expect(errorCode(await stopHandler({ id: 'one' }))).toBe('VALIDATION_ERROR');
    expect(errorCode(await stopHandler({ id: 1.5 }))).toBe('VALIDATION_ERROR');
  });

  it('reports nothing to stop when idle', async () => {
    const data = expectSuccess(await stopHandler({}));
    expect(data).toEqual({ stopped: false, entry: null, message: 'Nothing to stop' });
  });

  it('stops the running entry', async () => {
    const id = startEntry(store.db, 'Alpha', 'Task', '', new Date(2026, 5, 10, 9, 0, 0));

    const data = expectSuccess(await stopHandler({}));
    expect(data.stopped).toBe(true);
    expect(data.entry?.id).toBe(id);
    expect(data.entry?.running).toBe(false);
    expect(getRunningEntry(store.db)).toBeNull();
  });

  it('stops a specific open entry by id', async () => {
    const id = startEntry(store.db, 'Alpha', 'Task', '', new Date(2026, 5, 10, 9, 0, 0));

    const data = expectSuccess(await stopHandler({ id }));
    expect(data.stopped).toBe(true);
    expect(getEntry(store.db, id)?.end).not.toBeNull();
  });

  it('leaves a closed entry unchanged', async () => {
    const id = startEntry(store.db, 'Alpha', 'Task', '', new Date(2026, 5, 10, 9, 0, 0));
    stopEntry(store.db, id, new Date(2026, 5, 10, 10, 0, 0));

    const data = expectSuccess(await stopHandler({ id }));
    expect(data.stopped).toBe(false);
    expect(getEntry(store.db, id)).toMatchObject({ end: '2026-06-10T10:00:00', duration: 3600 });
  });

  it('ignores a missing id', async () => {
    const data = expectSuccess(await stopHandler({ id: 42 }));
    expect(data.stopped).toBe(false);
  });
});
