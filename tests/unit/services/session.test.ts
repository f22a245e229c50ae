/**
 * Tests for the session controller
 */

import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach } from 'vitest';
import { join } from 'path';
import { mkdir, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { randomUUID } from 'crypto';
import Database from 'better-sqlite3';

import { createDatabase } from '../../../src/services/store/sqlite.js';
import { deleteEntry, getEntry, startEntry, stopEntry } from '../../../src/services/store/entries.js';
import { SessionController } from '../../../src/services/session/controller.js';

const testDir = join(tmpdir(), `timeledger-session-test-${randomUUID()}`);

describe('SessionController', () => {
  let db: Database.Database;
  let now: Date;
  let controller: SessionController;

  const clock = (): Date => now;

  beforeAll(async () => {
    await mkdir(testDir, { recursive: true });
  });

  afterAll(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  beforeEach(() => {
    db = createDatabase(join(testDir, `${randomUUID()}.sqlite`));
    now = new Date(2026, 5, 10, 9, 0, 0);
    controller = new SessionController(db, clock);
  });

  afterEach(() => {
    db.close();
  });

  it('starts idle on an empty store', () => {
    expect(controller.currentId).toBeNull();
    expect(controller.status()).toEqual({ running: null, elapsedSeconds: 0, todaySeconds: 0 });
  });

  it('picks up an entry left running by an earlier session', () => {
    const id = startEntry(db, 'Alpha', 'carried over', '', new Date(2026, 5, 10, 8, 0, 0));
    const fresh = new SessionController(db, clock);
    expect(fresh.currentId).toBe(id);
  });

  it('starts and stops an entry', () => {
    const started = controller.start('Alpha', 'Task', 'notes');
    expect(started).toMatchObject({ project: 'Alpha', task: 'Task', start: '2026-06-10T09:00:00', end: null });
    expect(controller.currentId).toBe(started.id);

    now = new Date(2026, 5, 10, 9, 20, 0);
    const stopped = controller.stop();
    expect(stopped).toMatchObject({ id: started.id, end: '2026-06-10T09:20:00', duration: 1200 });
    expect(controller.currentId).toBeNull();
  });

  it('closes the running entry when another starts', () => {
    const first = controller.start('Alpha', 'First');
    now = new Date(2026, 5, 10, 9, 30, 0);
    const second = controller.start('Beta', 'Second');

    expect(getEntry(db, first.id)).toMatchObject({ end: '2026-06-10T09:30:00', duration: 1800 });
    expect(controller.currentId).toBe(second.id);
  });

  it('returns null when stopping with nothing running', () => {
    expect(controller.stop()).toBeNull();
  });

  it('leaves another writer\'s timer running when the cached id is stale', () => {
    const mine = controller.start('Alpha', 'Mine');

    // another writer stops this entry and starts its own
    now = new Date(2026, 5, 10, 9, 10, 0);
    stopEntry(db, mine.id, now);
    const theirs = startEntry(db, 'Beta', 'Theirs', '', now);

    now = new Date(2026, 5, 10, 9, 15, 0);
    expect(controller.stop()).toBeNull();
    expect(getEntry(db, theirs)).toMatchObject({ end: null, duration: null });
    expect(getEntry(db, mine.id)?.end).toBe('2026-06-10T09:10:00');
    expect(controller.currentId).toBe(theirs);
  });

  it('clears the cache after the running entry is deleted', () => {
    const entry = controller.start('Alpha', 'Task');
    deleteEntry(db, entry.id);
    controller.afterMutation();
    expect(controller.currentId).toBeNull();
  });

  it('reports elapsed and today totals', () => {
    const done = startEntry(db, 'Alpha', 'Earlier', '', new Date(2026, 5, 10, 7, 0, 0));
    stopEntry(db, done, new Date(2026, 5, 10, 8, 0, 0));
    controller.start('Beta', 'Now');

    now = new Date(2026, 5, 10, 9, 5, 0);
    const status = controller.status();
    expect(status.running?.task).toBe('Now');
    expect(status.elapsedSeconds).toBe(300);
    expect(status.todaySeconds).toBe(3900);
  });
});
