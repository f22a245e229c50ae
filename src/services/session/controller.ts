/**
 * Session controller
 *
 * The only path through which a running entry is closed implicitly: start()
 * always goes through startEntry, so the last start wins. The cached running
 * id is re-read from the store after every mutation, since another process
 * may have changed the same database.
 */

import Database from 'better-sqlite3';
import type { SessionStatus, TimeEntry } from '../../types/index.js';
import { getEntry, getRunningEntry, startEntry, stopEntry } from '../store/entries.js';
import { elapsedSeconds, sumToday } from '../query/aggregator.js';

export type Clock = () => Date;

export class SessionController {
  private runningId: number | null = null;

  constructor(
    private readonly db: Database.Database,
    private readonly clock: Clock = () => new Date()
  ) {
    this.refresh();
  }

  get currentId(): number | null {
    return this.runningId;
  }

  /**
   * Re-read the running entry from the store
   */
  refresh(): TimeEntry | null {
    const running = getRunningEntry(this.db);
    this.runningId = running?.id ?? null;
    return running;
  }

  /**
   * Start timing a task. Any running entry is closed first.
   */
  start(project: string, task: string, notes = ''): TimeEntry {
    const id = startEntry(this.db, project, task, notes, this.clock());
    const running = this.refresh();
    if (running) return running;

    // A concurrent writer replaced or stopped the entry between the two calls
    const created = getEntry(this.db, id);
    if (!created) {
      throw new Error(`Entry ${id} disappeared after start`);
    }
    return created;
  }

  /**
   * Stop the running entry. Returns the closed entry, or null when nothing
   * was running or the cached entry had already been closed elsewhere.
   */
  stop(): TimeEntry | null {
    const now = this.clock();
    const cached = this.runningId ?? this.refresh()?.id ?? null;
    if (cached === null) return null;

    const stopped = stopEntry(this.db, cached, now);
    this.refresh();
    // A stale id means another writer closed it; their running entry is left alone
    return stopped ? getEntry(this.db, cached) : null;
  }

  /**
   * Refresh after an edit or delete made directly against the store
   */
  afterMutation(): void {
    this.refresh();
  }

  status(): SessionStatus {
    const now = this.clock();
    const running = this.refresh();
    return {
      running,
      elapsedSeconds: running ? elapsedSeconds(running, now) : 0,
      todaySeconds: sumToday(this.db, now),
    };
  }
}
