/**
 * Session controller bound to the shared store connection
 */

import Database from 'better-sqlite3';
import { getStoreManager } from '../store/manager.js';
import { SessionController } from './controller.js';

export { SessionController, type Clock } from './controller.js';

let instance: { db: Database.Database; controller: SessionController } | null = null;

/**
 * Controller for the current connection; rebuilt when the store is reopened
 */
export async function getSessionController(): Promise<SessionController> {
  const db = await getStoreManager().getStore();
  if (!instance || instance.db !== db) {
    instance = { db, controller: new SessionController(db) };
  }
  return instance.controller;
}

/**
 * Drop the cached controller (for testing)
 */
export function resetSessionController(): void {
  instance = null;
}
