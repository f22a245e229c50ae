/**
 * Store connection manager
 * Owns the single SQLite connection shared by the tools
 */

import Database from 'better-sqlite3';
import { mkdir } from 'fs/promises';
import { dirname } from 'path';
import { getConfig } from '../../config/index.js';
import { createDatabase } from './sqlite.js';
import { logger } from '../../utils/logger.js';

class StoreManagerImpl {
  private db: Database.Database | null = null;
  private dbPath: string | null = null;

  /**
   * Get the connection, opening it on first use
   */
  async getStore(): Promise<Database.Database> {
    if (this.db?.open) {
      return this.db;
    }

    const dbPath = getConfig().dbPath;
    if (dbPath !== ':memory:') {
      await mkdir(dirname(dbPath), { recursive: true });
    }

    this.db = createDatabase(dbPath);
    this.dbPath = dbPath;
    return this.db;
  }

  close(): void {
    if (this.db?.open) {
      this.db.close();
      logger.debug(`Closed database: ${this.dbPath ?? ''}`);
    }
    this.db = null;
    this.dbPath = null;
  }
}

export type StoreManager = StoreManagerImpl;

let managerInstance: StoreManagerImpl | null = null;

export function getStoreManager(): StoreManager {
  if (!managerInstance) {
    managerInstance = new StoreManagerImpl();
  }
  return managerInstance;
}

/**
 * Close and drop the manager (for testing and shutdown)
 */
export function resetStoreManager(): void {
  if (managerInstance) {
    managerInstance.close();
    managerInstance = null;
  }
}
