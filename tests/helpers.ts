/**
 * Shared setup for tests that go through the store manager
 */

import { join } from 'path';
import { mkdir, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { randomUUID } from 'crypto';
import Database from 'better-sqlite3';

import { resetConfig } from '../src/config/index.js';
import { getStoreManager, resetStoreManager } from '../src/services/store/manager.js';
import { resetSessionController } from '../src/services/session/index.js';
import type { ToolResult } from '../src/types/index.js';

export interface TestStore {
  dir: string;
  db: Database.Database;
  cleanup: () => Promise<void>;
}

/**
 * Point the configuration at a fresh database file and open it
 */
export async function openTestStore(name: string): Promise<TestStore> {
  const dir = join(tmpdir(), `timeledger-${name}-${randomUUID()}`);
  await mkdir(dir, { recursive: true });

  const previous = {
    db: process.env.TIMELEDGER_DB_PATH,
    exportDir: process.env.TIMELEDGER_EXPORT_DIR,
  };
  process.env.TIMELEDGER_DB_PATH = join(dir, 'ledger.sqlite');
  process.env.TIMELEDGER_EXPORT_DIR = join(dir, 'exports');
  resetConfig();
  resetStoreManager();
  resetSessionController();

  const db = await getStoreManager().getStore();

  return {
    dir,
    db,
    cleanup: async () => {
      resetStoreManager();
      resetSessionController();
      restoreEnv('TIMELEDGER_DB_PATH', previous.db);
      restoreEnv('TIMELEDGER_EXPORT_DIR', previous.exportDir);
      resetConfig();
      await rm(dir, { recursive: true, force: true });
    },
  };
}

function restoreEnv(key: string, value: string | undefined): void {
  if (value === undefined) {
    delete process.env[key];
  } else {
    process.env[key] = value;
  }
}

/**
 * Unwrap a successful tool result, failing the test otherwise
 */
export function expectSuccess<T>(result: ToolResult<T>): T {
  if (!result.success) {
    throw new Error(`Expected success, got ${result.code ?? 'error'}: ${result.error}`);
  }
  return result.data;
}

/**
 * Error code of a failed tool result, or null when it succeeded
 */
export function errorCode(result: ToolResult): string | null {
  return result.success ? null : result.code ?? 'UNKNOWN';
}
