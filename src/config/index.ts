/**
 * Configuration loading and validation
 * Environment variables override the config file, which overrides defaults
 */

import { z } from 'zod';
import type { TimeLedgerConfig } from '../types/index.js';
import { expandPath, getDefaultDbPath, loadGlobalConfig, schemas } from './global-config.js';

const envSchema = z.object({
  TIMELEDGER_DB_PATH: z.string().min(1).optional(),
  TIMELEDGER_EXPORT_DIR: z.string().min(1).optional(),
  TIMELEDGER_LOG_LEVEL: schemas.logLevelSchema.optional(),
});

export function loadConfig(): TimeLedgerConfig {
  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    const errors = result.error.issues
      .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`Configuration error:\n${errors}`);
  }

  const env = result.data;
  const file = loadGlobalConfig();

  return {
    dbPath: env.TIMELEDGER_DB_PATH
      ? expandPath(env.TIMELEDGER_DB_PATH)
      : file?.storage.db_path ?? getDefaultDbPath(),
    exportDir: env.TIMELEDGER_EXPORT_DIR
      ? expandPath(env.TIMELEDGER_EXPORT_DIR)
      : file?.export.directory ?? process.cwd(),
    logLevel: env.TIMELEDGER_LOG_LEVEL ?? file?.settings.log_level ?? 'info',
  };
}

// Singleton config instance
let configInstance: TimeLedgerConfig | null = null;

/**
 * Get the current config (cached)
 */
export function getConfig(): TimeLedgerConfig {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

/**
 * Reset config (for testing)
 */
export function resetConfig(): void {
  configInstance = null;
}

export {
  loadGlobalConfig,
  getConfigPath,
  getDefaultDataDir,
  getDefaultDbPath,
  expandPath,
} from './global-config.js';
