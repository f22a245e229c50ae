/**
 * Config file loading and validation
 * Reads TIMELEDGER_CONFIG_PATH or ~/.config/timeledger/config.yaml when present
 */

import { z } from 'zod';
import { readFileSync, existsSync } from 'fs';
import { join, resolve } from 'path';
import { homedir } from 'os';
import { parse as parseYaml } from 'yaml';
import { logger } from '../utils/logger.js';
import type { FileConfig } from '../types/index.js';

export const APP_DIR_NAME = 'TimeLedger';
export const DB_FILENAME = 'timeledger.sqlite';

const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

const storageSchema = z.object({
  db_path: z.string().min(1).optional(),
});

const exportSchema = z.object({
  directory: z.string().min(1).optional(),
});

const settingsSchema = z.object({
  log_level: logLevelSchema.default('info'),
});

const fileConfigSchema = z.object({
  version: z.number().default(1),
  storage: storageSchema.default({}),
  export: exportSchema.default({}),
  settings: settingsSchema.default({}),
});

export const schemas = {
  logLevelSchema,
  fileConfigSchema,
};

export function getConfigPath(): string {
  return process.env.TIMELEDGER_CONFIG_PATH || join(homedir(), '.config', 'timeledger', 'config.yaml');
}

/**
 * Per-user data directory: %APPDATA% on Windows, XDG data home elsewhere
 */
export function getDefaultDataDir(): string {
  if (process.platform === 'win32') {
    const base = process.env.APPDATA || join(homedir(), 'AppData', 'Roaming');
    return join(base, APP_DIR_NAME);
  }
  const base = process.env.XDG_DATA_HOME || join(homedir(), '.local', 'share');
  return join(base, APP_DIR_NAME);
}

export function getDefaultDbPath(): string {
  return join(getDefaultDataDir(), DB_FILENAME);
}

/**
 * Resolve a configured path, expanding a leading ~
 */
export function expandPath(path: string): string {
  if (path === ':memory:') return path;
  if (path === '~' || path.startsWith('~/')) {
    return join(homedir(), path.slice(1));
  }
  return resolve(path);
}

/**
 * Load the config file. Returns null when there is none.
 */
export function loadGlobalConfig(): FileConfig | null {
  const configPath = getConfigPath();
  if (!existsSync(configPath)) {
    logger.debug(`No config file at ${configPath}`);
    return null;
  }

  const content = readFileSync(configPath, 'utf-8');
  const rawConfig: unknown = parseYaml(content) ?? {};
  const result = fileConfigSchema.safeParse(rawConfig);

  if (!result.success) {
    const errors = result.error.issues
      .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`Invalid config file ${configPath}:\n${errors}`);
  }

  logger.debug(`Loaded config from ${configPath}`);

  const parsed = result.data;
  return {
    version: parsed.version,
    storage: {
      db_path: parsed.storage.db_path ? expandPath(parsed.storage.db_path) : undefined,
    },
    export: {
      directory: parsed.export.directory ? expandPath(parsed.export.directory) : undefined,
    },
    settings: parsed.settings,
  };
}
