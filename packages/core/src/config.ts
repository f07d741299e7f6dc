/**
 * Runtime configuration: where tasks are stored, which backend, how loud to log.
 * Precedence: explicit overrides > environment > defaults.
 */

import { join } from 'node:path';
import { homedir } from 'node:os';
import { z } from 'zod';
import type { LogLevel } from './logger.js';
import type { TaskStorage } from './storage/storage.js';
import { JsonFileStorage } from './storage/json-file-storage.js';
import { SqliteTaskStorage } from './storage/sqlite-storage.js';
import { ConfigError } from './errors.js';

export type StorageKind = 'json' | 'sqlite';

export interface VtaskConfig {
  storage: StorageKind;
  dataFile: string;
  logLevel: LogLevel;
}

export type ConfigOverrides = Partial<Record<keyof VtaskConfig, string | undefined>>;

type Env = Record<string, string | undefined>;

const storageSchema = z.enum(['json', 'sqlite']);
const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);
const dataFileSchema = z.string().trim().min(1);

const DATA_FILE_NAMES: Record<StorageKind, string> = {
  json: 'tasks.json',
  sqlite: 'tasks.db',
};

/** Returns the platform-appropriate data directory */
export function getDefaultDataDir(platform: NodeJS.Platform = process.platform, env: Env = process.env): string {
  if (platform === 'darwin') {
    return join(homedir(), 'Library', 'Application Support', 'vtask');
  }
  if (platform === 'win32') {
    return join(env['APPDATA'] ?? join(homedir(), 'AppData', 'Roaming'), 'vtask');
  }
  // Linux / other
  return join(env['XDG_DATA_HOME'] ?? join(homedir(), '.local', 'share'), 'vtask');
}

function pick<T>(field: keyof VtaskConfig, schema: z.ZodType<T>, value: string | undefined, fallback: T): T {
  if (value === undefined || value === '') return fallback;
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new ConfigError(field, parsed.error.issues.map(i => i.message).join('; '));
  }
  return parsed.data;
}

export function loadConfig(env: Env = process.env, overrides: ConfigOverrides = {}): VtaskConfig {
  const storage = pick('storage', storageSchema, overrides.storage ?? env['VTASK_STORAGE'], 'json');
  const logLevel = pick('logLevel', logLevelSchema, overrides.logLevel ?? env['VTASK_LOG_LEVEL'], 'warn');
  const dataFile = pick(
    'dataFile',
    dataFileSchema,
    overrides.dataFile ?? env['VTASK_DATA_FILE'],
    join(getDefaultDataDir(process.platform, env), DATA_FILE_NAMES[storage]),
  );
  return { storage, dataFile, logLevel };
}

export function createStorage(config: Pick<VtaskConfig, 'storage' | 'dataFile'>): TaskStorage {
  switch (config.storage) {
    case 'json': return new JsonFileStorage(config.dataFile);
    case 'sqlite': return new SqliteTaskStorage(config.dataFile);
  }
}
