import { describe, it, expect } from 'vitest';
import { join } from 'node:path';
import { homedir } from 'node:os';
import { loadConfig, createStorage, getDefaultDataDir } from '../src/config.js';
import { ConfigError } from '../src/errors.js';
import { JsonFileStorage } from '../src/storage/json-file-storage.js';
import { SqliteTaskStorage } from '../src/storage/sqlite-storage.js';

describe('getDefaultDataDir', () => {
  it('uses XDG_DATA_HOME on linux when set', () => {
    expect(getDefaultDataDir('linux', { XDG_DATA_HOME: '/data' })).toBe(join('/data', 'vtask'));
  });

  it('falls back to ~/.local/share on linux', () => {
    expect(getDefaultDataDir('linux', {})).toBe(join(homedir(), '.local', 'share', 'vtask'));
  });

  it('uses Application Support on macOS', () => {
    expect(getDefaultDataDir('darwin', {})).toBe(join(homedir(), 'Library', 'Application Support', 'vtask'));
  });

  it('uses APPDATA on windows', () => {
    expect(getDefaultDataDir('win32', { APPDATA: '/roaming' })).toBe(join('/roaming', 'vtask'));
  });
});

describe('loadConfig', () => {
  const env = { XDG_DATA_HOME: '/data', APPDATA: '/data' };
  const defaultDir = getDefaultDataDir(process.platform, env);

  it('defaults to a JSON file in the data directory', () => {
    expect(loadConfig(env)).toEqual({
      storage: 'json',
      dataFile: join(defaultDir, 'tasks.json'),
      logLevel: 'warn',
    });
  });

  it('names the default file after the backend', () => {
    expect(loadConfig({ ...env, VTASK_STORAGE: 'sqlite' }).dataFile).toBe(join(defaultDir, 'tasks.db'));
  });

  it('reads the environment', () => {
    expect(loadConfig({ VTASK_STORAGE: 'sqlite', VTASK_DATA_FILE: '/tmp/t.db', VTASK_LOG_LEVEL: 'debug' }))
      .toEqual({ storage: 'sqlite', dataFile: '/tmp/t.db', logLevel: 'debug' });
  });

  it('lets overrides win over the environment', () => {
    const config = loadConfig(
      { VTASK_DATA_FILE: '/env/tasks.json', VTASK_LOG_LEVEL: 'debug' },
      { dataFile: '/flag/tasks.json', logLevel: 'error' },
    );
    expect(config.dataFile).toBe('/flag/tasks.json');
    expect(config.logLevel).toBe('error');
  });

  it('ignores empty values', () => {
    expect(loadConfig({ ...env, VTASK_STORAGE: '', VTASK_LOG_LEVEL: '' })).toMatchObject({
      storage: 'json',
      logLevel: 'warn',
    });
  });

  it('rejects an unknown backend', () => {
    expect(() => loadConfig({ VTASK_STORAGE: 'mongo' })).toThrow(ConfigError);
    expect(() => loadConfig({ VTASK_STORAGE: 'mongo' })).toThrow(/^Invalid configuration for storage: /);
  });

  it('rejects an unknown log level', () => {
    let caught: unknown;
    try {
      loadConfig({}, { logLevel: 'loud' });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught).toMatchObject({ code: 'CONFIG_INVALID', field: 'logLevel' });
  });

  it('rejects a blank data file path', () => {
    expect(() => loadConfig({}, { dataFile: '   ' })).toThrow(ConfigError);
  });
});

describe('createStorage', () => {
  it('builds the JSON backend', () => {
    const storage = createStorage({ storage: 'json', dataFile: '/tmp/vtask-unused.json' });
    expect(storage).toBeInstanceOf(JsonFileStorage);
    expect(storage.location).toBe('/tmp/vtask-unused.json');
  });

  it('builds the SQLite backend', async () => {
    const storage = createStorage({ storage: 'sqlite', dataFile: ':memory:' });
    expect(storage).toBeInstanceOf(SqliteTaskStorage);
    await storage.close();
  });
});
