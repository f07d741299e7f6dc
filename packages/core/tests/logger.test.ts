import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  createLogger, setLogLevel, getLogLevel, getLogHistory, clearLogs, onLog,
} from '../src/logger.js';

describe('logger', () => {
  beforeEach(() => {
    clearLogs();
    setLogLevel('warn');
  });

  afterEach(() => {
    vi.restoreAllMocks();
    setLogLevel('warn');
  });

  it('prints entries at or above the threshold with the scope prefix', () => {
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => {});
    const log = createLogger('store');
    log.info('loaded');
    log.warn('disk nearly full');
    expect(stderr).toHaveBeenCalledTimes(1);
    expect(stderr).toHaveBeenCalledWith('[STORE]:', 'disk nearly full');
  });

  it('keeps every entry in the history whatever the threshold', () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const log = createLogger('session');
    log.debug('queued', 2);
    log.error(new Error('boom'));
    expect(getLogHistory().map(e => [e.level, e.scope, e.message])).toEqual([
      ['debug', 'session', 'queued 2'],
      ['error', 'session', 'boom'],
    ]);
  });

  it('prints nothing when silent', () => {
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => {});
    setLogLevel('silent');
    createLogger('x').error('hidden');
    expect(getLogLevel()).toBe('silent');
    expect(stderr).not.toHaveBeenCalled();
  });

  it('caps the history', () => {
    const log = createLogger('x');
    for (let i = 0; i < 205; i++) log.debug(`entry ${i}`);
    const history = getLogHistory();
    expect(history).toHaveLength(200);
    expect(history[0]?.message).toBe('entry 5');
  });

  it('notifies listeners until they unsubscribe', () => {
    const seen: string[] = [];
    const off = onLog(entry => seen.push(entry.message));
    const log = createLogger('x');
    log.info({ id: 1 });
    off();
    log.info('after');
    expect(seen).toEqual(['{"id":1}']);
  });
});
