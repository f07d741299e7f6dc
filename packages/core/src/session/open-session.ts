import type { VtaskConfig } from '../config.js';
import { createStorage } from '../config.js';
import type { TaskStorage } from '../storage/storage.js';
import { TaskStore } from '../store/task-store.js';
import { SessionCoordinator } from './session-coordinator.js';
import { isVtaskError } from '../errors.js';
import { createLogger } from '../logger.js';

const log = createLogger('session');

export interface OpenSessionOptions {
  /** Start empty instead of failing when the saved data is corrupt */
  resetOnCorrupt?: boolean;
  /** Backend to use instead of the one the config names */
  storage?: TaskStorage;
}

/** Load the task store and hand it to a new coordinator */
export async function openSession(
  config: Pick<VtaskConfig, 'storage' | 'dataFile'>,
  opts: OpenSessionOptions = {},
): Promise<SessionCoordinator> {
  const store = new TaskStore(opts.storage ?? createStorage(config));
  try {
    await store.load();
  } catch (err: unknown) {
    if (!opts.resetOnCorrupt || !isVtaskError(err, 'STORAGE_CORRUPT')) {
      await store.close();
      throw err;
    }
    log.warn(err.message);
    await store.reset();
  }
  return new SessionCoordinator(store);
}
