/**
 * JSON file backend. The whole record is rewritten on every save through a
 * temporary file and a rename, so a reader never sees a half-written file.
 */

import { mkdir, readFile, rename, unlink, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { StoreSnapshot, TaskStorage } from './storage.js';
import { isLegacyRecord, parseSnapshot } from './storage.js';
import { StorageCorruptError } from '../errors.js';
import { createLogger } from '../logger.js';

const log = createLogger('storage');

export class JsonFileStorage implements TaskStorage {
  readonly location: string;

  constructor(filePath: string) {
    this.location = filePath;
  }

  async read(): Promise<StoreSnapshot | null> {
    let content: string;
    try {
      content = await readFile(this.location, 'utf-8');
    } catch (error) {
      if (isNotFoundError(error)) {
        log.debug(`no task file at ${this.location}, starting empty`);
        return null;
      }
      throw error;
    }

    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch (error) {
      throw new StorageCorruptError(this.location, 'not valid JSON', { cause: error });
    }

    const snapshot = parseSnapshot(data, this.location);
    if (isLegacyRecord(data)) {
      log.info(`imported ${snapshot.tasks.length} task(s) from legacy list at ${this.location}`);
    }
    log.debug(`loaded ${snapshot.tasks.length} task(s) from ${this.location}`);
    return snapshot;
  }

  async write(snapshot: StoreSnapshot): Promise<void> {
    const tmpPath = `${this.location}.${process.pid}.tmp`;
    const content = JSON.stringify({ nextId: snapshot.nextId, tasks: snapshot.tasks }, null, 2);

    await mkdir(dirname(this.location), { recursive: true });
    try {
      await writeFile(tmpPath, content, 'utf-8');
      await rename(tmpPath, this.location);
    } catch (error) {
      await unlink(tmpPath).catch((cleanupError: unknown) => {
        if (!isNotFoundError(cleanupError)) log.warn(`could not remove ${tmpPath}:`, cleanupError);
      });
      throw error;
    }
    log.debug(`saved ${snapshot.tasks.length} task(s) to ${this.location}`);
  }

  async close(): Promise<void> {
    // Nothing held open between calls
  }
}

function isNotFoundError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
