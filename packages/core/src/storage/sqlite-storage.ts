/**
 * SQLite backend (better-sqlite3 + Drizzle). Holds the same record as the
 * JSON file: a tasks table ordered by position, and next_id in store_meta.
 *
 * The connection opens on first use, so a file that is not a task database
 * surfaces from read() as StorageCorruptError. After that, the next write
 * replaces the file with a fresh database.
 */

import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import { asc, eq } from 'drizzle-orm';
import { mkdirSync, rmSync } from 'node:fs';
import { dirname } from 'node:path';
import * as schema from '../schema/index.js';
import { tasks, storeMeta } from '../schema/index.js';
import type { StoreSnapshot, TaskStorage } from './storage.js';
import { parseSnapshot } from './storage.js';
import { StorageCorruptError } from '../errors.js';
import { createLogger } from '../logger.js';

const log = createLogger('storage');

const NEXT_ID_KEY = 'next_id';
const MEMORY_PATH = ':memory:';

// 5 bound variables per row, well under SQLite's 32766 limit
const INSERT_BATCH_SIZE = 500;

const CORRUPT_DB_CODES = new Set(['SQLITE_NOTADB', 'SQLITE_CORRUPT', 'SQLITE_ERROR']);

export type VtaskDb = BetterSQLite3Database<typeof schema>;

type SqliteError = InstanceType<typeof Database.SqliteError>;

interface Connection {
  sqlite: Database.Database;
  db: VtaskDb;
}

/** The raw SQL to create the schema from scratch (idempotent) */
export const CREATE_SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS tasks (
    id INTEGER PRIMARY KEY,
    description TEXT NOT NULL,
    completed INTEGER NOT NULL DEFAULT 0,
    created_at TEXT NOT NULL,
    position INTEGER NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_tasks_position ON tasks(position);

CREATE TABLE IF NOT EXISTS store_meta (
    key TEXT PRIMARY KEY,
    value TEXT NOT NULL
);
`;

function isCorruptDatabaseError(error: unknown): error is SqliteError {
  return error instanceof Database.SqliteError && CORRUPT_DB_CODES.has(error.code);
}

export class SqliteTaskStorage implements TaskStorage {
  readonly location: string;
  private connection: Connection | null = null;
  /** Set when read() found an unusable file; the next write starts over */
  private replaceOnWrite = false;

  /** Pass ':memory:' for an in-memory database (tests) */
  constructor(dbPath: string) {
    this.location = dbPath;
  }

  async read(): Promise<StoreSnapshot | null> {
    const { meta, rows } = this.guard(() => {
      const { db } = this.connect();
      return {
        meta: db.select({ value: storeMeta.value }).from(storeMeta)
          .where(eq(storeMeta.key, NEXT_ID_KEY)).get(),
        rows: db.select().from(tasks).orderBy(asc(tasks.position)).all(),
      };
    });

    if (!meta && rows.length === 0) {
      log.debug(`no saved tasks in ${this.location}, starting empty`);
      return null;
    }

    const record = {
      nextId: meta ? Number(meta.value) : undefined,
      tasks: rows.map(row => ({
        id: row.id,
        description: row.description,
        completed: row.completed,
        createdAt: row.createdAt,
      })),
    };
    const snapshot = parseSnapshot(record, this.location);
    log.debug(`loaded ${snapshot.tasks.length} task(s) from ${this.location}`);
    return snapshot;
  }

  async write(snapshot: StoreSnapshot): Promise<void> {
    if (this.replaceOnWrite) this.replaceDatabase();

    const { db } = this.connect();
    db.transaction((tx) => {
      tx.delete(tasks).run();
      const rows = snapshot.tasks.map((task, position) => ({
        id: task.id,
        description: task.description,
        completed: task.completed,
        createdAt: task.createdAt,
        position,
      }));
      for (let i = 0; i < rows.length; i += INSERT_BATCH_SIZE) {
        tx.insert(tasks).values(rows.slice(i, i + INSERT_BATCH_SIZE)).run();
      }
      const value = String(snapshot.nextId);
      tx.insert(storeMeta).values({ key: NEXT_ID_KEY, value })
        .onConflictDoUpdate({ target: storeMeta.key, set: { value } }).run();
    });
    log.debug(`saved ${snapshot.tasks.length} task(s) to ${this.location}`);
  }

  async close(): Promise<void> {
    this.disconnect();
  }

  /** Underlying connection, for maintenance and tests */
  getRawDb(): Database.Database {
    return this.connect().sqlite;
  }

  private connect(): Connection {
    if (this.connection) return this.connection;

    if (this.location !== MEMORY_PATH) {
      mkdirSync(dirname(this.location), { recursive: true });
    }

    const sqlite = new Database(this.location);
    try {
      sqlite.pragma('journal_mode = WAL');
      sqlite.pragma('busy_timeout = 5000');
      sqlite.exec(CREATE_SCHEMA_SQL);
    } catch (error) {
      sqlite.close();
      throw error;
    }

    this.connection = { sqlite, db: drizzle(sqlite, { schema }) };
    return this.connection;
  }

  private disconnect(): void {
    if (this.connection?.sqlite.open) this.connection.sqlite.close();
    this.connection = null;
  }

  /** Run a read, turning SQLite's "not a usable database" errors into StorageCorruptError */
  private guard<T>(fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      if (!isCorruptDatabaseError(error)) throw error;
      this.disconnect();
      this.replaceOnWrite = true;
      throw new StorageCorruptError(this.location, error.message, { cause: error });
    }
  }

  private replaceDatabase(): void {
    this.disconnect();
    if (this.location !== MEMORY_PATH) {
      for (const suffix of ['', '-wal', '-shm']) {
        rmSync(`${this.location}${suffix}`, { force: true });
      }
    }
    this.replaceOnWrite = false;
    log.warn(`replaced unreadable database at ${this.location}`);
  }
}
