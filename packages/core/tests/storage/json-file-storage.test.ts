import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, readFileSync, writeFileSync, readdirSync, mkdirSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { JsonFileStorage } from '../../src/storage/json-file-storage.js';
import { TaskStore } from '../../src/store/task-store.js';
import { StorageCorruptError } from '../../src/errors.js';

let tmpDir: string;
let filePath: string;
let storage: JsonFileStorage;

beforeEach(() => {
  tmpDir = mkdtempSync(join(tmpdir(), 'vtask-json-test-'));
  filePath = join(tmpDir, 'tasks.json');
  storage = new JsonFileStorage(filePath);
});

afterEach(() => {
  rmSync(tmpDir, { recursive: true, force: true });
});

const SAMPLE = {
  nextId: 4,
  tasks: [
    { id: 1, description: 'buy milk', completed: false, createdAt: '2026-02-01T08:00:00.000Z' },
    { id: 3, description: 'call mom', completed: true, createdAt: '2026-02-02T18:15:00.000Z' },
  ],
};

describe('JsonFileStorage', () => {
  it('returns null when the file does not exist', async () => {
    expect(await storage.read()).toBeNull();
  });

  it('writes the documented record', async () => {
    await storage.write(SAMPLE);
    expect(JSON.parse(readFileSync(filePath, 'utf-8'))).toEqual(SAMPLE);
  });

  it('reads back what it wrote', async () => {
    await storage.write(SAMPLE);
    expect(await storage.read()).toEqual(SAMPLE);
  });

  it('creates missing parent directories', async () => {
    const nested = new JsonFileStorage(join(tmpDir, 'a', 'b', 'tasks.json'));
    await nested.write({ nextId: 1, tasks: [] });
    expect(await nested.read()).toEqual({ nextId: 1, tasks: [] });
  });

  it('leaves no temporary files behind', async () => {
    await storage.write(SAMPLE);
    expect(readdirSync(tmpDir)).toEqual(['tasks.json']);
  });

  it('keeps the previous file when a write fails', async () => {
    await storage.write(SAMPLE);
    // A directory where the temp file should go makes the write fail
    mkdirSync(`${filePath}.${process.pid}.tmp`);
    await expect(storage.write({ nextId: 1, tasks: [] })).rejects.toThrow();
    expect(await storage.read()).toEqual(SAMPLE);
  });

  describe('corrupt data', () => {
    const corruptCases: Array<[string, string]> = [
      ['invalid JSON', '{"nextId": 1, "tasks": ['],
      ['missing nextId', JSON.stringify({ tasks: [] })],
      ['nextId below 1', JSON.stringify({ nextId: 0, tasks: [] })],
      ['non-integer id', JSON.stringify({ nextId: 3, tasks: [{ id: 1.5, description: 'x', completed: false, createdAt: '2026-01-01T00:00:00.000Z' }] })],
      ['blank description', JSON.stringify({ nextId: 2, tasks: [{ id: 1, description: '  ', completed: false, createdAt: '2026-01-01T00:00:00.000Z' }] })],
      ['bad timestamp', JSON.stringify({ nextId: 2, tasks: [{ id: 1, description: 'x', completed: false, createdAt: 'yesterday' }] })],
      ['duplicate ids', JSON.stringify({ nextId: 3, tasks: [
        { id: 1, description: 'x', completed: false, createdAt: '2026-01-01T00:00:00.000Z' },
        { id: 1, description: 'y', completed: false, createdAt: '2026-01-01T00:00:00.000Z' },
      ] })],
      ['nextId not above the ids', JSON.stringify({ nextId: 2, tasks: [{ id: 2, description: 'x', completed: false, createdAt: '2026-01-01T00:00:00.000Z' }] })],
      ['a string', JSON.stringify('tasks')],
    ];

    it.each(corruptCases)('rejects %s', async (_label, content) => {
      writeFileSync(filePath, content);
      await expect(storage.read()).rejects.toBeInstanceOf(StorageCorruptError);
    });

    it('names the file and the problem', async () => {
      writeFileSync(filePath, JSON.stringify({ nextId: 0, tasks: [] }));
      await expect(storage.read()).rejects.toMatchObject({
        code: 'STORAGE_CORRUPT',
        location: filePath,
        message: `Task data at ${filePath} is corrupt: nextId: Number must be greater than or equal to 1`,
      });
    });
  });

  describe('legacy task lists', () => {
    it('imports a bare array and continues numbering after the highest id', async () => {
      writeFileSync(filePath, JSON.stringify([
        { id: 2, description: 'buy milk', completed: false },
        { id: 5, description: 'pay rent', completed: true },
      ]));
      const snapshot = await storage.read();
      expect(snapshot?.nextId).toBe(6);
      expect(snapshot?.tasks.map(t => [t.id, t.description, t.completed])).toEqual([
        [2, 'buy milk', false],
        [5, 'pay rent', true],
      ]);
    });

    it('imports an empty array as an empty store', async () => {
      writeFileSync(filePath, '[]');
      expect(await storage.read()).toEqual({ nextId: 1, tasks: [] });
    });

    it('rewrites the file in the current format on the next change', async () => {
      writeFileSync(filePath, JSON.stringify([{ id: 1, description: 'buy milk', completed: false }]));
      const store = new TaskStore(storage);
      await store.load();
      await store.add('call mom');
      const saved = JSON.parse(readFileSync(filePath, 'utf-8')) as { nextId: number; tasks: unknown[] };
      expect(saved.nextId).toBe(3);
      expect(saved.tasks).toHaveLength(2);
    });
  });

  it('round-trips a store through save and load', async () => {
    const first = new TaskStore(storage);
    await first.load();
    await first.add('one');
    await first.add('two');
    await first.add('three');
    await first.complete(2);
    await first.delete(3);

    const second = new TaskStore(new JsonFileStorage(filePath));
    await second.load();
    expect(second.list()).toEqual(first.list());
    expect(second.nextId).toBe(first.nextId);
    expect(second.nextId).toBe(4);
  });
});
