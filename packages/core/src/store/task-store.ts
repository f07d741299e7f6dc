/**
 * Authoritative in-memory task collection, kept in step with a durable backend.
 *
 * Each mutation builds the next state, persists it, and only then commits it
 * in memory. A failed save leaves the store exactly as it was before the call,
 * so memory never disagrees with storage after a reported success.
 */

import type { Task, TaskId } from '../types/task.js';
import type { StoreSnapshot, TaskStorage } from '../storage/storage.js';
import { EMPTY_SNAPSHOT } from '../storage/storage.js';
import { InvalidInputError, PersistFailedError, TaskNotFoundError } from '../errors.js';
import { createLogger } from '../logger.js';

const log = createLogger('store');

export class TaskStore {
  private readonly storage: TaskStorage;
  private state: StoreSnapshot = EMPTY_SNAPSHOT;
  private loaded = false;
  private readonly now: () => Date;

  constructor(storage: TaskStorage, opts?: { now?: () => Date }) {
    this.storage = storage;
    this.now = opts?.now ?? (() => new Date());
  }

  get location(): string {
    return this.storage.location;
  }

  /** The id the next added task will receive */
  get nextId(): TaskId {
    return this.state.nextId;
  }

  get isLoaded(): boolean {
    return this.loaded;
  }

  /** Read persisted state. Missing state starts empty; corrupt state throws StorageCorruptError. */
  async load(): Promise<void> {
    const snapshot = await this.storage.read();
    this.state = snapshot ?? EMPTY_SNAPSHOT;
    this.loaded = true;
    log.debug(`loaded ${this.state.tasks.length} task(s), next id ${this.state.nextId}`);
  }

  /** Discard all tasks and the id counter, persisting the empty store */
  async reset(): Promise<void> {
    await this.commit(EMPTY_SNAPSHOT);
    this.loaded = true;
    log.warn(`task store at ${this.location} was reset`);
  }

  async add(description: string): Promise<Task> {
    this.ensureLoaded();
    if (description.trim().length === 0) {
      throw new InvalidInputError('Task description cannot be empty');
    }

    const task: Task = {
      id: this.state.nextId,
      description,
      completed: false,
      createdAt: this.now().toISOString(),
    };
    await this.commit({ nextId: task.id + 1, tasks: [...this.state.tasks, task] });
    return task;
  }

  /** Mark a task done. Completing an already-completed task changes nothing. */
  async complete(id: TaskId): Promise<Task> {
    const existing = this.require(id);
    if (existing.completed) return existing;

    const updated: Task = { ...existing, completed: true };
    await this.commit({
      nextId: this.state.nextId,
      tasks: this.state.tasks.map(t => (t.id === id ? updated : t)),
    });
    return updated;
  }

  async delete(id: TaskId): Promise<Task> {
    const existing = this.require(id);
    await this.commit({
      nextId: this.state.nextId,
      tasks: this.state.tasks.filter(t => t.id !== id),
    });
    return existing;
  }

  find(id: TaskId): Task | undefined {
    this.ensureLoaded();
    return this.state.tasks.find(t => t.id === id);
  }

  /** Case-insensitive substring match, in store order */
  findByDescription(text: string): Task[] {
    this.ensureLoaded();
    const needle = text.toLowerCase();
    return this.state.tasks.filter(t => t.description.toLowerCase().includes(needle));
  }

  /** Snapshot copy in display order */
  list(): Task[] {
    this.ensureLoaded();
    return [...this.state.tasks];
  }

  async close(): Promise<void> {
    await this.storage.close();
  }

  private require(id: TaskId): Task {
    const task = this.find(id);
    if (!task) throw new TaskNotFoundError(id);
    return task;
  }

  private async commit(next: StoreSnapshot): Promise<void> {
    try {
      await this.storage.write(next);
    } catch (error) {
      log.error(`save to ${this.location} failed:`, error);
      throw new PersistFailedError(this.location, { cause: error });
    }
    this.state = next;
  }

  private ensureLoaded(): void {
    if (!this.loaded) {
      throw new Error('TaskStore not loaded. Call load() first.');
    }
  }
}
