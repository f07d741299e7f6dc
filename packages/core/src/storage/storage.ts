/**
 * Durable storage contract for the task store, and the validated shape of
 * the persisted record shared by every backend.
 */

import { z } from 'zod';
import type { Task } from '../types/task.js';
import { StorageCorruptError } from '../errors.js';

export interface StoreSnapshot {
  readonly nextId: number;
  readonly tasks: readonly Task[];
}

export interface TaskStorage {
  /** Where the record lives (file path or database path), for messages */
  readonly location: string;
  /** Returns null when no prior state exists. Throws StorageCorruptError on unparseable data. */
  read(): Promise<StoreSnapshot | null>;
  /** Replaces the whole persisted record. A failed write leaves the previous record. */
  write(snapshot: StoreSnapshot): Promise<void>;
  close(): Promise<void>;
}

export const EMPTY_SNAPSHOT: StoreSnapshot = { nextId: 1, tasks: [] };

const taskSchema = z.object({
  id: z.number().int().positive(),
  description: z.string().refine(s => s.trim().length > 0, 'description must not be blank'),
  completed: z.boolean(),
  createdAt: z.string().datetime({ offset: true }),
});

const snapshotSchema = z.object({
  nextId: z.number().int().min(1),
  tasks: z.array(taskSchema),
}).superRefine((data, ctx) => {
  const seen = new Set<number>();
  for (const task of data.tasks) {
    if (seen.has(task.id)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `duplicate task id ${task.id}`, path: ['tasks'] });
    }
    seen.add(task.id);
    if (task.id >= data.nextId) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `nextId ${data.nextId} must be greater than task id ${task.id}`,
        path: ['nextId'],
      });
    }
  }
});

/** Older file format: a bare array of tasks, no counter or timestamps */
const legacySchema = z.array(z.object({
  id: z.number().int().positive(),
  description: z.string(),
  completed: z.boolean(),
}));

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(i => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message))
    .join('; ');
}

/**
 * Validate an already-decoded record. Accepts the current format and the
 * legacy bare-array format (converted with nextId = max id + 1).
 */
export function parseSnapshot(data: unknown, location: string, now: Date = new Date()): StoreSnapshot {
  if (Array.isArray(data)) {
    const legacy = legacySchema.safeParse(data);
    if (!legacy.success) throw new StorageCorruptError(location, formatIssues(legacy.error));
    const createdAt = now.toISOString();
    const tasks = legacy.data.map(t => ({ ...t, createdAt }));
    const nextId = tasks.reduce((max, t) => Math.max(max, t.id), 0) + 1;
    return parseSnapshot({ nextId, tasks }, location, now);
  }

  const parsed = snapshotSchema.safeParse(data);
  if (!parsed.success) throw new StorageCorruptError(location, formatIssues(parsed.error));
  return parsed.data;
}

export function isLegacyRecord(data: unknown): boolean {
  return Array.isArray(data);
}
