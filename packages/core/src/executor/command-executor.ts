/**
 * Applies an Intent to the task store and reports the outcome as a CommandResult.
 * Not-found, ambiguous, invalid and unrecognized commands come back as results;
 * only storage failures propagate as errors.
 */

import type { Intent, Selector } from '../types/intent.js';
import type { CommandResult } from '../types/results.js';
import type { Task } from '../types/task.js';
import type { TaskStore } from '../store/task-store.js';
import { isVtaskError } from '../errors.js';
import * as msg from './messages.js';

type Mutation = 'complete' | 'delete';

export async function executeIntent(intent: Intent, store: TaskStore): Promise<CommandResult> {
  switch (intent.type) {
    case 'add-task':
      return addTask(store, intent.description);
    case 'list-tasks': {
      const tasks = store.list();
      return { type: 'success', message: msg.taskListSummary(tasks), tasks };
    }
    case 'complete-task':
      return applyToSelector(store, intent.selector, 'complete');
    case 'delete-task':
      return applyToSelector(store, intent.selector, 'delete');
    case 'unrecognized':
      return { type: 'unrecognized', message: msg.unrecognizedMessage(intent.rawText), rawText: intent.rawText };
  }
}

async function addTask(store: TaskStore, description: string): Promise<CommandResult> {
  try {
    const task = await store.add(description);
    return { type: 'success', message: msg.addedMessage(task), task };
  } catch (err: unknown) {
    if (isVtaskError(err, 'INVALID_INPUT')) {
      return { type: 'invalid', message: err.message };
    }
    throw err;
  }
}

async function applyToSelector(store: TaskStore, selector: Selector, mutation: Mutation): Promise<CommandResult> {
  if (selector.kind === 'by-id') {
    return applyToId(store, selector, mutation);
  }

  const matches = store.findByDescription(selector.text);
  const [only] = matches;
  if (!only) {
    return { type: 'not-found', message: msg.noTaskMatchingMessage(selector.text), selector };
  }
  if (matches.length > 1) {
    return { type: 'ambiguous', message: msg.ambiguousMessage(selector.text, matches), candidates: matches };
  }
  return applyToId(store, { kind: 'by-id', id: only.id }, mutation);
}

async function applyToId(
  store: TaskStore,
  selector: Extract<Selector, { kind: 'by-id' }>,
  mutation: Mutation,
): Promise<CommandResult> {
  try {
    if (mutation === 'delete') {
      const task = await store.delete(selector.id);
      return { type: 'success', message: msg.deletedMessage(task), task };
    }
    const wasCompleted = store.find(selector.id)?.completed ?? false;
    const task = await store.complete(selector.id);
    return { type: 'success', message: completionMessage(task, wasCompleted), task };
  } catch (err: unknown) {
    if (isVtaskError(err, 'NOT_FOUND')) {
      return { type: 'not-found', message: msg.noTaskWithIdMessage(selector.id), selector };
    }
    throw err;
  }
}

function completionMessage(task: Task, wasCompleted: boolean): string {
  return wasCompleted ? msg.alreadyCompletedMessage(task) : msg.completedMessage(task);
}
