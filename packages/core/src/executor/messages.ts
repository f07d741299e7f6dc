/**
 * Wording of command outcomes. Messages double as spoken feedback, so they
 * are plain sentences with no formatting.
 */

import type { Task } from '../types/task.js';

export function addedMessage(task: Task): string {
  return `Added task ${task.id}: ${task.description}`;
}

export function completedMessage(task: Task): string {
  return `Completed task ${task.id}: ${task.description}`;
}

export function alreadyCompletedMessage(task: Task): string {
  return `Task ${task.id} is already completed: ${task.description}`;
}

export function deletedMessage(task: Task): string {
  return `Deleted task ${task.id}: ${task.description}`;
}

export function noTaskWithIdMessage(id: number): string {
  return `No task with id ${id}`;
}

export function noTaskMatchingMessage(text: string): string {
  return `No task matching '${text}'`;
}

export function ambiguousMessage(text: string, candidates: readonly Task[]): string {
  const names = candidates.map(t => `${t.id} (${t.description})`).join(', ');
  return `Multiple tasks match '${text}': ${names}. Please be more specific.`;
}

export function unrecognizedMessage(rawText: string): string {
  return `Command not recognized: ${rawText.trim()}`;
}

/** Spoken summary of the whole list */
export function taskListSummary(tasks: readonly Task[]): string {
  if (tasks.length === 0) return 'Your task list is empty.';
  const items = tasks.map(t => `Task ${t.id}, ${t.description}, ${t.completed ? 'completed' : 'pending'}.`);
  return `Here are your tasks: ${items.join(' ')}`;
}
