/**
 * chalk-based rendering of command results for the terminal.
 */

import chalk from 'chalk';
import type { CommandResult, Task } from '@vtask/core';

const INDENT = '    ';

// --- Formatting functions ---

export function formatCheckbox(completed: boolean): string {
  return completed ? chalk.green('[x]') : chalk.gray('[ ]');
}

export function formatTaskLine(task: Task): string {
  const taskId = chalk.dim(`(${task.id})`);
  const description = task.completed ? chalk.dim(task.description) : chalk.bold(task.description);
  return `${taskId} ${formatCheckbox(task.completed)} ${description}`;
}

// --- Result output ---

export function printResult(result: CommandResult): void {
  switch (result.type) {
    case 'success':
      success(result.message);
      for (const task of result.tasks ?? []) info(formatTaskLine(task));
      break;
    case 'not-found':
      error(result.message);
      break;
    case 'ambiguous':
      warning(result.message);
      for (const task of result.candidates) info(`${INDENT}${formatTaskLine(task)}`);
      break;
    case 'invalid':
    case 'unrecognized':
      warning(result.message);
      break;
  }
}

// --- Basic output ---

export function success(message: string): void {
  console.log(chalk.green(message));
}

export function error(message: string): void {
  console.log(chalk.red(message));
}

export function warning(message: string): void {
  console.log(chalk.yellow(message));
}

export function info(message: string): void {
  console.log(message);
}
