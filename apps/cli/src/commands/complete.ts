import { Command } from 'commander';
import type { SessionOpener } from '../helpers.js';
import { runUtterance, $try } from '../helpers.js';

export function createCompleteCommand(open: SessionOpener): Command {
  return new Command('complete')
    .description('Mark a task as completed')
    .argument('<selector...>', 'Task id, or text matching exactly one task description')
    .action((words: string[], _opts: unknown, cmd: Command) => $try(() =>
      runUtterance(open, cmd, `complete ${words.join(' ')}`),
    ));
}
