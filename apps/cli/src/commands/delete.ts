import { Command } from 'commander';
import type { SessionOpener } from '../helpers.js';
import { runUtterance, $try } from '../helpers.js';

export function createDeleteCommand(open: SessionOpener): Command {
  return new Command('delete')
    .description('Delete a task')
    .argument('<selector...>', 'Task id, or text matching exactly one task description')
    .action((words: string[], _opts: unknown, cmd: Command) => $try(() =>
      runUtterance(open, cmd, `delete ${words.join(' ')}`),
    ));
}
