import { Command } from 'commander';
import type { SessionOpener } from '../helpers.js';
import { runUtterance, $try } from '../helpers.js';

export function createAddCommand(open: SessionOpener): Command {
  return new Command('add')
    .description('Add a new task')
    .argument('<description...>', 'Task description')
    .action((words: string[], _opts: unknown, cmd: Command) => $try(() =>
      runUtterance(open, cmd, `add ${words.join(' ')}`),
    ));
}
