import { Command } from 'commander';
import type { SessionOpener } from '../helpers.js';
import { runUtterance, $try } from '../helpers.js';

export function createListCommand(open: SessionOpener): Command {
  return new Command('list')
    .description('List all tasks')
    .action((_opts: unknown, cmd: Command) => $try(() =>
      runUtterance(open, cmd, 'list tasks'),
    ));
}
