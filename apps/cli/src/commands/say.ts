import { Command } from 'commander';
import type { SessionOpener } from '../helpers.js';
import { runUtterance, $try } from '../helpers.js';

export function createSayCommand(open: SessionOpener): Command {
  return new Command('say')
    .description('Run a free-form command, e.g. "mark done buy milk"')
    .argument('<utterance...>', 'The command as it would be spoken')
    .action((words: string[], _opts: unknown, cmd: Command) => $try(() =>
      runUtterance(open, cmd, words.join(' ')),
    ));
}
