import { Command } from 'commander';
import type { Readable } from 'node:stream';
import type { SessionOpener } from './helpers.js';
import { createAddCommand } from './commands/add.js';
import { createCompleteCommand } from './commands/complete.js';
import { createDeleteCommand } from './commands/delete.js';
import { createListCommand } from './commands/list.js';
import { createSayCommand } from './commands/say.js';
import { createListenCommand } from './commands/listen.js';

export function createProgram(open: SessionOpener, input?: Readable): Command {
  const program = new Command()
    .name('vtask')
    .description('Manage a task list with spoken or typed commands')
    .version('1.0.0')
    .option('-f, --file <path>', 'Task data file (default: platform data directory)')
    .option('-s, --storage <kind>', 'Storage backend: json or sqlite')
    .option('--log-level <level>', 'debug, info, warn, error or silent')
    .option('--reset-corrupt', 'Start with an empty list if the saved data is corrupt');

  // Register commands
  program.addCommand(createAddCommand(open));
  program.addCommand(createCompleteCommand(open));
  program.addCommand(createDeleteCommand(open));
  program.addCommand(createListCommand(open));
  program.addCommand(createSayCommand(open));
  program.addCommand(createListenCommand(open, input));

  return program;
}
