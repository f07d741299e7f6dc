import { Command } from 'commander';
import { createInterface } from 'node:readline';
import type { Readable } from 'node:stream';
import type { SessionOpener } from '../helpers.js';
import { globalOptions, reportFailure, $try } from '../helpers.js';
import * as out from '../output.js';

/**
 * The listening path: each line on the input is one recognized utterance.
 * Lines are submitted as they arrive without waiting for earlier results,
 * and results print in arrival order. End of input drains the queue;
 * SIGINT cancels whatever has not started yet.
 */
export function createListenCommand(open: SessionOpener, input: Readable = process.stdin): Command {
  return new Command('listen')
    .description('Read commands line by line from standard input')
    .action((_opts: unknown, cmd: Command) => $try(async () => {
      const session = await open(globalOptions(cmd));
      const rl = createInterface({ input, terminal: false });
      const pending: Promise<void>[] = [];
      let interrupted = false;

      const onSigint = () => {
        interrupted = true;
        rl.close();
      };
      process.once('SIGINT', onSigint);

      try {
        for await (const line of rl) {
          // Nothing recognized: no submission
          if (line.trim().length === 0) continue;
          pending.push(session.submit(line).then(out.printResult, reportFailure));
        }
        if (interrupted) {
          await session.shutdown();
        }
        await Promise.all(pending);
      } finally {
        process.removeListener('SIGINT', onSigint);
        await session.shutdown();
      }
    }));
}
