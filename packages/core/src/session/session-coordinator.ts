/**
 * Serializes command submissions from every input path (listening, typed)
 * into the executor. One command touches the store at a time; the rest wait
 * in arrival order.
 */

import type { CommandResult } from '../types/results.js';
import { isRejected } from '../types/results.js';
import type { TaskStore } from '../store/task-store.js';
import { interpretCommand } from '../parsers/command-parser.js';
import { executeIntent } from '../executor/command-executor.js';
import { SubmissionCancelledError } from '../errors.js';
import { createLogger } from '../logger.js';

const log = createLogger('session');

export type SessionState = 'idle' | 'busy' | 'closed';

export interface SessionStatus {
  state: SessionState;
  queued: number;
}

interface QueuedSubmission {
  rawText: string;
  resolve: (result: CommandResult) => void;
  reject: (error: Error) => void;
}

export class SessionCoordinator {
  private readonly store: TaskStore;
  private state: SessionState = 'idle';
  private queue: QueuedSubmission[] = [];
  private inFlight: Promise<void> | null = null;

  /** The store must already be loaded; the coordinator owns it from here on */
  constructor(store: TaskStore) {
    if (!store.isLoaded) {
      throw new Error('SessionCoordinator needs a loaded TaskStore');
    }
    this.store = store;
  }

  /** Interpret and execute one command. Resolves once every earlier submission has run. */
  submit(rawText: string): Promise<CommandResult> {
    return new Promise<CommandResult>((resolve, reject) => {
      if (this.state === 'closed') {
        reject(new SubmissionCancelledError(rawText));
        return;
      }
      this.queue.push({ rawText, resolve, reject });
      log.debug(`queued "${rawText}" (${this.queue.length} waiting)`);
      if (this.state === 'idle') {
        this.inFlight = this.drain();
      }
    });
  }

  /**
   * Cancel every submission that has not started and wait for the running one.
   * The store's backend is closed afterwards.
   */
  async shutdown(): Promise<void> {
    if (this.state === 'closed') return;

    const pending = this.queue;
    this.queue = [];
    this.state = 'closed';
    for (const submission of pending) {
      submission.reject(new SubmissionCancelledError(submission.rawText));
    }
    if (pending.length > 0) log.info(`cancelled ${pending.length} queued command(s)`);

    await this.inFlight;
    await this.store.close();
  }

  getStatus(): SessionStatus {
    return { state: this.state, queued: this.queue.length };
  }

  private async drain(): Promise<void> {
    this.state = 'busy';
    let next = this.queue.shift();
    while (next) {
      await this.run(next);
      next = this.queue.shift();
    }
    if (this.state === 'busy') this.state = 'idle';
    this.inFlight = null;
  }

  private async run(submission: QueuedSubmission): Promise<void> {
    try {
      const intent = interpretCommand(submission.rawText);
      log.debug(`"${submission.rawText}" -> ${intent.type}`);
      const result = await executeIntent(intent, this.store);
      if (isRejected(result)) log.info(`"${submission.rawText}" -> ${result.type}: ${result.message}`);
      submission.resolve(result);
    } catch (error) {
      log.error(`command "${submission.rawText}" failed:`, error);
      submission.reject(error instanceof Error ? error : new Error(String(error)));
    }
  }
}
