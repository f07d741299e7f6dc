import type { Task } from './task.js';
import type { Selector } from './intent.js';

/** Outcome of one command cycle. Business outcomes are values, never thrown. */
export type CommandResult =
  | {
    readonly type: 'success';
    readonly message: string;
    readonly task?: Task;
    readonly tasks?: readonly Task[];
  }
  | { readonly type: 'not-found'; readonly message: string; readonly selector: Selector }
  | { readonly type: 'ambiguous'; readonly message: string; readonly candidates: readonly Task[] }
  | { readonly type: 'invalid'; readonly message: string }
  | { readonly type: 'unrecognized'; readonly message: string; readonly rawText: string };

export type ResultType = CommandResult['type'];

export type SuccessResult = Extract<CommandResult, { type: 'success' }>;

// Helper functions
export function isSuccess(r: CommandResult): r is SuccessResult {
  return r.type === 'success';
}

/** True when the command changed nothing because it could not be applied */
export function isRejected(r: CommandResult): boolean {
  return r.type !== 'success';
}
