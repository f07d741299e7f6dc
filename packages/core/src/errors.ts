/**
 * Error taxonomy for infrastructure failures and store-level rejections.
 * Business outcomes (not found, ambiguous, unrecognized) are CommandResults, not errors.
 */

import type { TaskId } from './types/task.js';

export type VtaskErrorCode =
  | 'INVALID_INPUT'
  | 'NOT_FOUND'
  | 'STORAGE_CORRUPT'
  | 'PERSIST_FAILED'
  | 'CANCELLED'
  | 'CONFIG_INVALID';

export class VtaskError extends Error {
  constructor(
    public readonly code: VtaskErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'VtaskError';
  }
}

export class InvalidInputError extends VtaskError {
  constructor(message: string) {
    super('INVALID_INPUT', message);
    this.name = 'InvalidInputError';
  }
}

export class TaskNotFoundError extends VtaskError {
  constructor(public readonly taskId: TaskId) {
    super('NOT_FOUND', `No task with id ${taskId}`);
    this.name = 'TaskNotFoundError';
  }
}

export class StorageCorruptError extends VtaskError {
  constructor(public readonly location: string, detail: string, options?: { cause?: unknown }) {
    super('STORAGE_CORRUPT', `Task data at ${location} is corrupt: ${detail}`, options);
    this.name = 'StorageCorruptError';
  }
}

export class PersistFailedError extends VtaskError {
  constructor(public readonly location: string, options?: { cause?: unknown }) {
    const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : '';
    super('PERSIST_FAILED', `Failed to save tasks to ${location}${reason}`, options);
    this.name = 'PersistFailedError';
  }
}

export class SubmissionCancelledError extends VtaskError {
  constructor(public readonly rawText: string) {
    super('CANCELLED', `Command cancelled before it ran: ${rawText}`);
    this.name = 'SubmissionCancelledError';
  }
}

export class ConfigError extends VtaskError {
  constructor(public readonly field: string, detail: string) {
    super('CONFIG_INVALID', `Invalid configuration for ${field}: ${detail}`);
    this.name = 'ConfigError';
  }
}

export function isVtaskError(err: unknown, code?: VtaskErrorCode): err is VtaskError {
  return err instanceof VtaskError && (code === undefined || err.code === code);
}
