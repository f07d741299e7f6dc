// Types
export type { TaskId, Task } from './types/task.js';
export type { Selector, Intent, IntentType } from './types/intent.js';
export type { CommandResult, ResultType, SuccessResult } from './types/results.js';
export { isSuccess, isRejected } from './types/results.js';

// Errors
export {
  VtaskError, InvalidInputError, TaskNotFoundError, StorageCorruptError,
  PersistFailedError, SubmissionCancelledError, ConfigError, isVtaskError,
} from './errors.js';
export type { VtaskErrorCode } from './errors.js';

// Storage
export type { StoreSnapshot, TaskStorage } from './storage/storage.js';
export { EMPTY_SNAPSHOT, parseSnapshot } from './storage/storage.js';
export { JsonFileStorage } from './storage/json-file-storage.js';
export { SqliteTaskStorage, CREATE_SCHEMA_SQL } from './storage/sqlite-storage.js';
export type { VtaskDb } from './storage/sqlite-storage.js';

// Store
export { TaskStore } from './store/task-store.js';

// Interpreter
export { interpretCommand, normalizeUtterance, parseSelector } from './parsers/command-parser.js';

// Executor
export { executeIntent } from './executor/command-executor.js';
export { taskListSummary } from './executor/messages.js';

// Session
export { SessionCoordinator } from './session/session-coordinator.js';
export type { SessionState, SessionStatus } from './session/session-coordinator.js';
export { openSession } from './session/open-session.js';
export type { OpenSessionOptions } from './session/open-session.js';

// Config
export { loadConfig, createStorage, getDefaultDataDir } from './config.js';
export type { VtaskConfig, StorageKind, ConfigOverrides } from './config.js';

// Logging
export {
  createLogger, setLogLevel, getLogLevel, getLogHistory, clearLogs, onLog,
} from './logger.js';
export type { Logger, LogLevel, LogEntry } from './logger.js';
