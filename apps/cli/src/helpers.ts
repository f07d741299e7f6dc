/**
 * CLI helpers: global options, session opening, error handling.
 */

import type { Command } from 'commander';
import type { SessionCoordinator } from '@vtask/core';
import { loadConfig, openSession, setLogLevel, isVtaskError } from '@vtask/core';
import * as out from './output.js';

export type GlobalOptions = {
  file?: string;
  storage?: string;
  logLevel?: string;
  resetCorrupt?: boolean;
};

export type SessionOpener = (opts: GlobalOptions) => Promise<SessionCoordinator>;

/** Build a session from flags, then environment, then defaults */
export function createSessionOpener(env: Record<string, string | undefined> = process.env): SessionOpener {
  return async (opts) => {
    const config = loadConfig(env, {
      dataFile: opts.file,
      storage: opts.storage,
      logLevel: opts.logLevel,
    });
    setLogLevel(config.logLevel);
    return openSession(config, { resetOnCorrupt: opts.resetCorrupt ?? false });
  };
}

export function globalOptions(cmd: Command): GlobalOptions {
  return cmd.optsWithGlobals<GlobalOptions>();
}

/** Open a session, run one utterance through it, print the result, close it */
export async function runUtterance(open: SessionOpener, cmd: Command, utterance: string): Promise<void> {
  const session = await open(globalOptions(cmd));
  try {
    out.printResult(await session.submit(utterance));
  } finally {
    await session.shutdown();
  }
}

/** Report a failure and mark the process as failed */
export function reportFailure(err: unknown): void {
  if (isVtaskError(err, 'CANCELLED')) {
    out.warning(err.message);
    return;
  }
  out.error(err instanceof Error ? err.message : String(err));
  process.exitCode = 1;
}

/**
 * Wrap a command action with error handling. Business outcomes never reach
 * here; anything thrown is an infrastructure failure.
 */
export async function $try(fn: () => Promise<void>): Promise<void> {
  try {
    await fn();
  } catch (err: unknown) {
    reportFailure(err);
  }
}
