/**
 * Replay Backend
 * Serves a recorded session back, one entry per call, in order.
 *
 * Every call must match the next log entry's kind and command (compared after
 * trimming). A divergence, or any call after the log is used up, fails with a
 * ReplayMismatchError and leaves the cursor where it was.
 */

import type { Backend } from '../types.js';
import type { Result, SessionEntryKind, SessionLogEntry } from '../../../shared/types.js';
import { Ok, Err } from '../../../shared/types.js';
import { DEFAULT_TIMEOUT_MS } from '../types.js';
import { ReplayMismatchError, type SessionFileError } from '../errors.js';
import { loadSessionRecord } from './session-log.js';

export interface ReplayBackendOptions {
  /** Name used in mismatch errors */
  model: string;
  log: SessionLogEntry[];
  timeoutMs?: number;
  debug?: boolean;
}

export interface ReplayBackend extends Backend {
  readonly model: string;
  /** Index of the next entry to be served */
  getCursor(): number;
  remaining(): number;
  isComplete(): boolean;
}

export function createReplayBackend(options: ReplayBackendOptions): ReplayBackend {
  const { model, debug = false } = options;
  const log = options.log.map(entry => ({ ...entry }));
  let cursor = 0;
  let timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;

  function next(
    actual: SessionEntryKind,
    accepted: readonly SessionEntryKind[],
    command: string
  ): Result<SessionLogEntry, ReplayMismatchError> {
    const stripped = command.trim();
    const received = { kind: actual, command: stripped };

    if (cursor >= log.length) {
      return Err(new ReplayMismatchError(model, cursor, null, received));
    }

    const entry = log[cursor];
    const recorded = entry.command.trim();
    if (!accepted.includes(entry.kind) || recorded !== stripped) {
      return Err(new ReplayMismatchError(model, cursor, { kind: entry.kind, command: recorded }, received));
    }

    if (debug) console.debug(`[ReplayBackend] ${model} step ${cursor}: ${entry.kind} ${recorded}`);
    cursor++;
    return Ok(entry);
  }

  return {
    model,

    async connect(): Promise<Result<void, Error>> {
      if (debug) console.debug(`[ReplayBackend] ${model} connected`);
      return Ok(undefined);
    },

    async disconnect(): Promise<Result<void, Error>> {
      if (debug) console.debug(`[ReplayBackend] ${model} disconnected`);
      return Ok(undefined);
    },

    async write(command: string): Promise<Result<void, Error>> {
      const entry = next('write', ['write'], command);
      return entry.ok ? Ok(undefined) : entry;
    },

    // The recorded timing already happened; the delay argument is ignored.
    async query(command: string): Promise<Result<string, Error>> {
      const entry = next('query', ['query'], command);
      return entry.ok ? Ok(entry.value.response ?? '') : entry;
    },

    async queryRaw(command: string): Promise<Result<Buffer, Error>> {
      const entry = next('query_raw', ['query_raw', 'query'], command);
      return entry.ok ? Ok(Buffer.from(entry.value.response ?? '', 'utf-8')) : entry;
    },

    async close(): Promise<Result<void, Error>> {
      if (debug) console.debug(`[ReplayBackend] ${model} closed at step ${cursor}/${log.length}`);
      return Ok(undefined);
    },

    async setTimeout(ms: number): Promise<Result<void, Error>> {
      timeoutMs = ms;
      return Ok(undefined);
    },

    async getTimeout(): Promise<number> {
      return timeoutMs;
    },

    getCursor: () => cursor,
    remaining: () => log.length - cursor,
    isComplete: () => cursor >= log.length,
  };
}

/**
 * Replay the session recorded under `alias` in a session file.
 */
export async function createReplayBackendFromSession(
  sessionPath: string,
  alias: string,
  options: Omit<ReplayBackendOptions, 'log' | 'model'> & { model?: string } = {}
): Promise<Result<ReplayBackend, SessionFileError>> {
  const record = await loadSessionRecord(sessionPath, alias);
  if (!record.ok) return record;

  console.log(`[ReplayBackend] Loaded ${record.value.log.length} entries for '${alias}' from ${sessionPath}`);
  return Ok(
    createReplayBackend({
      ...options,
      model: options.model ?? record.value.profile,
      log: record.value.log,
    })
  );
}
