/**
 * Recording Backend
 * Wraps any backend and logs every successful call, so the session can be
 * saved and replayed later.
 */

import type { Backend } from '../types.js';
import type { Result, SessionEntryKind, SessionLogEntry } from '../../../shared/types.js';
import type { SessionFileError } from '../errors.js';
import { saveSessionFile } from './session-log.js';

export interface RecordingBackendOptions {
  /** Millisecond clock (default: Date.now) */
  now?: () => number;
}

export interface RecordingBackend extends Backend {
  readonly inner: Backend;
  /** Copy of the log so far */
  getLog(): SessionLogEntry[];
  /** Merge the log into a session file under `alias` */
  save(sessionPath: string, alias: string, profileKey: string): Promise<Result<void, SessionFileError>>;
}

export function createRecordingBackend(inner: Backend, options: RecordingBackendOptions = {}): RecordingBackend {
  const now = options.now ?? Date.now;
  const startedAt = now();
  const log: SessionLogEntry[] = [];

  function record(kind: SessionEntryKind, command: string, response?: string): void {
    const entry: SessionLogEntry = {
      kind,
      command: command.trim(),
      timestamp: (now() - startedAt) / 1000,
    };
    if (response !== undefined) entry.response = response;
    log.push(entry);
  }

  function getLog(): SessionLogEntry[] {
    return log.map(entry => ({ ...entry }));
  }

  return {
    inner,

    connect: () => inner.connect(),
    disconnect: () => inner.disconnect(),

    async write(command: string): Promise<Result<void, Error>> {
      const result = await inner.write(command);
      if (result.ok) record('write', command);
      return result;
    },

    async query(command: string, delay?: number): Promise<Result<string, Error>> {
      const result = await inner.query(command, delay);
      if (result.ok) record('query', command, result.value);
      return result;
    },

    async queryRaw(command: string, delay?: number): Promise<Result<Buffer, Error>> {
      const result = await inner.queryRaw(command, delay);
      if (result.ok) record('query_raw', command, result.value.toString('utf-8'));
      return result;
    },

    close: () => inner.close(),
    setTimeout: (ms: number) => inner.setTimeout(ms),
    getTimeout: () => inner.getTimeout(),

    getLog,

    save(sessionPath: string, alias: string, profileKey: string): Promise<Result<void, SessionFileError>> {
      return saveSessionFile(sessionPath, alias, profileKey, getLog());
    },
  };
}
