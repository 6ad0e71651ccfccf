// Re-export shared types
export * from '../../shared/types.js';

import type { Result } from '../../shared/types.js';

/**
 * Backend I/O contract.
 *
 * Every instrument driver talks to hardware, the simulator, or a replay log
 * exclusively through this surface.
 *
 * Precondition: at most one call in flight per backend instance. A real
 * instrument session is a serial request/response conversation, and the
 * simulation and replay backends keep no lock of their own; overlapping calls
 * interleave state mutation and cursor advancement unpredictably.
 */
export interface Backend {
  connect(): Promise<Result<void, Error>>;
  disconnect(): Promise<Result<void, Error>>;
  write(command: string): Promise<Result<void, Error>>;
  /** `delay` is in seconds */
  query(command: string, delay?: number): Promise<Result<string, Error>>;
  queryRaw(command: string, delay?: number): Promise<Result<Buffer, Error>>;
  close(): Promise<Result<void, Error>>;
  setTimeout(ms: number): Promise<Result<void, Error>>;
  getTimeout(): Promise<number>;
}

export const DEFAULT_TIMEOUT_MS = 5000;

export type SleepFn = (ms: number) => Promise<void>;

export const sleep: SleepFn = (ms) => new Promise(r => setTimeout(r, ms));
