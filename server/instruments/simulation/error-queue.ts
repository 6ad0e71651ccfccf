/**
 * Error Queue
 * FIFO of pending SCPI errors, drained one entry per SYST:ERR? query.
 *
 * No capacity bound: every queued error is reported, oldest first.
 */

import { ScpiParser, NO_ERROR_RESPONSE, type ScpiError } from '../scpi-parser.js';

export interface ErrorQueue {
  push(code: number, message: string): void;
  /** Oldest pending error, or undefined when the queue is empty */
  pop(): ScpiError | undefined;
  /** Pop and format for the error-status query; "+0,\"No error\"" when empty */
  next(): string;
  clear(): void;
  readonly size: number;
}

export function createErrorQueue(): ErrorQueue {
  const entries: ScpiError[] = [];

  function pop(): ScpiError | undefined {
    return entries.shift();
  }

  return {
    push(code: number, message: string): void {
      entries.push({ code, message });
    },

    pop,

    next(): string {
      const error = pop();
      return error ? ScpiParser.formatErrorResponse(error) : NO_ERROR_RESPONSE;
    },

    clear(): void {
      entries.length = 0;
    },

    get size(): number {
      return entries.length;
    },
  };
}
