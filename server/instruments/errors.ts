/**
 * Harness-level errors.
 *
 * These are returned as Err(...) from backends and loaders and are meant to be
 * fatal to the calling script. Simulated instrument errors ("value out of
 * range") never use these: they go onto the simulator's error queue and are
 * read back with SYST:ERR?.
 */

import type { SessionEntryKind } from '../../shared/types.js';

/** Profile file missing, unreadable, or not a valid profile */
export class ProfileError extends Error {
  readonly path: string;

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super(`${message} (${path})`, options);
    this.name = 'ProfileError';
    this.path = path;
  }
}

/** A profile expression or action failed while a command was being simulated */
export class SimulationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SimulationError';
  }
}

/** Session file missing, unreadable, or without the requested alias */
export class SessionFileError extends Error {
  readonly path: string;

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super(`${message} (${path})`, options);
    this.name = 'SessionFileError';
    this.path = path;
  }
}

export interface ReplayCall {
  kind: SessionEntryKind;
  command: string;
}

/**
 * The script diverged from the recorded session.
 * `expected` is null when the log has already been fully consumed.
 */
export class ReplayMismatchError extends Error {
  readonly model: string;
  readonly step: number;
  readonly expected: ReplayCall | null;
  readonly actual: ReplayCall;

  constructor(model: string, step: number, expected: ReplayCall | null, actual: ReplayCall) {
    super(
      expected === null
        ? `Replay for '${model}' ended, but received unexpected ${actual.kind}: '${actual.command}'`
        : `Replay mismatch for '${model}' at step ${step}. ` +
          `Expected ${expected.kind} '${expected.command}', received ${actual.kind} '${actual.command}'`
    );
    this.name = 'ReplayMismatchError';
    this.model = model;
    this.step = step;
    this.expected = expected;
    this.actual = actual;
  }
}
