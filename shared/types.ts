// Shared types for the simulation and replay engines

// ============ Result Type ============
// Use Result<T, E> instead of throwing exceptions.
// Try/catch only at boundaries (file system, serial port, expression evaluation).

export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

// Helper constructors
export const Ok = <T>(value: T): Result<T, never> => ({ ok: true, value });
export const Err = <E>(error: E): Result<never, E> => ({ ok: false, error });

// Helper to wrap a throwing function into Result
export const tryResult = <T>(fn: () => T): Result<T, Error> => {
  try {
    return Ok(fn());
  } catch (e) {
    return Err(e instanceof Error ? e : new Error(String(e)));
  }
};

// ============ State Values ============

/**
 * Anything a profile's initial_state can hold, and anything the simulator
 * stores back into state. Mirrors what JSON can express.
 */
export type StateValue =
  | string
  | number
  | boolean
  | null
  | StateValue[]
  | { [key: string]: StateValue };

export type StateMap = { [key: string]: StateValue };

// ============ Session Recording ============

export type SessionEntryKind = 'write' | 'query' | 'query_raw';

export interface SessionLogEntry {
  kind: SessionEntryKind;
  command: string;
  response?: string;
  /** Seconds since the recording started */
  timestamp: number;
}

export interface SessionRecord {
  /** Profile key the instrument was simulated/recorded with (e.g. "acme/psu") */
  profile: string;
  log: SessionLogEntry[];
}

/** Session file contents, keyed by instrument alias */
export type SessionFile = Record<string, SessionRecord>;
