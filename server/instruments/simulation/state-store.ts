/**
 * State Store
 * Mutable key/value state of one simulated instrument.
 *
 * Keys are dot-addressable: "channel.1.scale" reads or creates nested maps.
 * A top-level key that literally contains dots is used as-is when it exists.
 *
 * Each SimBackend owns exactly one store; it is never shared between backends.
 */

import type { Result, StateMap, StateValue } from '../../../shared/types.js';
import { Ok, Err } from '../../../shared/types.js';
import { SimulationError } from '../errors.js';

const FORBIDDEN_SEGMENTS = new Set(['__proto__', 'prototype', 'constructor']);

export interface StateStore {
  get(key: string): StateValue | undefined;
  has(key: string): boolean;
  set(key: string, value: StateValue): Result<void, SimulationError>;
  /** Live root map, for read-only use by the expression evaluator */
  root(): Readonly<StateMap>;
  /** Restore the initial state */
  reset(): void;
}

export function isStateMap(value: StateValue | undefined): value is StateMap {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function hasOwn(map: StateMap, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(map, key);
}

function child(container: StateValue | undefined, segment: string): StateValue | undefined {
  if (isStateMap(container)) {
    return hasOwn(container, segment) ? container[segment] : undefined;
  }
  if (Array.isArray(container) && /^\d+$/.test(segment)) {
    return container[Number(segment)];
  }
  return undefined;
}

export function createStateStore(initial: StateMap = {}): StateStore {
  let state: StateMap = structuredClone(initial);

  function get(key: string): StateValue | undefined {
    if (hasOwn(state, key)) return state[key];

    let current: StateValue | undefined = state;
    for (const segment of key.split('.')) {
      current = child(current, segment);
      if (current === undefined) return undefined;
    }
    return current;
  }

  function set(key: string, value: StateValue): Result<void, SimulationError> {
    const segments = key.split('.');
    if (segments.some(s => s === '' || FORBIDDEN_SEGMENTS.has(s))) {
      return Err(new SimulationError(`Invalid state key: "${key}"`));
    }

    if (segments.length === 1 || hasOwn(state, key)) {
      state[key] = value;
      return Ok(undefined);
    }

    let container: StateMap = state;
    for (const segment of segments.slice(0, -1)) {
      const next = hasOwn(container, segment) ? container[segment] : undefined;
      if (next === undefined) {
        const created: StateMap = {};
        container[segment] = created;
        container = created;
      } else if (isStateMap(next)) {
        container = next;
      } else {
        return Err(new SimulationError(`Cannot set "${key}": "${segment}" is not a map`));
      }
    }

    container[segments[segments.length - 1]] = value;
    return Ok(undefined);
  }

  return {
    get,
    has: (key) => get(key) !== undefined,
    set,
    root: () => state,
    reset(): void {
      state = structuredClone(initial);
    },
  };
}
