/**
 * Simulation Backend
 * Implements the Backend contract against a profile instead of hardware.
 *
 * Each command is resolved in this order:
 *   1. exact scpi entry
 *   2. pattern scpi entries, most specific first
 *   3. built-ins (*IDN?, *CLS, *RST, *OPC?, *TST?, SYST:ERR?, SYST:VERS?)
 *   4. nothing matched: empty response, warning logged
 *
 * After the response is produced the profile's error rules run against the
 * command, then the backend stays busy for the entry's delay.
 */

import path from 'path';
import type { Backend, SleepFn } from '../types.js';
import type { Result, StateValue } from '../../../shared/types.js';
import { Ok, Err } from '../../../shared/types.js';
import { sleep as defaultSleep } from '../types.js';
import { ProfileError, SimulationError } from '../errors.js';
import { ScpiParser } from '../scpi-parser.js';
import { loadConfigFromEnv } from '../config.js';
import { createStateStore } from './state-store.js';
import { createErrorQueue } from './error-queue.js';
import { evaluateExpression, isTruthy, stringifyValue, toStateValue, type EvalScope } from './expression.js';
import { loadProfileWithOverride, type Profile, type ResponseEntrySpec } from './profile.js';
import {
  addRule,
  buildDispatchTable,
  matchCommand,
  matchErrorRules,
  substituteCaptures,
  type ActionMap,
  type ResponseEntry,
  type ValueSource,
} from './dispatch.js';

export interface SimBackendOptions {
  /** Profile file; ignored when `profile` is given */
  profilePath?: string;
  /** Already-loaded profile */
  profile?: Profile;
  /** Model name used in *IDN? and log lines (default: profile model, then file name) */
  model?: string;
  timeoutMs?: number;
  /** Root of user overrides (default: SIM_USER_PROFILE_DIR) */
  overrideRoot?: string;
  /** Root of packaged profiles (default: SIM_PROFILE_DIR) */
  packagedRoot?: string;
  /** Queue -113 "Undefined header" for commands nothing handles */
  strictUnknownCommands?: boolean;
  /** Log every command and response */
  debug?: boolean;
  sleep?: SleepFn;
  random?: () => number;
  now?: () => Date;
}

export interface SimBackend extends Backend {
  readonly model: string;
  /** Define or replace the entry for a command at runtime */
  setResponse(command: string, entry: ResponseEntrySpec): Result<void, ProfileError>;
}

interface Resolution {
  response: string;
  /** Seconds */
  delay: number;
}

const INLINE_SOURCE = '<inline profile>';

function modelFromPath(profilePath: string | undefined): string | undefined {
  return profilePath ? path.basename(profilePath, path.extname(profilePath)) : undefined;
}

function numericValue(value: StateValue | undefined): number | undefined {
  if (typeof value === 'number') return value;
  if (typeof value === 'string') {
    const parsed = ScpiParser.parseNumber(value);
    return parsed.ok ? parsed.value : undefined;
  }
  return undefined;
}

export async function createSimBackend(options: SimBackendOptions = {}): Promise<Result<SimBackend, ProfileError>> {
  const env = loadConfigFromEnv();

  let profile: Profile;
  let source: string;
  if (options.profile) {
    profile = options.profile;
    source = options.profilePath ?? INLINE_SOURCE;
  } else if (options.profilePath) {
    const loaded = await loadProfileWithOverride(options.profilePath, {
      packagedRoot: options.packagedRoot ?? env.packagedProfileDir,
      overrideRoot: options.overrideRoot ?? env.userProfileDir,
    });
    if (!loaded.ok) return loaded;
    profile = loaded.value;
    source = options.profilePath;
  } else {
    return Err(new ProfileError(INLINE_SOURCE, 'Either profilePath or profile is required'));
  }

  const table = buildDispatchTable(profile.simulation, source);
  if (!table.ok) return table;

  const model = options.model ?? profile.model ?? modelFromPath(options.profilePath) ?? 'SIM';
  const identification = profile.identification ?? `Simulated,BenchSim,${model}-SIM,1.0`;
  const strictUnknownCommands = options.strictUnknownCommands ?? env.strictUnknownCommands;
  const debug = options.debug ?? env.debug;
  const sleep = options.sleep ?? defaultSleep;
  const random = options.random ?? Math.random;
  const now = options.now ?? (() => new Date());

  const dispatch = table.value;
  const state = createStateStore(profile.simulation.initial_state);
  const errors = createErrorQueue();
  let timeoutMs = options.timeoutMs ?? env.defaultTimeoutMs;

  function scope(captures: readonly string[]): EvalScope {
    return { state: state.root(), captures, random, now };
  }

  function evaluate(value: ValueSource, captures: readonly string[]): Result<StateValue, SimulationError> {
    switch (value.kind) {
      case 'literal':
        return Ok(value.value);
      case 'template':
        return Ok(substituteCaptures(value.template, captures));
      case 'dynamic': {
        const result = evaluateExpression(value.expr, scope(captures));
        return result.ok ? toStateValue(result.value) : result;
      }
    }
  }

  function step(
    staged: Map<string, StateValue>,
    key: string,
    amount: StateValue,
    sign: 1 | -1
  ): Result<void, SimulationError> {
    const current = staged.has(key) ? staged.get(key) : state.get(key);
    const base = current === undefined ? 0 : numericValue(current);
    if (base === undefined) {
      return Err(new SimulationError(`Cannot change "${key}": current value ${JSON.stringify(current)} is not numeric`));
    }
    const delta = numericValue(amount);
    if (delta === undefined) {
      return Err(new SimulationError(`Cannot change "${key}" by non-numeric ${JSON.stringify(amount)}`));
    }
    staged.set(key, base + sign * delta);
    return Ok(undefined);
  }

  /** Evaluate every set/inc/dec first, then commit them together */
  function applyMutations(actions: ActionMap, captures: readonly string[]): Result<void, SimulationError> {
    const staged = new Map<string, StateValue>();

    for (const [key, value] of actions.set) {
      const result = evaluate(value, captures);
      if (!result.ok) return result;
      staged.set(key, result.value);
    }
    for (const [list, sign] of [[actions.inc, 1], [actions.dec, -1]] as const) {
      for (const [key, value] of list) {
        const amount = evaluate(value, captures);
        if (!amount.ok) return amount;
        const stepped = step(staged, key, amount.value, sign);
        if (!stepped.ok) return stepped;
      }
    }

    for (const [key, value] of staged) {
      const stored = state.set(key, value);
      if (!stored.ok) return stored;
    }
    return Ok(undefined);
  }

  function execute(entry: ResponseEntry, captures: readonly string[]): Result<Resolution, SimulationError> {
    switch (entry.kind) {
      case 'literal':
        return Ok({ response: entry.text, delay: 0 });
      case 'template':
        return Ok({ response: substituteCaptures(entry.template, captures), delay: 0 });
      case 'dynamic': {
        const result = evaluateExpression(entry.expr, scope(captures));
        return result.ok ? Ok({ response: stringifyValue(result.value), delay: 0 }) : result;
      }
      case 'actions': {
        const { actions } = entry;
        const mutated = applyMutations(actions, captures);
        if (!mutated.ok) return mutated;

        let response = '';
        if (actions.get !== undefined) {
          response = stringifyValue(state.get(actions.get));
        } else if (actions.response) {
          const result = evaluate(actions.response, captures);
          if (!result.ok) return result;
          response = stringifyValue(result.value);
        }
        return Ok({ response, delay: actions.delay });
      }
    }
  }

  function builtin(command: string): string | undefined {
    const upper = command.toUpperCase();
    if (upper === '*IDN?') return identification;
    if (upper === '*CLS') {
      errors.clear();
      return '';
    }
    if (ScpiParser.isErrorQuery(command)) return errors.next();
    if (upper === '*RST') {
      state.reset();
      errors.clear();
      return '';
    }
    if (upper === '*OPC?') return '1';
    if (upper === '*TST?') return '0';
    if (upper === '*OPC' || upper === '*WAI') return '';
    if (/^:?SYST(?:EM)?:VERS(?:ION)?\?$/.test(upper)) return '1999.0';
    return undefined;
  }

  function runErrorRules(command: string, captures: string[]): Result<void, SimulationError> {
    for (const { rule, captures: ruleCaptures } of matchErrorRules(dispatch, command, captures)) {
      const result = evaluateExpression(rule.condition, scope(ruleCaptures));
      if (!result.ok) return result;
      if (isTruthy(result.value)) {
        if (debug) console.debug(`[SimBackend] ${model} queued error ${rule.code} for "${command}"`);
        errors.push(rule.code, rule.message);
      }
    }
    return Ok(undefined);
  }

  async function resolve(command: string): Promise<Result<string, Error>> {
    const stripped = command.trim();
    if (debug) console.debug(`[SimBackend] ${model} << ${stripped}`);

    const match = matchCommand(dispatch, stripped);
    let captures: string[] = [];
    let resolution: Resolution;

    if (match) {
      captures = match.captures;
      const executed = execute(match.entry, captures);
      if (!executed.ok) return executed;
      resolution = executed.value;
    } else {
      const response = builtin(stripped);
      if (response === undefined) {
        console.warn(`[SimBackend] ${model}: no response defined for "${stripped}"`);
        if (strictUnknownCommands) errors.push(-113, 'Undefined header');
      }
      resolution = { response: response ?? '', delay: 0 };
    }

    const checked = runErrorRules(stripped, captures);
    if (!checked.ok) return checked;

    if (resolution.delay > 0) {
      if (debug) console.debug(`[SimBackend] ${model} busy for ${resolution.delay}s`);
      await sleep(resolution.delay * 1000);
    }

    if (debug) console.debug(`[SimBackend] ${model} >> ${resolution.response}`);
    return Ok(resolution.response);
  }

  async function query(command: string, delay?: number): Promise<Result<string, Error>> {
    const result = await resolve(command);
    if (result.ok && delay !== undefined && delay > 0) {
      await sleep(delay * 1000);
    }
    return result;
  }

  console.log(`[SimBackend] Loaded ${model} from ${source}`);

  return Ok({
    model,

    async connect(): Promise<Result<void, Error>> {
      if (debug) console.debug(`[SimBackend] ${model} connected`);
      return Ok(undefined);
    },

    async disconnect(): Promise<Result<void, Error>> {
      if (debug) console.debug(`[SimBackend] ${model} disconnected`);
      return Ok(undefined);
    },

    async write(command: string): Promise<Result<void, Error>> {
      const result = await resolve(command);
      return result.ok ? Ok(undefined) : result;
    },

    query,

    async queryRaw(command: string, delay?: number): Promise<Result<Buffer, Error>> {
      const result = await query(command, delay);
      return result.ok ? Ok(Buffer.from(result.value, 'utf-8')) : result;
    },

    async close(): Promise<Result<void, Error>> {
      if (debug) console.debug(`[SimBackend] ${model} closed`);
      return Ok(undefined);
    },

    async setTimeout(ms: number): Promise<Result<void, Error>> {
      if (ms <= 0) {
        console.warn(`[SimBackend] ${model}: non-positive timeout ${ms}ms`);
      }
      timeoutMs = ms;
      return Ok(undefined);
    },

    async getTimeout(): Promise<number> {
      return timeoutMs;
    },

    setResponse(command: string, entry: ResponseEntrySpec): Result<void, ProfileError> {
      return addRule(dispatch, command, entry, source);
    },
  });
}
