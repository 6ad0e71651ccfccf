/**
 * Instrument Backends
 *
 * Scripts pick a backend once and then only see the Backend contract:
 *
 *   createBackend({ type: 'sim', profile: 'acme/psu' })
 *   createBackend({ type: 'sim', profile: 'acme/psu', record: true })
 *   createBackend({ type: 'replay', sessionPath: 'session.json', alias: 'psu' })
 *   createBackend({ type: 'serial', path: '/dev/ttyUSB0', baudRate: 115200 })
 *
 * Profile names without a .json extension are resolved against the packaged
 * profile directory ("acme/psu" -> profiles/acme/psu.json).
 */

import path from 'path';
import type { Backend, Result } from './types.js';
import { Ok } from './types.js';
import { loadConfigFromEnv } from './config.js';
import { createSimBackend, resolveProfileKey, type SimBackendOptions } from './simulation/index.js';
import { createReplayBackendFromSession, createRecordingBackend, type RecordingBackend } from './replay/index.js';
import { createSerialBackend, type SerialConfig } from './transports/serial.js';

export type SimMode = { type: 'sim'; profile: string; record?: boolean } & Omit<SimBackendOptions, 'profilePath' | 'profile'>;

export type ReplayMode = { type: 'replay'; sessionPath: string; alias: string; record?: false; debug?: boolean };

export type SerialMode = { type: 'serial'; record?: boolean } & SerialConfig;

export type BackendMode = SimMode | ReplayMode | SerialMode;

/** Profile key ("acme/psu") or path to a profile file */
export function resolveProfile(profile: string, packagedRoot: string): string {
  if (path.isAbsolute(profile) || profile.endsWith('.json')) {
    return path.resolve(profile);
  }
  return resolveProfileKey(profile, packagedRoot);
}

async function createInner(mode: BackendMode): Promise<Result<Backend, Error>> {
  switch (mode.type) {
    case 'sim': {
      const { type: _type, profile, record: _record, ...options } = mode;
      const packagedRoot = options.packagedRoot ?? loadConfigFromEnv().packagedProfileDir;
      return createSimBackend({ ...options, packagedRoot, profilePath: resolveProfile(profile, packagedRoot) });
    }
    case 'replay':
      return createReplayBackendFromSession(mode.sessionPath, mode.alias, { debug: mode.debug });
    case 'serial': {
      const { type: _type, record: _record, ...config } = mode;
      return Ok(createSerialBackend(config));
    }
  }
}

export async function createBackend(mode: BackendMode & { record: true }): Promise<Result<RecordingBackend, Error>>;
export async function createBackend(mode: BackendMode): Promise<Result<Backend, Error>>;
export async function createBackend(mode: BackendMode): Promise<Result<Backend, Error>> {
  const inner = await createInner(mode);
  if (!inner.ok || !mode.record) return inner;
  return Ok(createRecordingBackend(inner.value));
}

export type { Backend, SleepFn } from './types.js';
export { DEFAULT_TIMEOUT_MS } from './types.js';
export * from '../../shared/types.js';
export * from './errors.js';
export { ScpiParser, NO_ERROR_RESPONSE, type ScpiError } from './scpi-parser.js';
export { loadConfigFromEnv, PACKAGED_PROFILE_DIR, DEFAULT_USER_PROFILE_DIR, type BackendEnvConfig } from './config.js';
export * from './simulation/index.js';
export * from './replay/index.js';
export { createSerialBackend, listSerialPorts, type SerialBackend, type SerialConfig } from './transports/serial.js';
