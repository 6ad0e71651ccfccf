/**
 * Environment configuration for the instrument backends.
 *
 * Configuration via environment variables:
 *   SIM_USER_PROFILE_DIR         - Root of user profile overrides (default: ~/.benchsim/sim_profiles)
 *   SIM_PROFILE_DIR              - Root of packaged profiles (default: <package>/profiles)
 *   SIM_DEFAULT_TIMEOUT_MS       - Initial backend timeout (default: 5000)
 *   SIM_STRICT_UNKNOWN_COMMANDS  - Queue -113 "Undefined header" for unmatched commands (default: false)
 *   SIM_DEBUG                    - Log every command and response (default: false)
 *
 * Explicit options passed to a backend factory always win over these.
 */

import { existsSync } from 'fs';
import os from 'os';
import path from 'path';
import { fileURLToPath } from 'url';
import { DEFAULT_TIMEOUT_MS } from './types.js';

export interface BackendEnvConfig {
  userProfileDir: string;
  packagedProfileDir: string;
  defaultTimeoutMs: number;
  strictUnknownCommands: boolean;
  debug: boolean;
}

const moduleDir = path.dirname(fileURLToPath(import.meta.url));

/** profiles/ at the package root; one level further up when running from dist/ */
export const PACKAGED_PROFILE_DIR = [
  path.resolve(moduleDir, '..', '..', 'profiles'),
  path.resolve(moduleDir, '..', '..', '..', 'profiles'),
].find(dir => existsSync(dir)) ?? path.resolve(moduleDir, '..', '..', 'profiles');

export const DEFAULT_USER_PROFILE_DIR = path.join(os.homedir(), '.benchsim', 'sim_profiles');

function parseBool(value: string | undefined, defaultVal: boolean): boolean {
  if (value === undefined || value === '') return defaultVal;
  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

function parsePositiveInt(value: string | undefined, defaultVal: number): number {
  if (!value) return defaultVal;
  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) || parsed <= 0 ? defaultVal : parsed;
}

/**
 * Load configuration from environment variables with defaults.
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): BackendEnvConfig {
  return {
    userProfileDir: env.SIM_USER_PROFILE_DIR || DEFAULT_USER_PROFILE_DIR,
    packagedProfileDir: env.SIM_PROFILE_DIR || PACKAGED_PROFILE_DIR,
    defaultTimeoutMs: parsePositiveInt(env.SIM_DEFAULT_TIMEOUT_MS, DEFAULT_TIMEOUT_MS),
    strictUnknownCommands: parseBool(env.SIM_STRICT_UNKNOWN_COMMANDS, false),
    debug: parseBool(env.SIM_DEBUG, false),
  };
}
