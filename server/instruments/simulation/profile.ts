/**
 * Simulation Profiles
 *
 * A profile describes how a simulated instrument behaves:
 *
 *   {
 *     "model": "PSU-1",
 *     "simulation": {
 *       "initial_state": { "voltage": 0 },
 *       "scpi": {
 *         "*IDN?": "ACME,PSU-1,0001,1.0",
 *         ":VOLT $1": { "set": { "voltage": "$1" } },
 *         ":VOLT?": { "get": "voltage" }
 *       },
 *       "errors": [
 *         { "pattern": ":VOLT .*", "condition": "g1 > 30", "code": -222, "message": "Data out of range" }
 *       ]
 *     }
 *   }
 *
 * Packaged profiles live under profiles/ and are never edited in place. A user
 * keeps local changes in a mirror tree under the override directory
 * (~/.benchsim/sim_profiles by default); the override file is deep-merged on
 * top of the packaged one at load time.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';
import type { Result, StateMap, StateValue } from '../../../shared/types.js';
import { Ok, Err, tryResult } from '../../../shared/types.js';
import { ProfileError } from '../errors.js';
import { isStateMap } from './state-store.js';

export interface ActionMapSpec {
  /** Seconds to stay busy after the entry has been applied */
  delay?: number;
  set?: Record<string, StateValue>;
  inc?: Record<string, number | string>;
  dec?: Record<string, number | string>;
  get?: string;
  response?: string;
}

export type ResponseEntrySpec = string | ActionMapSpec;

export interface ErrorSpec {
  /** Regular expression, full-matched case-insensitively against the command */
  pattern: string;
  /** Expression; the error is queued when it is truthy */
  condition: string;
  code: number;
  message: string;
}

export interface SimulationSpec {
  initial_state: StateMap;
  scpi: Record<string, ResponseEntrySpec>;
  errors: ErrorSpec[];
}

export interface Profile {
  model?: string;
  /** Response to *IDN? when the scpi map does not define one */
  identification?: string;
  simulation: SimulationSpec;
}

export interface OverrideOptions {
  /** Directory the packaged profiles live in */
  packagedRoot: string;
  /** Directory mirroring packagedRoot with user overrides */
  overrideRoot: string;
}

const StateValueSchema: z.ZodType<StateValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(StateValueSchema),
    z.record(StateValueSchema),
  ])
);

const DocumentSchema = z.record(StateValueSchema);

const NumericSchema = z.union([z.number(), z.string()]);

const ActionMapSchema = z
  .object({
    delay: z.number().nonnegative().optional(),
    set: z.record(StateValueSchema).optional(),
    inc: z.record(NumericSchema).optional(),
    dec: z.record(NumericSchema).optional(),
    get: z.string().optional(),
    response: z.string().optional(),
  })
  .strict();

// Older profiles name the pattern field "scpi"
function renameLegacyPattern(value: unknown): unknown {
  if (typeof value === 'object' && value !== null && !('pattern' in value) && 'scpi' in value) {
    const { scpi, ...rest } = value;
    return { ...rest, pattern: scpi };
  }
  return value;
}

const ErrorSpecSchema = z.preprocess(
  renameLegacyPattern,
  z.object({
    pattern: z.string().min(1),
    condition: z.string().default('false'),
    code: z.number().int(),
    message: z.string(),
  })
);

const SimulationSchema = z.object({
  initial_state: z.record(StateValueSchema).default({}),
  scpi: z.record(z.union([z.string(), ActionMapSchema])).default({}),
  errors: z.array(ErrorSpecSchema).default([]),
});

const ProfileSchema = z.object({
  model: z.string().optional(),
  identification: z.string().optional(),
  simulation: SimulationSchema.optional(),
});

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Read a profile file as a plain JSON document, without profile validation.
 */
export async function readProfileDocument(filePath: string): Promise<Result<StateMap, ProfileError>> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (err) {
    const missing = err instanceof Error && 'code' in err && err.code === 'ENOENT';
    const message = missing ? 'Profile file does not exist' : 'Profile file could not be read';
    return Err(new ProfileError(filePath, message, { cause: err }));
  }

  const data = tryResult((): unknown => JSON.parse(content));
  if (!data.ok) {
    return Err(new ProfileError(filePath, 'Invalid JSON in profile', { cause: data.error }));
  }

  const parsed = DocumentSchema.safeParse(data.value);
  if (!parsed.success) {
    return Err(new ProfileError(filePath, 'Profile must be a JSON object'));
  }
  return Ok(parsed.data);
}

/**
 * Validate a (possibly merged) profile document.
 */
export function parseProfile(document: StateMap, source: string): Result<Profile, ProfileError> {
  const parsed = ProfileSchema.safeParse(document);
  if (!parsed.success) {
    return Err(new ProfileError(source, `Invalid profile: ${formatIssues(parsed.error)}`));
  }

  const { model, identification, simulation } = parsed.data;
  if (!simulation) {
    console.warn(`[Profile] ${source} has no "simulation" section, using an empty one`);
  }

  return Ok({
    model,
    identification,
    simulation: simulation ?? { initial_state: {}, scpi: {}, errors: [] },
  });
}

export async function loadProfile(filePath: string): Promise<Result<Profile, ProfileError>> {
  const document = await readProfileDocument(filePath);
  if (!document.ok) return document;
  return parseProfile(document.value, filePath);
}

/**
 * Recursively merge `override` into `base`, returning a new document.
 *
 * Maps merge key by key; when both sides hold a list, the lists are
 * concatenated with the override's entries first; anything else is replaced
 * by the override's value.
 */
export function mergeProfiles(base: StateMap, override: StateMap): StateMap {
  const out: StateMap = { ...base };
  for (const [key, value] of Object.entries(override)) {
    const existing = Object.prototype.hasOwnProperty.call(out, key) ? out[key] : undefined;
    if (isStateMap(existing) && isStateMap(value)) {
      out[key] = mergeProfiles(existing, value);
    } else if (Array.isArray(existing) && Array.isArray(value)) {
      out[key] = [...value, ...existing];
    } else {
      out[key] = value;
    }
  }
  return out;
}

/**
 * Where the user override for `profilePath` would live, or null when the
 * profile is not one of the packaged profiles.
 */
export function resolveOverridePath(profilePath: string, options: OverrideOptions): string | null {
  const relative = path.relative(path.resolve(options.packagedRoot), path.resolve(profilePath));
  if (relative === '' || relative.startsWith('..') || path.isAbsolute(relative)) {
    return null;
  }
  return path.join(options.overrideRoot, relative);
}

/** "acme/psu" -> <packagedRoot>/acme/psu.json */
export function resolveProfileKey(key: string, packagedRoot: string): string {
  const file = key.endsWith('.json') ? key : `${key}.json`;
  return path.join(packagedRoot, ...file.split('/'));
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Load a profile and merge the user's override on top of it, when one exists.
 */
export async function loadProfileWithOverride(
  profilePath: string,
  options: OverrideOptions
): Promise<Result<Profile, ProfileError>> {
  const base = await readProfileDocument(profilePath);
  if (!base.ok) return base;

  const overridePath = resolveOverridePath(profilePath, options);
  if (!overridePath || !(await fileExists(overridePath))) {
    return parseProfile(base.value, profilePath);
  }

  const override = await readProfileDocument(overridePath);
  if (!override.ok) return override;

  console.log(`[Profile] Merged user override ${overridePath} into ${profilePath}`);
  return parseProfile(mergeProfiles(base.value, override.value), profilePath);
}
