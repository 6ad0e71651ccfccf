/**
 * Session Files
 *
 * A session file holds one recorded conversation per instrument alias:
 *
 *   {
 *     "psu": {
 *       "profile": "acme/psu",
 *       "log": [
 *         { "kind": "write", "command": ":VOLT 5.0", "timestamp": 0.01 },
 *         { "kind": "query", "command": ":VOLT?", "response": "5.0", "timestamp": 0.02 }
 *       ]
 *     }
 *   }
 *
 * Writes are atomic (temp file then rename) and merge into whatever aliases
 * the file already holds.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';
import type { Result, SessionFile, SessionLogEntry, SessionRecord } from '../../../shared/types.js';
import { Ok, Err, tryResult } from '../../../shared/types.js';
import { SessionFileError } from '../errors.js';

// Older logs call the entry kind "type"
function renameLegacyKind(value: unknown): unknown {
  if (typeof value === 'object' && value !== null && !('kind' in value) && 'type' in value) {
    const { type, ...rest } = value;
    return { ...rest, kind: type };
  }
  return value;
}

const SessionLogEntrySchema = z.preprocess(
  renameLegacyKind,
  z.object({
    kind: z.enum(['write', 'query', 'query_raw']),
    command: z.string(),
    response: z.string().optional(),
    timestamp: z.number().nonnegative().default(0),
  })
);

const SessionRecordSchema = z.object({
  profile: z.string(),
  log: z.array(SessionLogEntrySchema),
});

const SessionFileSchema = z.record(SessionRecordSchema);

function isMissing(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

async function atomicWrite(filePath: string, data: string): Promise<void> {
  const tempPath = `${filePath}.tmp.${Date.now()}`;
  await fs.writeFile(tempPath, data, 'utf-8');
  await fs.rename(tempPath, filePath);
}

export async function loadSessionFile(filePath: string): Promise<Result<SessionFile, SessionFileError>> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (err) {
    const message = isMissing(err) ? 'Session file does not exist' : 'Session file could not be read';
    return Err(new SessionFileError(filePath, message, { cause: err }));
  }

  const data = tryResult((): unknown => JSON.parse(content));
  if (!data.ok) {
    return Err(new SessionFileError(filePath, 'Invalid JSON in session file', { cause: data.error }));
  }

  const parsed = SessionFileSchema.safeParse(data.value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return Err(new SessionFileError(filePath, `Invalid session file: ${issue.path.join('.')}: ${issue.message}`));
  }
  return Ok(parsed.data);
}

/**
 * Load the record for one alias.
 */
export async function loadSessionRecord(
  filePath: string,
  alias: string
): Promise<Result<SessionRecord, SessionFileError>> {
  const file = await loadSessionFile(filePath);
  if (!file.ok) return file;

  if (!Object.prototype.hasOwnProperty.call(file.value, alias)) {
    const known = Object.keys(file.value).join(', ') || 'none';
    return Err(new SessionFileError(filePath, `No session recorded for '${alias}' (available: ${known})`));
  }
  return Ok(file.value[alias]);
}

/**
 * Store `log` under `alias`, keeping every other alias already in the file.
 */
export async function saveSessionFile(
  filePath: string,
  alias: string,
  profileKey: string,
  log: SessionLogEntry[]
): Promise<Result<void, SessionFileError>> {
  let existing: SessionFile = {};
  try {
    await fs.access(filePath);
    const loaded = await loadSessionFile(filePath);
    if (!loaded.ok) return loaded;
    existing = loaded.value;
  } catch (err) {
    if (!isMissing(err)) {
      return Err(new SessionFileError(filePath, 'Session file could not be read', { cause: err }));
    }
  }

  const data: SessionFile = { ...existing, [alias]: { profile: profileKey, log } };

  try {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await atomicWrite(filePath, JSON.stringify(data, null, 2));
  } catch (err) {
    return Err(new SessionFileError(filePath, 'Session file could not be written', { cause: err }));
  }

  console.log(`[SessionLog] Saved ${log.length} entries for '${alias}' to ${filePath}`);
  return Ok(undefined);
}
