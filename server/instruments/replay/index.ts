/**
 * Replay Module
 * Record a session against any backend, then serve it back verbatim
 */

export {
  createReplayBackend,
  createReplayBackendFromSession,
  type ReplayBackend,
  type ReplayBackendOptions,
} from './replay-backend.js';
export { createRecordingBackend, type RecordingBackend, type RecordingBackendOptions } from './recording-backend.js';
export { loadSessionFile, loadSessionRecord, saveSessionFile } from './session-log.js';
