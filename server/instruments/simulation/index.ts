/**
 * Simulation Module
 * Profile-driven stand-in for a real instrument
 *
 * Usage:
 *   const sim = await createSimBackend({ profilePath: resolveProfileKey('acme/psu', PACKAGED_PROFILE_DIR) });
 *   if (!sim.ok) throw sim.error;
 *   await sim.value.write(':VOLT 5.0');
 *   await sim.value.query(':VOLT?');   // Ok("5.0")
 */

export { createSimBackend, type SimBackend, type SimBackendOptions } from './sim-backend.js';
export {
  loadProfile,
  loadProfileWithOverride,
  mergeProfiles,
  parseProfile,
  readProfileDocument,
  resolveOverridePath,
  resolveProfileKey,
  type ActionMapSpec,
  type ErrorSpec,
  type OverrideOptions,
  type Profile,
  type ResponseEntrySpec,
  type SimulationSpec,
} from './profile.js';
export {
  buildDispatchTable,
  isPatternKey,
  matchCommand,
  substituteCaptures,
  type DispatchTable,
  type ResponseEntry,
} from './dispatch.js';
export { compileExpression, evaluateExpression, type EvalScope, type ExprValue } from './expression.js';
export { createStateStore, type StateStore } from './state-store.js';
export { createErrorQueue, type ErrorQueue } from './error-queue.js';
