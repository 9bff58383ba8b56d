// ============================================================================
// @statemap/core — Public API
// ============================================================================

// Core classes
export { Interner, MAX_HANDLES } from './interner.js';
export type { InternedString, InternerOptions, InternerStats } from './interner.js';
export { StateMap, sameStateKey } from './state_map.js';
export type {
  StateEntry,
  StateKey,
  StateMapOptions,
  StateValue,
  ValueEquals,
} from './state_map.js';
export { getSharedInterner } from './shared.js';

// Well-known event types
export * from './event_types.js';

// Snapshots
export { serializeStateMap, restoreStateMap, SNAPSHOT_VERSION } from './snapshot.js';
export type { StateSnapshot } from './snapshot.js';

// Errors
export {
  StateMapError,
  InternerExhaustedError,
  InvalidHandleError,
  SnapshotValidationError,
} from './errors.js';

// Logging
export {
  debug,
  info,
  warn,
  error,
  onLog,
  setLogLevel,
  getLogLevel,
  isDebugEnabled,
  timer,
  Timer,
} from './logger.js';
export type { LogLevel, LogEntry, LogCallback } from './logger.js';
