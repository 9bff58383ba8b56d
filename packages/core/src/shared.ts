// ============================================================================
// @statemap/core — Shared Interner
// ============================================================================

import { WELL_KNOWN_TYPES } from './event_types.js';
import { Interner } from './interner.js';

let shared: Interner | undefined;

/**
 * The process-wide interner used by every StateMap created without an
 * explicit one. Seeded with the well-known event types.
 */
export function getSharedInterner(): Interner {
  if (!shared) {
    shared = new Interner({ seed: WELL_KNOWN_TYPES });
  }
  return shared;
}
