// ============================================================================
// @statemap/core — State Snapshots
// ============================================================================
//
// Plain-data form of a StateMap for handing state to an external
// serializer and restoring it afterwards. Handles never appear in a
// snapshot: they are only meaningful inside the interner that made them.
//
//   { "version": 1, "entries": [["m.room.create", "", "$abc"], ...] }
// ============================================================================

import { z } from 'zod';
import { SnapshotValidationError } from './errors.js';
import { logRestore } from './logger.js';
import { StateMap, type StateEntry, type StateMapOptions, type StateValue } from './state_map.js';

/** Current snapshot format version. */
export const SNAPSHOT_VERSION = 1;

/** Serializable form of a StateMap. */
export interface StateSnapshot<V> {
  version: typeof SNAPSHOT_VERSION;
  entries: StateEntry<V>[];
}

/**
 * Capture every entry of `map` as plain data.
 */
export function serializeStateMap<V extends StateValue>(map: StateMap<V>): StateSnapshot<V> {
  return {
    version: SNAPSHOT_VERSION,
    entries: Array.from(map.entries()),
  };
}

const envelopeSchema = z.object({
  version: z.literal(SNAPSHOT_VERSION),
  entries: z.array(z.tuple([z.string(), z.string(), z.unknown()])),
});

function issuePath(issue: z.ZodIssue | undefined, prefix: (string | number)[] = []): string {
  return ['$', ...prefix, ...(issue?.path ?? [])].join('.');
}

/**
 * Validate `input` as a snapshot and rebuild a StateMap from it.
 * Duplicate keys resolve last-wins.
 *
 * @param input - Parsed JSON (or any untrusted value)
 * @param valueSchema - Schema for entry values
 * @throws {SnapshotValidationError} If `input` is not a valid snapshot
 */
export function restoreStateMap<V extends StateValue>(
  input: unknown,
  valueSchema: z.ZodType<V, z.ZodTypeDef, unknown>,
  options?: StateMapOptions,
): StateMap<V> {
  const start = performance.now();
  const envelope = envelopeSchema.safeParse(input);
  if (!envelope.success) {
    const issue = envelope.error.issues[0];
    throw new SnapshotValidationError(issuePath(issue), issue?.message ?? 'invalid snapshot');
  }

  const map = new StateMap<V>(options);
  const { entries } = envelope.data;
  for (let i = 0; i < entries.length; i++) {
    const [eventType, stateKey, raw] = entries[i];
    const value = valueSchema.safeParse(raw);
    if (!value.success) {
      const issue = value.error.issues[0];
      throw new SnapshotValidationError(
        issuePath(issue, ['entries', i, 2]),
        issue?.message ?? 'invalid value',
      );
    }
    map.insert(eventType, stateKey, value.data);
  }
  logRestore(entries.length, performance.now() - start);
  return map;
}
