// ============================================================================
// Room State Generators — Deterministic, Seeded
// ============================================================================

import { TYPE_MEMBER, WELL_KNOWN_EMPTY_KEY_TYPES, type StateEntry } from '@statemap/core';

// --- Seeded PRNG (Mulberry32) ---
export function seededRandom(seed: number): () => number {
  let s = seed | 0;
  return () => {
    s = (s + 0x6d2b79f5) | 0;
    let t = Math.imul(s ^ (s >>> 15), 1 | s);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export const DEFAULT_SEED = 42;

/** Custom (non-Matrix) state carried by every generated room. */
export const CUSTOM_STATE: readonly (readonly [string, string])[] = [
  ['fooooo', ''],
  ['bar', 'example'],
];

/** User ID of the `i`th generated member. */
export function memberId(i: number): string {
  return `@user${i}:example.org`;
}

function eventId(rng: () => number): string {
  return `$${Math.floor(rng() * 2 ** 48).toString(36)}`;
}

/**
 * A room's current state: one event per well-known empty-key type, one
 * membership per member, plus {@link CUSTOM_STATE}. Values are event IDs.
 */
export function generateRoomState(members: number, seed = DEFAULT_SEED): StateEntry<string>[] {
  const rng = seededRandom(seed);
  const entries: StateEntry<string>[] = [];

  for (const type of WELL_KNOWN_EMPTY_KEY_TYPES) {
    entries.push([type, '', eventId(rng)]);
  }
  for (let i = 0; i < members; i++) {
    entries.push([TYPE_MEMBER, memberId(i), eventId(rng)]);
  }
  for (const [type, stateKey] of CUSTOM_STATE) {
    entries.push([type, stateKey, eventId(rng)]);
  }
  return entries;
}
