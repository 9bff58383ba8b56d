import { TYPE_MEMBER, WELL_KNOWN_EMPTY_KEY_TYPES } from '@statemap/core';
import { describe, expect, it } from 'vitest';
import { CUSTOM_STATE, generateRoomState, memberId, seededRandom } from '../generators.js';

describe('generateRoomState', () => {
  it('produces well-known, member and custom entries', () => {
    const entries = generateRoomState(3);

    expect(entries).toHaveLength(WELL_KNOWN_EMPTY_KEY_TYPES.length + 3 + CUSTOM_STATE.length);
    expect(entries.filter(([t]) => t === TYPE_MEMBER).map(([, k]) => k)).toEqual([
      '@user0:example.org',
      '@user1:example.org',
      '@user2:example.org',
    ]);
    expect(entries.slice(-2).map(([t, k]) => [t, k])).toEqual([
      ['fooooo', ''],
      ['bar', 'example'],
    ]);
    for (const [, , eventId] of entries) {
      expect(eventId).toMatch(/^\$[0-9a-z]+$/);
    }
  });

  it('is deterministic per seed', () => {
    expect(generateRoomState(10, 1)).toEqual(generateRoomState(10, 1));
    expect(generateRoomState(10, 1)).not.toEqual(generateRoomState(10, 2));
  });

  it('formats member IDs', () => {
    expect(memberId(42)).toBe('@user42:example.org');
  });
});

describe('seededRandom', () => {
  it('yields values in [0, 1)', () => {
    const rng = seededRandom(99);
    for (let i = 0; i < 100; i++) {
      const v = rng();
      expect(v).toBeGreaterThanOrEqual(0);
      expect(v).toBeLessThan(1);
    }
  });
});
