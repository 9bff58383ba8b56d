import fc from 'fast-check';
import { describe, expect, it } from 'vitest';
import { Interner } from '../interner.js';
import { StateMap } from '../state_map.js';

// ============================================================================
// StateMap Property-Based Tests
// ============================================================================
//
// Random mutation sequences are replayed against both a StateMap and a
// plain Map keyed by the JSON-encoded pair. Small alphabets keep collisions
// (overwrites, removals of present keys) frequent.
//
// ============================================================================

const eventType = fc.oneof(
  fc.constantFrom('m.room.member', 'm.room.power_levels', 'm.room.create', 'org.example.custom'),
  fc.string({ maxLength: 8 }),
);

const stateKey = fc.oneof(
  fc.constantFrom('', '@alice:example.org', '@bob:example.org', 'example.org'),
  fc.string({ maxLength: 8 }),
);

type Op =
  | { kind: 'insert' | 'getOrInsert' | 'addOrRemove'; type: string; key: string; value: number }
  | { kind: 'remove'; type: string; key: string };

const op: fc.Arbitrary<Op> = fc.oneof(
  fc.record({
    kind: fc.constantFrom('insert' as const, 'getOrInsert' as const, 'addOrRemove' as const),
    type: eventType,
    key: stateKey,
    value: fc.integer({ min: 0, max: 3 }),
  }),
  fc.record({ kind: fc.constant('remove' as const), type: eventType, key: stateKey }),
);

const pairKey = (type: string, key: string) => JSON.stringify([type, key]);

function replay(ops: Op[]) {
  const state = new StateMap<number>({ interner: new Interner() });
  const model = new Map<string, [string, string, number]>();

  for (const o of ops) {
    const k = pairKey(o.type, o.key);
    const current = model.get(k);
    switch (o.kind) {
      case 'insert':
        state.insert(o.type, o.key, o.value);
        model.set(k, [o.type, o.key, o.value]);
        break;
      case 'getOrInsert':
        expect(state.getOrInsertWith(o.type, o.key, () => o.value)).toBe(
          current ? current[2] : o.value,
        );
        if (!current) model.set(k, [o.type, o.key, o.value]);
        break;
      case 'addOrRemove':
        if (!current) {
          expect(state.addOrRemove(o.type, o.key, o.value)).toBeUndefined();
          model.set(k, [o.type, o.key, o.value]);
        } else if (current[2] === o.value) {
          expect(state.addOrRemove(o.type, o.key, o.value)).toBeUndefined();
        } else {
          expect(state.addOrRemove(o.type, o.key, o.value)).toBe(current[2]);
          model.delete(k);
        }
        break;
      case 'remove': {
        const sizeBefore = state.size;
        expect(state.remove(o.type, o.key)).toBe(current?.[2]);
        expect(state.size).toBe(current ? sizeBefore - 1 : sizeBefore);
        model.delete(k);
        break;
      }
    }
    expect(state.size).toBe([...state].length);
  }
  return { state, model };
}

describe('Property: StateMap matches a reference map', () => {
  it('size equals the number of distinct present pairs', () => {
    fc.assert(
      fc.property(fc.array(op, { maxLength: 100 }), (ops) => {
        const { state, model } = replay(ops);
        expect(state.size).toBe(model.size);
        expect(state.isEmpty()).toBe(model.size === 0);
        expect([...state.eventTypes()].every((t) => !state.iterEventType(t).next().done)).toBe(
          true,
        );
      }),
      { numRuns: 200 },
    );
  });

  it('get returns the last inserted value of every present pair', () => {
    fc.assert(
      fc.property(fc.array(op, { maxLength: 100 }), (ops) => {
        const { state, model } = replay(ops);
        for (const [type, key, value] of model.values()) {
          expect(state.get(type, key)).toBe(value);
        }
      }),
      { numRuns: 200 },
    );
  });

  it('iteration yields exactly the present entries', () => {
    fc.assert(
      fc.property(fc.array(op, { maxLength: 100 }), (ops) => {
        const { state, model } = replay(ops);
        const seen = new Map<string, number>();
        for (const [type, key, value] of state) {
          const k = pairKey(type, key);
          expect(seen.has(k)).toBe(false);
          seen.set(k, value);
        }
        expect(seen).toEqual(new Map([...model].map(([k, [, , v]]) => [k, v])));
      }),
      { numRuns: 200 },
    );
  });

  it('iterEventType agrees with a filtered full scan', () => {
    fc.assert(
      fc.property(fc.array(op, { maxLength: 60 }), eventType, (ops, type) => {
        const { state } = replay(ops);
        const grouped = [...state.iterEventType(type)].map(([k, v]) => `${k}=${v}`).sort();
        const scanned = [...state]
          .filter(([t]) => t === type)
          .map(([, k, v]) => `${k}=${v}`)
          .sort();
        expect(grouped).toEqual(scanned);
      }),
      { numRuns: 200 },
    );
  });

  it('lookups and removals never grow the interner', () => {
    fc.assert(
      fc.property(fc.array(op, { maxLength: 40 }), eventType, stateKey, (ops, type, key) => {
        const { state } = replay(ops);
        const before = state.interner.size;
        state.get(type, key);
        state.has(type, key);
        state.remove(type, key);
        [...state.iterEventType(type)];
        expect(state.interner.size).toBe(before);
      }),
      { numRuns: 200 },
    );
  });
});
