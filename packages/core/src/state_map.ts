// ============================================================================
// @statemap/core — StateMap
// ============================================================================
//
// Container for Matrix room state: (event type, state key) → value.
//
// Both key strings are interned, so the map itself only holds integer
// handles. Entries are grouped by event-type handle, which makes reading
// every entry of one type (e.g. all m.room.member events) a single group
// walk instead of a full scan.
//
// Storage:
//   groups: Map<typeHandle, Map<stateKeyHandle, V>>
//   count:  total entries across all groups
// ============================================================================

import { TYPE_JOIN_RULES, TYPE_MEMBER } from './event_types.js';
import type { InternedString, Interner } from './interner.js';
import { getSharedInterner } from './shared.js';

/**
 * Values a StateMap can hold. `undefined` is reserved as the absence marker
 * returned by lookups, so it cannot be stored.
 */
export type StateValue = NonNullable<unknown>;

/** Interned form of an (event type, state key) pair. */
export interface StateKey {
  readonly type: InternedString;
  readonly stateKey: InternedString;
}

/** Item yielded when iterating a StateMap. */
export type StateEntry<V> = readonly [eventType: string, stateKey: string, value: V];

/** Value comparison used by {@link StateMap.addOrRemove} and {@link StateMap.equals}. */
export type ValueEquals<V> = (a: V, b: V) => boolean;

export interface StateMapOptions {
  /**
   * Interner for key strings. Maps that should share string storage must
   * share an interner. Defaults to the process-wide shared interner.
   */
  interner?: Interner;
}

/** Two StateKeys are equal iff both handles are equal. */
export function sameStateKey(a: StateKey, b: StateKey): boolean {
  return a.type === b.type && a.stateKey === b.stateKey;
}

/**
 * Map from (event type, state key) to a caller-defined value.
 *
 * Not safe for concurrent mutation. Mutating the map while iterating it is
 * undefined.
 *
 * @example
 * ```ts
 * const state = new StateMap<string>();
 * state.insert('m.room.member', '@alice:example.org', '$join');
 * state.get('m.room.member', '@alice:example.org'); // → '$join'
 * state.get('m.room.member', '@bob:example.org');   // → undefined
 * ```
 */
export class StateMap<V extends StateValue> implements Iterable<StateEntry<V>> {
  private groups = new Map<InternedString, Map<InternedString, V>>();
  private count = 0;
  readonly interner: Interner;

  constructor(options: StateMapOptions = {}) {
    this.interner = options.interner ?? getSharedInterner();
  }

  /** Build a map from an iterable of entries. Later duplicates win. */
  static from<V extends StateValue>(
    entries: Iterable<StateEntry<V>>,
    options?: StateMapOptions,
  ): StateMap<V> {
    const map = new StateMap<V>(options);
    map.extend(entries);
    return map;
  }

  /** Number of entries. */
  get size(): number {
    return this.count;
  }

  isEmpty(): boolean {
    return this.count === 0;
  }

  // ---- Point access ----

  /**
   * Insert or overwrite the value for `(eventType, stateKey)`.
   * Interns both strings, so this may grow the interner.
   */
  insert(eventType: string, stateKey: string, value: V): void {
    const type = this.interner.intern(eventType);
    const key = this.interner.intern(stateKey);
    const group = this.groupFor(type);
    if (!group.has(key)) this.count++;
    group.set(key, value);
  }

  /**
   * Look up a value. Never interns: a string the interner has not seen
   * means the pair cannot be present.
   */
  get(eventType: string, stateKey: string): V | undefined {
    const group = this.existingGroup(eventType);
    if (!group) return undefined;
    const key = this.interner.lookup(stateKey);
    if (key === undefined) return undefined;
    return group.get(key);
  }

  has(eventType: string, stateKey: string): boolean {
    return this.get(eventType, stateKey) !== undefined;
  }

  /**
   * Remove an entry, returning its value. The interner is left untouched
   * since other entries or maps may still hold the handles.
   */
  remove(eventType: string, stateKey: string): V | undefined {
    const type = this.interner.lookup(eventType);
    if (type === undefined) return undefined;
    const key = this.interner.lookup(stateKey);
    if (key === undefined) return undefined;
    return this.removeHandles(type, key);
  }

  /**
   * Interned key for a pair, or undefined if either string was never
   * interned. The pair need not be present in this map.
   */
  keyOf(eventType: string, stateKey: string): StateKey | undefined {
    const type = this.interner.lookup(eventType);
    if (type === undefined) return undefined;
    const key = this.interner.lookup(stateKey);
    if (key === undefined) return undefined;
    return { type, stateKey: key };
  }

  /** Look up by interned key. The key must come from this map's interner. */
  getByKey(key: StateKey): V | undefined {
    return this.groups.get(key.type)?.get(key.stateKey);
  }

  /**
   * Return the existing value, or insert and return `create()`.
   */
  getOrInsertWith(eventType: string, stateKey: string, create: () => V): V {
    const type = this.interner.intern(eventType);
    const key = this.interner.intern(stateKey);
    const existing = this.groups.get(type)?.get(key);
    if (existing !== undefined) return existing;

    // create() may throw or write to this map; touch storage only afterwards.
    const value = create();
    const group = this.groupFor(type);
    if (!group.has(key)) this.count++;
    group.set(key, value);
    return value;
  }

  /**
   * Insert `value` if the key is absent or already holds an equal value,
   * returning undefined. If a different value is present, the entry is
   * removed and the old value returned instead.
   *
   * Used to detect conflicting state when merging state sets.
   */
  addOrRemove(
    eventType: string,
    stateKey: string,
    value: V,
    equals: ValueEquals<V> = Object.is,
  ): V | undefined {
    const type = this.interner.intern(eventType);
    const key = this.interner.intern(stateKey);
    const group = this.groupFor(type);
    const existing = group.get(key);

    if (existing === undefined) {
      group.set(key, value);
      this.count++;
      return undefined;
    }
    if (equals(existing, value)) return undefined;

    return this.removeHandles(type, key);
  }

  /** Insert every entry. Later duplicates win. */
  extend(entries: Iterable<StateEntry<V>>): void {
    for (const [eventType, stateKey, value] of entries) {
      this.insert(eventType, stateKey, value);
    }
  }

  /** Remove every entry. The interner keeps its strings. */
  clear(): void {
    this.groups.clear();
    this.count = 0;
  }

  // ---- Iteration ----

  /** Every entry, in no particular order. */
  *entries(): IterableIterator<StateEntry<V>> {
    for (const [type, group] of this.groups) {
      const eventType = this.interner.resolve(type);
      for (const [key, value] of group) {
        yield [eventType, this.interner.resolve(key), value];
      }
    }
  }

  [Symbol.iterator](): IterableIterator<StateEntry<V>> {
    return this.entries();
  }

  *keys(): IterableIterator<readonly [eventType: string, stateKey: string]> {
    for (const [type, group] of this.groups) {
      const eventType = this.interner.resolve(type);
      for (const key of group.keys()) {
        yield [eventType, this.interner.resolve(key)];
      }
    }
  }

  *values(): IterableIterator<V> {
    for (const group of this.groups.values()) {
      yield* group.values();
    }
  }

  /** Distinct event types with at least one entry. */
  *eventTypes(): IterableIterator<string> {
    for (const type of this.groups.keys()) {
      yield this.interner.resolve(type);
    }
  }

  /** `[stateKey, value]` for every entry of one event type. */
  *iterEventType(eventType: string): IterableIterator<readonly [stateKey: string, value: V]> {
    const group = this.existingGroup(eventType);
    if (!group) return;
    for (const [key, value] of group) {
      yield [this.interner.resolve(key), value];
    }
  }

  /** `[userId, value]` for every m.room.member entry. */
  iterMembers(): IterableIterator<readonly [stateKey: string, value: V]> {
    return this.iterEventType(TYPE_MEMBER);
  }

  /** `[stateKey, value]` for every m.room.join_rules entry. */
  iterJoinRules(): IterableIterator<readonly [stateKey: string, value: V]> {
    return this.iterEventType(TYPE_JOIN_RULES);
  }

  /** Every entry whose type is not m.room.member. */
  *iterNonMembers(): IterableIterator<StateEntry<V>> {
    const memberType = this.interner.lookup(TYPE_MEMBER);
    for (const [type, group] of this.groups) {
      if (type === memberType) continue;
      const eventType = this.interner.resolve(type);
      for (const [key, value] of group) {
        yield [eventType, this.interner.resolve(key), value];
      }
    }
  }

  // ---- Whole-map operations ----

  /** Shallow copy bound to the same interner. */
  clone(): StateMap<V> {
    const copy = new StateMap<V>({ interner: this.interner });
    for (const [type, group] of this.groups) {
      copy.groups.set(type, new Map(group));
    }
    copy.count = this.count;
    return copy;
  }

  /**
   * Whether both maps hold the same keys with equal values. Compares handles
   * when the maps share an interner, strings otherwise.
   */
  equals(other: StateMap<V>, equals: ValueEquals<V> = Object.is): boolean {
    if (this.count !== other.count) return false;

    if (this.interner === other.interner) {
      for (const [type, group] of this.groups) {
        const otherGroup = other.groups.get(type);
        if (!otherGroup || otherGroup.size !== group.size) return false;
        for (const [key, value] of group) {
          const otherValue = otherGroup.get(key);
          if (otherValue === undefined || !equals(value, otherValue)) return false;
        }
      }
      return true;
    }

    for (const [eventType, stateKey, value] of this.entries()) {
      const otherValue = other.get(eventType, stateKey);
      if (otherValue === undefined || !equals(value, otherValue)) return false;
    }
    return true;
  }

  // ---- Internals ----

  private existingGroup(eventType: string): Map<InternedString, V> | undefined {
    const type = this.interner.lookup(eventType);
    return type === undefined ? undefined : this.groups.get(type);
  }

  private groupFor(type: InternedString): Map<InternedString, V> {
    let group = this.groups.get(type);
    if (!group) {
      group = new Map();
      this.groups.set(type, group);
    }
    return group;
  }

  private removeHandles(type: InternedString, key: InternedString): V | undefined {
    const group = this.groups.get(type);
    if (!group) return undefined;
    const value = group.get(key);
    if (value === undefined) return undefined;

    group.delete(key);
    this.count--;
    if (group.size === 0) this.groups.delete(type);
    return value;
  }
}
