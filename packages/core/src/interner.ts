// ============================================================================
// @statemap/core — String Interner
// ============================================================================
//
// Append-only string table. Every distinct string is stored once and
// addressed by a sequential integer handle, so repeated event types and
// state keys cost one table slot no matter how many entries carry them.
//
// Handles are never reused: the reverse table only grows, which keeps any
// handle that was valid once valid for the lifetime of the interner.
// ============================================================================

import { InternerExhaustedError, InvalidHandleError } from './errors.js';
import { logInternerGrowth } from './logger.js';

/** Handle for a string stored in an {@link Interner}. */
export type InternedString = number;

/** Largest number of distinct strings an interner can hold. */
export const MAX_HANDLES = 0xffff_ffff;

/** Growth below this size is not logged. */
const GROWTH_LOG_THRESHOLD = 1024;

export interface InternerOptions {
  /** Maximum number of distinct strings (default {@link MAX_HANDLES}). */
  capacity?: number;
  /** Strings to intern up front, in handle order. */
  seed?: Iterable<string>;
}

/** Counters describing interner usage. */
export interface InternerStats {
  /** Number of distinct strings stored */
  size: number;
  /** Maximum number of distinct strings */
  capacity: number;
  /** Total intern() calls */
  internCalls: number;
  /** intern() calls that found an existing handle */
  hits: number;
  /** lookup() calls for strings never interned */
  lookupMisses: number;
}

/**
 * Deduplicating string store handing out integer handles.
 *
 * @example
 * ```ts
 * const interner = new Interner();
 * const a = interner.intern('m.room.member'); // → 0
 * const b = interner.intern('@alice:example.org'); // → 1
 * interner.intern('m.room.member'); // → 0 (reused)
 * interner.resolve(b); // → '@alice:example.org'
 * ```
 */
export class Interner {
  private strToHandle = new Map<string, InternedString>();
  private handleToStr: string[] = [];
  private readonly capacity: number;
  private internCalls = 0;
  private hits = 0;
  private lookupMisses = 0;

  constructor(options: InternerOptions = {}) {
    const capacity = options.capacity ?? MAX_HANDLES;
    if (!Number.isInteger(capacity) || capacity < 0 || capacity > MAX_HANDLES) {
      throw new RangeError(`Interner capacity must be an integer in [0, ${MAX_HANDLES}]`);
    }
    this.capacity = capacity;

    if (options.seed) {
      for (const s of options.seed) this.intern(s);
    }
  }

  /**
   * Return the handle for `str`, storing it first if it has not been seen.
   * @throws {InternerExhaustedError} When a new string would exceed capacity
   */
  intern(str: string): InternedString {
    this.internCalls++;
    const existing = this.strToHandle.get(str);
    if (existing !== undefined) {
      this.hits++;
      return existing;
    }

    const handle = this.handleToStr.length;
    if (handle >= this.capacity) {
      throw new InternerExhaustedError(this.capacity);
    }
    this.handleToStr.push(str);
    this.strToHandle.set(str, handle);

    const size = handle + 1;
    if (size >= GROWTH_LOG_THRESHOLD && (size & (size - 1)) === 0) {
      logInternerGrowth(size, this.capacity);
    }
    return handle;
  }

  /**
   * Find the handle for `str` without storing it.
   * Returns undefined if the string has never been interned.
   */
  lookup(str: string): InternedString | undefined {
    const handle = this.strToHandle.get(str);
    if (handle === undefined) this.lookupMisses++;
    return handle;
  }

  /**
   * Resolve a handle back to its string.
   * @throws {InvalidHandleError} If this interner did not produce the handle
   */
  resolve(handle: InternedString): string {
    const str = this.handleToStr[handle];
    if (str === undefined) {
      throw new InvalidHandleError(handle, this.handleToStr.length);
    }
    return str;
  }

  /** Whether `handle` was produced by this interner. */
  has(handle: InternedString): boolean {
    return Number.isInteger(handle) && handle >= 0 && handle < this.handleToStr.length;
  }

  /** Number of distinct strings stored. */
  get size(): number {
    return this.handleToStr.length;
  }

  /** Iterate stored strings in handle order. */
  strings(): IterableIterator<string> {
    return this.handleToStr.values();
  }

  getStats(): InternerStats {
    return {
      size: this.handleToStr.length,
      capacity: this.capacity,
      internCalls: this.internCalls,
      hits: this.hits,
      lookupMisses: this.lookupMisses,
    };
  }
}
