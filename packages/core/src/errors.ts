// ============================================================================
// @statemap/core — Error Types
// ============================================================================

/**
 * Base error class for all StateMap errors.
 */
export class StateMapError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'StateMapError';
  }
}

// ---------------------------------------------------------------------------
// Interner Errors
// ---------------------------------------------------------------------------

/**
 * Thrown when an interner cannot hand out another handle.
 * Not recoverable: discard the interner and every map bound to it.
 */
export class InternerExhaustedError extends StateMapError {
  public readonly capacity: number;

  constructor(capacity: number) {
    super(`Interner capacity of ${capacity} distinct strings exhausted.`);
    this.name = 'InternerExhaustedError';
    this.capacity = capacity;
  }
}

/**
 * Thrown when resolving a handle the interner never produced, typically one
 * taken from a different interner instance.
 */
export class InvalidHandleError extends StateMapError {
  public readonly handle: number;
  public readonly size: number;

  constructor(handle: number, size: number) {
    super(`Invalid interned string handle ${handle} (interner holds ${size} strings).`);
    this.name = 'InvalidHandleError';
    this.handle = handle;
    this.size = size;
  }
}

// ---------------------------------------------------------------------------
// Snapshot Errors
// ---------------------------------------------------------------------------

/**
 * Thrown when a state snapshot fails validation on restore.
 */
export class SnapshotValidationError extends StateMapError {
  public readonly path: string;
  public readonly reason: string;

  constructor(path: string, reason: string) {
    super(`Invalid state snapshot at ${path}: ${reason}`);
    this.name = 'SnapshotValidationError';
    this.path = path;
    this.reason = reason;
  }
}
