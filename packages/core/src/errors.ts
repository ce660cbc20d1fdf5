// ============================================================================
// @sufftree/core — Error Types
// ============================================================================

/**
 * Base error class for all sufftree errors.
 */
export class SuffixTreeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SuffixTreeError';
  }
}

// ---------------------------------------------------------------------------
// Capacity Errors
// ---------------------------------------------------------------------------

/**
 * Thrown when a payload length, node count or offset exceeds what the
 * compact reference encoding can address. Raised before anything is written.
 */
export class CapacityError extends SuffixTreeError {
  public readonly limit: number;
  public readonly value: number;

  constructor(message: string, limit: number, value: number) {
    super(message);
    this.name = 'CapacityError';
    this.limit = limit;
    this.value = value;
  }
}

/**
 * Thrown when a single value handed to the reference encoding is not an
 * integer in its representable range.
 */
export class EncodingRangeError extends CapacityError {
  public readonly what: string;

  constructor(what: string, value: number, limit: number) {
    super(`${what} ${value} is outside the encodable range 0..${limit}`, limit, value);
    this.name = 'EncodingRangeError';
    this.what = what;
  }
}

// ---------------------------------------------------------------------------
// Consistency Errors
// ---------------------------------------------------------------------------

/**
 * Thrown when an internal invariant of the tree does not hold: a missing
 * child, a suffix link that is not an inner node, an index past the arena.
 * Indicates a defect; the build that raised it must be discarded.
 */
export class InvariantViolationError extends SuffixTreeError {
  constructor(message: string) {
    super(`Invariant violated: ${message}`);
    this.name = 'InvariantViolationError';
  }
}
