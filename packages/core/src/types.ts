// ============================================================================
// @sufftree/core — Shared Types
// ============================================================================

/** Index of an inner node in the arena. */
export type NodeIndex = number;

/** Absolute offset into the payload. */
export type Offset = number;

/**
 * Packed child/suffix reference. See `reference.ts` for the bit layout.
 */
export type RefCode = number;

/**
 * Decoded child/suffix reference.
 *
 * A leaf is implicit: its label runs from `offset` to the current end of the
 * payload and it owns no arena slot.
 */
export type NodeRef =
  | { kind: 'none' }
  | { kind: 'leaf'; offset: Offset }
  | { kind: 'inner'; index: NodeIndex };

/**
 * Active point: `payload[pos .. newEnd)` is the part still to be matched by
 * following edges out of `node`.
 */
export interface Cursor {
  node: NodeIndex;
  pos: Offset;
}

/** Child table implementation used by every inner node of a tree. */
export type ChildStrategy = 'dense' | 'sparse';

export interface BuildOptions {
  /** Child table strategy. Default 'dense'. */
  children?: ChildStrategy;
  /**
   * Copy the payload once before building. When false the tree borrows the
   * caller's buffer, which must then stay unmodified. Default true.
   */
  copyPayload?: boolean;
  /** Run `verifyTree` on the finished tree. Default false. */
  verify?: boolean;
}

/** Read-only snapshot of one inner node. */
export interface NodeView {
  index: NodeIndex;
  begin: Offset;
  end: Offset;
  suffix: NodeRef;
  children: Array<[number, NodeRef]>;
}

export interface TreeStats {
  bytes: number;
  nodes: number;
  inner: number;
  leaves: number;
}
