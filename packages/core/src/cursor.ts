// ============================================================================
// @sufftree/core — Active Point
// ============================================================================

import { type NodeArena, TOP } from './arena.js';
import { InvariantViolationError } from './errors.js';
import { isInner, refValue } from './reference.js';
import type { Cursor, Offset } from './types.js';

/**
 * What the construction routines operate on: the payload being indexed and
 * the arena being grown.
 */
export interface TreeState {
  readonly payload: Uint8Array;
  readonly arena: NodeArena;
}

/**
 * Walk the cursor down while the unmatched span `payload[pos .. newEnd)`
 * covers a whole inner edge.
 *
 * Stops at a leaf or missing child, or at an inner edge longer than the
 * remaining span. Only edge lengths are compared, never labels: the span is
 * known to be present in the tree. `pos` only moves forward, which bounds
 * the total work over a build by the payload length.
 */
export function canonicalize(state: TreeState, cursor: Cursor, newEnd: Offset): Cursor {
  const { payload, arena } = state;
  let { node, pos } = cursor;

  while (pos < newEnd) {
    const code = arena.get(node).children.get(payload[pos]);
    if (!isInner(code)) break;

    const index = refValue(code);
    if (index === TOP) {
      throw new InvariantViolationError(`node ${node} has the top sentinel as a child`);
    }
    const child = arena.get(index);
    const length = child.end - child.begin;
    if (length > newEnd - pos) break;

    node = index;
    pos += length;
  }

  return { node, pos };
}
