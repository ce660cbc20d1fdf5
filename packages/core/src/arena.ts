// ============================================================================
// @sufftree/core — Node Arena
// ============================================================================

import { type ChildTable, createChildTable } from './children.js';
import { CapacityError, InvariantViolationError } from './errors.js';
import { MAX_REF_VALUE, checkOffset } from './reference.js';
import type { ChildStrategy, NodeIndex, Offset, RefCode } from './types.js';

/** The "parent of the root": every child slot points at ROOT. */
export const TOP: NodeIndex = 0;
/** Represents the empty string. */
export const ROOT: NodeIndex = 1;

/**
 * Inner node. `[begin, end)` is the payload range labelling the edge from
 * its parent. Only `begin` is ever moved, and only forward, when an edge is
 * split above the node.
 */
export interface Node {
  begin: Offset;
  end: Offset;
  suffix: RefCode;
  readonly children: ChildTable;
}

/**
 * Append-only, index-addressed store of inner nodes.
 *
 * Indices are handed out in increasing order and stay valid for the life of
 * the arena; there is no removal.
 */
export class NodeArena {
  private readonly nodes: Node[] = [];
  readonly strategy: ChildStrategy;

  constructor(strategy: ChildStrategy = 'dense') {
    this.strategy = strategy;
  }

  get size(): number {
    return this.nodes.length;
  }

  /**
   * Append a node and return its index. Nothing is written when the index
   * or the label range cannot be encoded.
   */
  allocate(begin: Offset, end: Offset, suffix: RefCode): NodeIndex {
    const index = this.nodes.length;
    if (index > MAX_REF_VALUE) {
      throw new CapacityError(
        `Node arena is full: index ${index} exceeds ${MAX_REF_VALUE}`,
        MAX_REF_VALUE,
        index,
      );
    }
    checkOffset(begin);
    checkOffset(end);
    this.nodes.push({ begin, end, suffix, children: createChildTable(this.strategy) });
    return index;
  }

  get(index: NodeIndex): Node {
    const node = this.nodes[index];
    if (node === undefined) {
      throw new InvariantViolationError(`node ${index} is not in the arena (size ${this.size})`);
    }
    return node;
  }
}
