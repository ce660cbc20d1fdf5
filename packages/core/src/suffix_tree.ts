// ============================================================================
// @sufftree/core — Suffix Tree
// ============================================================================
//
// Builds the tree one byte at a time, threading the active point from phase
// to phase, then exposes a read-only view of the result. Labels are ranges
// into a single payload buffer; nothing copies substrings per node.
// ============================================================================

import { NodeArena, ROOT, TOP } from './arena.js';
import type { TreeState } from './cursor.js';
import { CapacityError, InvariantViolationError, SuffixTreeError } from './errors.js';
import { extend } from './extend.js';
import { isDebugEnabled, logBuild, timer } from './logger.js';
import {
  MAX_OFFSET,
  checkOffset,
  decodeRef,
  encodeInner,
  isInner,
  isLeaf,
  refValue,
} from './reference.js';
import type {
  BuildOptions,
  ChildStrategy,
  Cursor,
  NodeIndex,
  NodeRef,
  NodeView,
  Offset,
  TreeStats,
} from './types.js';
import { verifyTree } from './verify.js';

/**
 * Fresh construction state holding only the two sentinels: TOP, whose every
 * child is ROOT, and ROOT, whose one-byte placeholder label lets a step from
 * TOP to ROOT consume exactly one byte.
 */
export function createTreeState(payload: Uint8Array, children: ChildStrategy = 'dense'): TreeState {
  const arena = new NodeArena(children);
  const top = arena.allocate(0, 0, encodeInner(TOP));
  arena.get(top).children.fill(encodeInner(ROOT));
  arena.allocate(0, 1, encodeInner(TOP));
  return { payload, arena };
}

/**
 * Suffix tree over a fixed byte string, built with Ukkonen's algorithm.
 *
 * For every suffix to end in its own leaf the payload should end with a byte
 * that occurs nowhere else; without one, suffixes that are prefixes of other
 * suffixes stay implicit.
 *
 * @example
 * ```ts
 * const tree = SuffixTree.build(new TextEncoder().encode('banana$'));
 * tree.leafCount(); // 7
 * ```
 */
export class SuffixTree {
  readonly payload: Uint8Array;
  private readonly arena: NodeArena;

  private constructor(payload: Uint8Array, arena: NodeArena) {
    this.payload = payload;
    this.arena = arena;
  }

  /**
   * Build a tree over `payload`. Throws `CapacityError` before allocating
   * anything when the payload is too long to address.
   */
  static build(payload: Uint8Array, options: BuildOptions = {}): SuffixTree {
    if (payload.length > MAX_OFFSET) {
      throw new CapacityError(
        `Payload of ${payload.length} bytes exceeds the addressable ${MAX_OFFSET}`,
        MAX_OFFSET,
        payload.length,
      );
    }

    const t = timer('build');
    const bytes = options.copyPayload === false ? payload : payload.slice();
    const state = createTreeState(bytes, options.children);
    const { arena } = state;

    let cursor: Cursor = { node: ROOT, pos: 0 };
    for (let i = 0; i < bytes.length; i++) {
      cursor = extend(state, cursor, i);
    }

    const tree = SuffixTree.fromState(state);
    if (options.verify) verifyTree(tree);
    if (isDebugEnabled()) logBuild(bytes.length, arena.size, tree.leafCount(), t.elapsed());
    return tree;
  }

  /** Wrap construction state driven by `extend` directly. */
  static fromState(state: TreeState): SuffixTree {
    return new SuffixTree(state.payload, state.arena);
  }

  get length(): number {
    return this.payload.length;
  }

  get nodeCount(): number {
    return this.arena.size;
  }

  get root(): NodeIndex {
    return ROOT;
  }

  get top(): NodeIndex {
    return TOP;
  }

  node(index: NodeIndex): NodeView {
    const node = this.arena.get(index);
    return {
      index,
      begin: node.begin,
      end: node.end,
      suffix: decodeRef(node.suffix),
      children: this.children(index),
    };
  }

  /** Children keyed by byte, ascending. */
  children(index: NodeIndex): Array<[number, NodeRef]> {
    return this.arena
      .get(index)
      .children.entries()
      .map(([byte, code]): [number, NodeRef] => [byte, decodeRef(code)]);
  }

  /**
   * Label of the edge into `index`, as a view into the payload. The root's
   * label is a one-byte placeholder and spells nothing.
   */
  label(index: NodeIndex): Uint8Array {
    const node = this.arena.get(index);
    return this.payload.subarray(node.begin, node.end);
  }

  suffixLink(index: NodeIndex): NodeIndex {
    const code = this.arena.get(index).suffix;
    if (!isInner(code)) {
      throw new InvariantViolationError(`suffix link of node ${index} is not an inner node`);
    }
    return refValue(code);
  }

  /** Label of a leaf edge starting at `offset`, resolved to the payload end. */
  leafLabel(offset: Offset): Uint8Array {
    checkOffset(offset);
    if (offset > this.length) {
      throw new SuffixTreeError(`leaf offset ${offset} is outside 0..${this.length}`);
    }
    return this.payload.subarray(offset, this.payload.length);
  }

  leafCount(): number {
    let count = 0;
    for (let i = ROOT; i < this.arena.size; i++) {
      for (const [, code] of this.arena.get(i).children.entries()) {
        if (isLeaf(code)) count++;
      }
    }
    return count;
  }

  /** Inner nodes, not counting the two sentinels. */
  innerCount(): number {
    return this.arena.size - 2;
  }

  stats(): TreeStats {
    return {
      bytes: this.length,
      nodes: this.nodeCount,
      inner: this.innerCount(),
      leaves: this.leafCount(),
    };
  }

  /** Every node in arena order. */
  nodes(): NodeView[] {
    const out: NodeView[] = [];
    for (let i = 0; i < this.arena.size; i++) out.push(this.node(i));
    return out;
  }
}

/**
 * Build a suffix tree over `payload`.
 */
export function buildSuffixTree(payload: Uint8Array, options?: BuildOptions): SuffixTree {
  return SuffixTree.build(payload, options);
}
