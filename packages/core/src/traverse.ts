// ============================================================================
// @sufftree/core — Traversal
// ============================================================================

import { ROOT } from './arena.js';
import { SuffixTreeError } from './errors.js';
import type { SuffixTree } from './suffix_tree.js';
import type { NodeIndex, Offset } from './types.js';

/**
 * A node reached during a walk.
 *
 * `depth` counts edges from the root; `pathLength` counts bytes from the
 * root to the end of the node's label.
 */
export type VisitEntry =
  | { kind: 'inner'; index: NodeIndex; depth: number; pathLength: number }
  | { kind: 'leaf'; offset: Offset; parent: NodeIndex; depth: number; pathLength: number };

export type Visitor = (entry: VisitEntry) => void;

/**
 * Resolve the "current end" for leaf labels; defaults to the payload length.
 */
export function resolveNow(tree: SuffixTree, now?: number): number {
  const value = now ?? tree.length;
  if (!Number.isInteger(value) || value < 0 || value > tree.length) {
    throw new SuffixTreeError(`now ${value} is outside 0..${tree.length}`);
  }
  return value;
}

/**
 * Pre-order walk from the root, children in ascending byte order.
 *
 * Uses an explicit stack, so depth is not limited by the call stack.
 */
export function traverse(tree: SuffixTree, visit: Visitor, now?: number): void {
  const end = resolveNow(tree, now);
  const stack: VisitEntry[] = [{ kind: 'inner', index: ROOT, depth: 0, pathLength: 0 }];

  while (stack.length > 0) {
    const entry = stack.pop();
    if (entry === undefined) break;
    visit(entry);
    if (entry.kind === 'leaf') continue;

    const children = tree.children(entry.index);
    for (let i = children.length - 1; i >= 0; i--) {
      const [, ref] = children[i];
      if (ref.kind === 'inner') {
        const view = tree.node(ref.index);
        stack.push({
          kind: 'inner',
          index: ref.index,
          depth: entry.depth + 1,
          pathLength: entry.pathLength + view.end - view.begin,
        });
      } else if (ref.kind === 'leaf') {
        stack.push({
          kind: 'leaf',
          offset: ref.offset,
          parent: entry.index,
          depth: entry.depth + 1,
          pathLength: entry.pathLength + Math.max(0, end - ref.offset),
        });
      }
    }
  }
}

/**
 * Start offset of the suffix spelled by every leaf, in traversal order.
 */
export function collectSuffixes(tree: SuffixTree): Offset[] {
  const starts: Offset[] = [];
  traverse(tree, (entry) => {
    if (entry.kind === 'leaf') starts.push(tree.length - entry.pathLength);
  });
  return starts;
}
