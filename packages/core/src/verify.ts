// ============================================================================
// @sufftree/core — Structural Verification
// ============================================================================

import { ROOT, TOP } from './arena.js';
import { InvariantViolationError } from './errors.js';
import type { SuffixTree } from './suffix_tree.js';
import { traverse } from './traverse.js';

/**
 * Check the structural invariants of a finished tree. Throws
 * `InvariantViolationError` describing the first violation found.
 */
export function verifyTree(tree: SuffixTree): void {
  const { payload, length, nodeCount } = tree;
  const fail = (message: string): never => {
    throw new InvariantViolationError(message);
  };

  if (tree.suffixLink(ROOT) !== TOP) fail('root must link to the top sentinel');

  const incoming = new Array<number>(nodeCount).fill(0);

  for (let index = ROOT; index < nodeCount; index++) {
    const node = tree.node(index);
    if (index !== ROOT) {
      if (!(node.begin < node.end)) fail(`node ${index} has an empty label`);
      if (node.end > length) fail(`node ${index} label ends past the payload`);
      if (node.children.length < 2) fail(`node ${index} has fewer than two children`);
    }

    for (const [byte, ref] of node.children) {
      if (ref.kind === 'inner') {
        if (ref.index === TOP || ref.index === ROOT) fail(`node ${index} points back at a sentinel`);
        incoming[ref.index]++;
        if (payload[tree.node(ref.index).begin] !== byte) {
          fail(`child ${ref.index} of node ${index} is filed under the wrong byte ${byte}`);
        }
      } else if (ref.kind === 'leaf') {
        if (ref.offset >= length) fail(`leaf under node ${index} starts past the payload`);
        if (payload[ref.offset] !== byte) {
          fail(`leaf ${ref.offset} of node ${index} is filed under the wrong byte ${byte}`);
        }
      }
    }
  }

  for (let index = ROOT + 1; index < nodeCount; index++) {
    if (incoming[index] !== 1) fail(`node ${index} has ${incoming[index]} incoming edges`);
  }

  const depth = new Array<number>(nodeCount).fill(-1);
  traverse(tree, (entry) => {
    if (entry.kind === 'inner') depth[entry.index] = entry.pathLength;
  });

  // Each link drops one byte of path and only the root has path length 0,
  // so every suffix chain ends at the root.
  for (let index = ROOT + 1; index < nodeCount; index++) {
    if (depth[index] < 0) fail(`node ${index} is not reachable from the root`);
    const link = tree.suffixLink(index);
    if (link === TOP) fail(`node ${index} links to the top sentinel`);
    if (depth[link] !== depth[index] - 1) {
      fail(`suffix link ${index} -> ${link} does not drop exactly one byte`);
    }
  }
}
