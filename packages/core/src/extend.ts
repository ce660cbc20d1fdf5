// ============================================================================
// @sufftree/core — Phase Extension
// ============================================================================
//
// One call processes the byte at `newEnd`: starting from the active point it
// inserts a leaf for every pending suffix, splitting edges where the suffix
// ends mid-edge, until it reaches a suffix that is already followed by the
// new byte. Leaves are implicit, so suffixes that already end in a leaf grow
// for free.
// ============================================================================

import { ROOT } from './arena.js';
import { type TreeState, canonicalize } from './cursor.js';
import { InvariantViolationError } from './errors.js';
import { encodeInner, encodeLeaf, isInner, isLeaf, isNone, refValue } from './reference.js';
import type { Cursor, NodeIndex, Offset, RefCode } from './types.js';

const NO_NODE = -1;

/**
 * Split the edge leaving `parent` under `edgeByte` at `split`. Returns the
 * index of the new inner node, which takes over the first part of the label.
 */
function splitEdge(
  state: TreeState,
  parent: NodeIndex,
  edgeByte: number,
  edge: RefCode,
  labelBegin: Offset,
  split: Offset,
): NodeIndex {
  const { payload, arena } = state;
  const created = arena.allocate(labelBegin, split, encodeInner(ROOT));
  const node = arena.get(created);
  const continuing = payload[split];

  if (isLeaf(edge)) {
    node.children.set(continuing, encodeLeaf(split));
  } else {
    const lower = arena.get(refValue(edge));
    if (!(lower.begin < split && split < lower.end)) {
      throw new InvariantViolationError(
        `split point ${split} is outside edge [${lower.begin}, ${lower.end})`,
      );
    }
    lower.begin = split;
    node.children.set(continuing, edge);
  }

  arena.get(parent).children.set(edgeByte, encodeInner(created));
  return created;
}

/**
 * Run one phase for the byte at `newEnd` and return the active point for the
 * next one.
 */
export function extend(state: TreeState, cursor: Cursor, newEnd: Offset): Cursor {
  const { payload, arena } = state;
  const byte = payload[newEnd];
  let cur = cursor;
  let previous: NodeIndex = NO_NODE;

  for (;;) {
    cur = canonicalize(state, cur, newEnd);
    const active = arena.get(cur.node);
    let insertAt: NodeIndex;

    if (cur.pos === newEnd) {
      if (!isNone(active.children.get(byte))) break;
      insertAt = cur.node;
    } else {
      const edgeByte = payload[cur.pos];
      const edge = active.children.get(edgeByte);
      if (isNone(edge)) {
        throw new InvariantViolationError(
          `node ${cur.node} has no edge for byte ${edgeByte} at offset ${cur.pos}`,
        );
      }
      const labelBegin = isLeaf(edge) ? refValue(edge) : arena.get(refValue(edge)).begin;
      const split = labelBegin + newEnd - cur.pos;
      if (payload[split] === byte) break;
      insertAt = splitEdge(state, cur.node, edgeByte, edge, labelBegin, split);
    }

    if (previous !== NO_NODE) {
      arena.get(previous).suffix = encodeInner(insertAt);
    }
    previous = insertAt;

    const target = arena.get(insertAt);
    if (!isNone(target.children.get(byte))) {
      throw new InvariantViolationError(`node ${insertAt} already has an edge for byte ${byte}`);
    }
    target.children.set(byte, encodeLeaf(newEnd));

    const link = active.suffix;
    if (!isInner(link)) {
      throw new InvariantViolationError(`suffix link of node ${cur.node} is not an inner node`);
    }
    cur = { node: refValue(link), pos: cur.pos };
  }

  // The last insertion point of the phase links to where the phase stopped.
  if (previous !== NO_NODE) {
    arena.get(previous).suffix = encodeInner(cur.node);
  }

  return cur;
}
