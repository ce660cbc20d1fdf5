import { describe, expect, it } from 'vitest';
import { ROOT, TOP } from '../arena.js';
import { type TreeState, canonicalize } from '../cursor.js';
import { InvariantViolationError } from '../errors.js';
import { extend } from '../extend.js';
import { decodeRef, encodeLeaf } from '../reference.js';
import { createTreeState } from '../suffix_tree.js';
import type { Cursor } from '../types.js';

const bytes = (text: string) => new TextEncoder().encode(text);

function grow(text: string): { state: TreeState; cursors: Cursor[] } {
  const state = createTreeState(bytes(text));
  const cursors: Cursor[] = [];
  let cursor: Cursor = { node: ROOT, pos: 0 };
  for (let i = 0; i < text.length; i++) {
    cursor = extend(state, cursor, i);
    cursors.push(cursor);
  }
  return { state, cursors };
}

describe('createTreeState', () => {
  it('holds the two sentinels', () => {
    const { arena } = createTreeState(bytes('ab'));
    expect(arena.size).toBe(2);
    expect(arena.get(TOP).children.size).toBe(256);
    expect(decodeRef(arena.get(TOP).children.get(0x61))).toEqual({ kind: 'inner', index: ROOT });
    expect(arena.get(ROOT).begin).toBe(0);
    expect(arena.get(ROOT).end).toBe(1);
    expect(decodeRef(arena.get(ROOT).suffix)).toEqual({ kind: 'inner', index: TOP });
  });
});

describe('extend', () => {
  it('threads the active point through "banana$"', () => {
    const { cursors } = grow('banana$');
    expect(cursors).toEqual([
      { node: TOP, pos: 0 },
      { node: TOP, pos: 1 },
      { node: TOP, pos: 2 },
      { node: ROOT, pos: 3 },
      { node: ROOT, pos: 3 },
      { node: ROOT, pos: 3 },
      { node: TOP, pos: 6 },
    ]);
  });

  it('splits edges and links the new nodes', () => {
    const { state } = grow('banana$');
    const { arena } = state;
    expect(arena.size).toBe(5);

    // "ana", later shortened to "na" under "a"
    expect(arena.get(2).begin).toBe(2);
    expect(arena.get(2).end).toBe(4);
    expect(decodeRef(arena.get(2).suffix)).toEqual({ kind: 'inner', index: 3 });

    // "na"
    expect(arena.get(3).begin).toBe(2);
    expect(arena.get(3).end).toBe(4);
    expect(decodeRef(arena.get(3).suffix)).toEqual({ kind: 'inner', index: 4 });

    // "a"
    expect(arena.get(4).begin).toBe(1);
    expect(arena.get(4).end).toBe(2);
    expect(decodeRef(arena.get(4).suffix)).toEqual({ kind: 'inner', index: ROOT });
  });

  it('links the last node of a phase to where the phase stopped', () => {
    // At the final "d", "ab" is split off and the phase stops at node "b",
    // which already has a "d" edge.
    const { state, cursors } = grow('bdabcabd');
    const { arena } = state;
    expect(arena.size).toBe(4);

    // node 2 is "b", node 3 is "ab"
    expect([arena.get(2).begin, arena.get(2).end]).toEqual([0, 1]);
    expect([arena.get(3).begin, arena.get(3).end]).toEqual([2, 4]);
    expect(cursors[7]).toEqual({ node: 2, pos: 7 });
    expect(decodeRef(arena.get(3).suffix)).toEqual({ kind: 'inner', index: 2 });
  });

  it('fails when a suffix link is not an inner node', () => {
    const state = createTreeState(bytes('ab'));
    state.arena.get(ROOT).suffix = encodeLeaf(0);
    expect(() => extend(state, { node: ROOT, pos: 0 }, 0)).toThrow(InvariantViolationError);
  });

  it('fails when the active edge is missing', () => {
    const state = createTreeState(bytes('ab'));
    expect(() => extend(state, { node: ROOT, pos: 0 }, 1)).toThrow(
      'Invariant violated: node 1 has no edge for byte 97 at offset 0',
    );
  });
});

describe('canonicalize', () => {
  const { state } = grow('banana$');

  it('descends through whole edges', () => {
    // "ana": "a" (node 4) then "na" (node 2)
    expect(canonicalize(state, { node: ROOT, pos: 1 }, 4)).toEqual({ node: 2, pos: 4 });
  });

  it('stops inside an edge longer than the remaining span', () => {
    // "an": "a" (node 4), then "n" is only part of "na"
    expect(canonicalize(state, { node: ROOT, pos: 1 }, 3)).toEqual({ node: 4, pos: 2 });
  });

  it('stops at a leaf', () => {
    expect(canonicalize(state, { node: ROOT, pos: 0 }, 3)).toEqual({ node: ROOT, pos: 0 });
  });

  it('steps from top to root over one byte', () => {
    expect(canonicalize(state, { node: TOP, pos: 5 }, 6)).toEqual({ node: ROOT, pos: 6 });
  });

  it('leaves an already consumed span alone', () => {
    expect(canonicalize(state, { node: 3, pos: 6 }, 6)).toEqual({ node: 3, pos: 6 });
  });
});
