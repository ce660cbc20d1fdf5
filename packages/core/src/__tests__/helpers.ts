import { ROOT } from '../arena.js';
import type { SuffixTree } from '../suffix_tree.js';
import type { NodeIndex } from '../types.js';

export interface SpelledLeaf {
  /** Offset stored in the leaf reference. */
  offset: number;
  /** Start of the suffix the root-to-leaf path spells. */
  start: number;
  /** Concatenated edge labels from the root to the leaf. */
  bytes: Uint8Array;
}

function concat(parts: Uint8Array[]): Uint8Array {
  const out = new Uint8Array(parts.reduce((n, p) => n + p.length, 0));
  let at = 0;
  for (const p of parts) {
    out.set(p, at);
    at += p.length;
  }
  return out;
}

/**
 * Walk the tree recursively, independently of `traverse`, and spell each
 * leaf by concatenating the labels on its path.
 */
export function spellLeaves(tree: SuffixTree): SpelledLeaf[] {
  const out: SpelledLeaf[] = [];
  const walk = (index: NodeIndex, path: Uint8Array[]) => {
    for (const [, ref] of tree.children(index)) {
      if (ref.kind === 'inner') {
        walk(ref.index, [...path, tree.label(ref.index)]);
      } else if (ref.kind === 'leaf') {
        const spelled = concat([...path, tree.leafLabel(ref.offset)]);
        out.push({ offset: ref.offset, start: tree.length - spelled.length, bytes: spelled });
      }
    }
  };
  walk(ROOT, []);
  return out;
}
