import { describe, expect, it } from 'vitest';
import { escapeBytes, renderTree } from '../dump.js';
import { SuffixTreeError } from '../errors.js';
import { buildSuffixTree } from '../suffix_tree.js';
import { traverse } from '../traverse.js';

const bytes = (text: string) => new TextEncoder().encode(text);

describe('renderTree', () => {
  it('renders "banana$"', () => {
    const tree = buildSuffixTree(bytes('banana$'));
    expect(renderTree(tree)).toBe(
      [
        '(root)',
        '  "$" (leaf)',
        '  "a" (inner 4, suffix=1)',
        '    "$" (leaf)',
        '    "na" (inner 2, suffix=3)',
        '      "$" (leaf)',
        '      "na$" (leaf)',
        '  "banana$" (leaf)',
        '  "na" (inner 3, suffix=4)',
        '    "$" (leaf)',
        '    "na$" (leaf)',
      ].join('\n'),
    );
  });

  it('renders an implicit tree', () => {
    const tree = buildSuffixTree(bytes('aab'));
    expect(renderTree(tree)).toBe(
      ['(root)', '  "a" (inner 2, suffix=1)', '    "ab" (leaf)', '    "b" (leaf)', '  "b" (leaf)'].join(
        '\n',
      ),
    );
  });

  it('resolves leaves against an earlier end', () => {
    const tree = buildSuffixTree(bytes('aab'));
    expect(renderTree(tree, { now: 2 })).toBe(
      ['(root)', '  "a" (inner 2, suffix=1)', '    "a" (leaf)', '    "" (leaf)', '  "" (leaf)'].join(
        '\n',
      ),
    );
  });

  it('renders only the root for an empty payload', () => {
    expect(renderTree(buildSuffixTree(new Uint8Array(0)))).toBe('(root)');
  });

  it('accepts a custom indent', () => {
    const tree = buildSuffixTree(bytes('a'));
    expect(renderTree(tree, { indent: '\t' })).toBe('(root)\n\t"a" (leaf)');
  });

  it('rejects an end past the payload', () => {
    const tree = buildSuffixTree(bytes('aab'));
    expect(() => renderTree(tree, { now: 9 })).toThrow(SuffixTreeError);
    expect(() => renderTree(tree, { now: 9 })).toThrow('now 9 is outside 0..3');
  });
});

describe('escapeBytes', () => {
  it('keeps printable ASCII and escapes the rest', () => {
    expect(escapeBytes(bytes('a b~'))).toBe('a b~');
    expect(escapeBytes(Uint8Array.from([0x41, 0x22, 0x5c, 0x0a, 0xff]))).toBe(String.raw`A\"\\\x0a\xff`);
  });
});

describe('traverse', () => {
  it('reports depth and path length', () => {
    const tree = buildSuffixTree(bytes('banana$'));
    const inner: Array<[number, number, number]> = [];
    traverse(tree, (entry) => {
      if (entry.kind === 'inner') inner.push([entry.index, entry.depth, entry.pathLength]);
    });
    expect(inner).toEqual([
      [1, 0, 0],
      [4, 1, 1],
      [2, 2, 3],
      [3, 1, 2],
    ]);
  });
});
