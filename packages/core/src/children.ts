// ============================================================================
// @sufftree/core — Child Tables
// ============================================================================
//
// Each inner node maps a byte value to at most one child reference. Two
// interchangeable layouts:
//
//   dense   256-slot Int32Array, O(1) lookup, 1 KiB per node
//   sparse  Map keyed by byte, space proportional to the out-degree
//
// The construction algorithm only needs get/set; the choice is a
// space/time trade-off made per tree.
// ============================================================================

import { EncodingRangeError } from './errors.js';
import { NONE_REF, isNone } from './reference.js';
import type { ChildStrategy, RefCode } from './types.js';

export const ALPHABET_SIZE = 256;

export interface ChildTable {
  /** Reference stored under `byte`, or NONE_REF. */
  get(byte: number): RefCode;
  set(byte: number, code: RefCode): void;
  /** Store `code` under every byte value. */
  fill(code: RefCode): void;
  /** Non-none entries in ascending byte order. */
  entries(): Array<[number, RefCode]>;
  /** Number of non-none entries. */
  readonly size: number;
}

function checkByte(byte: number): void {
  if (!Number.isInteger(byte) || byte < 0 || byte >= ALPHABET_SIZE) {
    throw new EncodingRangeError('byte', byte, ALPHABET_SIZE - 1);
  }
}

export class DenseChildTable implements ChildTable {
  private slots = new Int32Array(ALPHABET_SIZE).fill(NONE_REF);
  private count = 0;

  get size(): number {
    return this.count;
  }

  get(byte: number): RefCode {
    checkByte(byte);
    return this.slots[byte];
  }

  set(byte: number, code: RefCode): void {
    checkByte(byte);
    const had = !isNone(this.slots[byte]);
    const has = !isNone(code);
    if (had !== has) this.count += has ? 1 : -1;
    this.slots[byte] = code;
  }

  fill(code: RefCode): void {
    this.slots.fill(code);
    this.count = isNone(code) ? 0 : ALPHABET_SIZE;
  }

  entries(): Array<[number, RefCode]> {
    const out: Array<[number, RefCode]> = [];
    for (let b = 0; b < ALPHABET_SIZE; b++) {
      const code = this.slots[b];
      if (!isNone(code)) out.push([b, code]);
    }
    return out;
  }
}

export class SparseChildTable implements ChildTable {
  private map = new Map<number, RefCode>();

  get size(): number {
    return this.map.size;
  }

  get(byte: number): RefCode {
    checkByte(byte);
    return this.map.get(byte) ?? NONE_REF;
  }

  set(byte: number, code: RefCode): void {
    checkByte(byte);
    if (isNone(code)) {
      this.map.delete(byte);
    } else {
      this.map.set(byte, code);
    }
  }

  fill(code: RefCode): void {
    this.map.clear();
    if (isNone(code)) return;
    for (let b = 0; b < ALPHABET_SIZE; b++) this.map.set(b, code);
  }

  entries(): Array<[number, RefCode]> {
    return [...this.map.entries()].sort((a, b) => a[0] - b[0]);
  }
}

export function createChildTable(strategy: ChildStrategy): ChildTable {
  return strategy === 'sparse' ? new SparseChildTable() : new DenseChildTable();
}
