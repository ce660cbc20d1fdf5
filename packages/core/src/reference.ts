// ============================================================================
// @sufftree/core — Reference Encoding
// ============================================================================
//
// A child or suffix reference is packed into one signed 32-bit integer:
//
//   -1                 none
//   (value << 1) | 0   inner node `value`
//   (value << 1) | 1   leaf at payload offset `value`
//
// `value` is limited to 0..MAX_REF_VALUE (2^30 - 1) so every code is a
// non-negative int32 and fits an Int32Array slot. Out-of-range values are
// rejected, never wrapped.
// ============================================================================

import { EncodingRangeError } from './errors.js';
import type { NodeRef, Offset, RefCode } from './types.js';

export const MAX_REF_VALUE = 0x3fffffff;

/** Largest offset (and payload length) the tree can address. */
export const MAX_OFFSET = MAX_REF_VALUE;

export const NONE_REF: RefCode = -1;

const LEAF_TAG = 1;

function checkValue(what: string, value: number): void {
  if (!Number.isInteger(value) || value < 0 || value > MAX_REF_VALUE) {
    throw new EncodingRangeError(what, value, MAX_REF_VALUE);
  }
}

/**
 * Validate a payload offset (or an edge end, which may equal the length).
 */
export function checkOffset(value: number): Offset {
  checkValue('offset', value);
  return value;
}

export function encodeInner(index: number): RefCode {
  checkValue('node index', index);
  return index << 1;
}

export function encodeLeaf(offset: number): RefCode {
  checkValue('leaf offset', offset);
  return (offset << 1) | LEAF_TAG;
}

export function isNone(code: RefCode): boolean {
  return code < 0;
}

export function isLeaf(code: RefCode): boolean {
  return code >= 0 && (code & LEAF_TAG) === LEAF_TAG;
}

export function isInner(code: RefCode): boolean {
  return code >= 0 && (code & LEAF_TAG) === 0;
}

/**
 * Node index or leaf offset carried by a code. Meaningless for none.
 */
export function refValue(code: RefCode): number {
  return code >>> 1;
}

export function decodeRef(code: RefCode): NodeRef {
  if (isNone(code)) return { kind: 'none' };
  if (isLeaf(code)) return { kind: 'leaf', offset: refValue(code) };
  return { kind: 'inner', index: refValue(code) };
}

export function encodeRef(ref: NodeRef): RefCode {
  switch (ref.kind) {
    case 'none':
      return NONE_REF;
    case 'leaf':
      return encodeLeaf(ref.offset);
    case 'inner':
      return encodeInner(ref.index);
  }
}
