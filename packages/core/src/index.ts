// ============================================================================
// @sufftree/core — Public API
// ============================================================================

// Tree
export { SuffixTree, buildSuffixTree, createTreeState } from './suffix_tree.js';
export type {
  BuildOptions,
  ChildStrategy,
  Cursor,
  NodeIndex,
  NodeRef,
  NodeView,
  Offset,
  RefCode,
  TreeStats,
} from './types.js';

// Construction internals
export { NodeArena, ROOT, TOP } from './arena.js';
export type { Node } from './arena.js';
export { canonicalize } from './cursor.js';
export type { TreeState } from './cursor.js';
export { extend } from './extend.js';

// Reference encoding
export {
  MAX_OFFSET,
  MAX_REF_VALUE,
  NONE_REF,
  checkOffset,
  decodeRef,
  encodeInner,
  encodeLeaf,
  encodeRef,
  isInner,
  isLeaf,
  isNone,
  refValue,
} from './reference.js';

// Child tables
export { ALPHABET_SIZE, DenseChildTable, SparseChildTable, createChildTable } from './children.js';
export type { ChildTable } from './children.js';

// Reading the finished tree
export { traverse, collectSuffixes } from './traverse.js';
export type { VisitEntry, Visitor } from './traverse.js';
export { renderTree, escapeBytes } from './dump.js';
export type { RenderOptions } from './dump.js';
export { verifyTree } from './verify.js';

// Errors
export {
  SuffixTreeError,
  CapacityError,
  EncodingRangeError,
  InvariantViolationError,
} from './errors.js';

// Logging
export {
  debug,
  info,
  warn,
  onLog,
  timer,
  Timer,
  setLogLevel,
  getLogLevel,
  isDebugEnabled,
} from './logger.js';
export type { LogEntry, LogLevel, LogCallback } from './logger.js';
