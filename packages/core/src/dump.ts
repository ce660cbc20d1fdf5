// ============================================================================
// @sufftree/core — Text Dump
// ============================================================================

import { ROOT } from './arena.js';
import type { SuffixTree } from './suffix_tree.js';
import { resolveNow, traverse } from './traverse.js';

export interface RenderOptions {
  /** End used to resolve leaf labels. Defaults to the payload length. */
  now?: number;
  /** Indentation per level. Default two spaces. */
  indent?: string;
}

/**
 * Render bytes for display: printable ASCII as-is, `"` and `\` escaped,
 * everything else as `\xNN`.
 */
export function escapeBytes(bytes: Uint8Array): string {
  let out = '';
  for (const b of bytes) {
    if (b === 0x22) out += '\\"';
    else if (b === 0x5c) out += '\\\\';
    else if (b >= 0x20 && b <= 0x7e) out += String.fromCharCode(b);
    else out += `\\x${b.toString(16).padStart(2, '0')}`;
  }
  return out;
}

/**
 * One line per node, indented by depth:
 *
 * ```text
 * (root)
 *   "a" (inner 4, suffix=1)
 *     "$" (leaf)
 * ```
 */
export function renderTree(tree: SuffixTree, options: RenderOptions = {}): string {
  const now = resolveNow(tree, options.now);
  const indent = options.indent ?? '  ';
  const lines: string[] = [];

  traverse(
    tree,
    (entry) => {
      const pad = indent.repeat(entry.depth);
      if (entry.kind === 'leaf') {
        const label = tree.payload.subarray(entry.offset, Math.max(entry.offset, now));
        lines.push(`${pad}"${escapeBytes(label)}" (leaf)`);
      } else if (entry.index === ROOT) {
        lines.push(`${pad}(root)`);
      } else {
        const label = escapeBytes(tree.label(entry.index));
        lines.push(`${pad}"${label}" (inner ${entry.index}, suffix=${tree.suffixLink(entry.index)})`);
      }
    },
    now,
  );

  return lines.join('\n');
}
