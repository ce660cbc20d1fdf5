// ============================================================================
// @sufftree/cli — Suffix tree inspector
// ============================================================================
// Usage:
//   sufftree [text]              → dump the tree for text (default "bananas$")
//   sufftree --file <path>       → index a file's bytes
//   sufftree --hex 6162          → index raw bytes given as hex
// Flags:
//   --format tree|stats|suffixes   output (default tree)
//   --children dense|sparse        child table strategy (default dense)
//   --terminator <char>            append a terminator byte if missing
//   --verify                       check structural invariants after building
// ============================================================================

import {
  type SuffixTree,
  buildSuffixTree,
  collectSuffixes,
  debug,
  escapeBytes,
  renderTree,
  warn,
} from '@sufftree/core';
import { type CliOptions, parseCliOptions } from './config.js';
import { type ReadFile, loadPayload } from './payload.js';

export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  env?: Record<string, string | undefined>;
  readFile?: ReadFile;
}

const USAGE = `Usage: sufftree [text] [--file <path> | --hex <bytes>]
                [--format tree|stats|suffixes] [--children dense|sparse]
                [--terminator <char>] [--verify]`;

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

/** Lexicographic byte order; a proper prefix sorts first. */
export function compareBytes(a: Uint8Array, b: Uint8Array): number {
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i++) {
    if (a[i] !== b[i]) return a[i] - b[i];
  }
  return a.length - b.length;
}

function formatStats(tree: SuffixTree): string {
  const stats = tree.stats();
  return [
    `bytes: ${stats.bytes}`,
    `nodes: ${stats.nodes}`,
    `inner: ${stats.inner}`,
    `leaves: ${stats.leaves}`,
  ].join('\n');
}

function formatSuffixes(tree: SuffixTree): string {
  const { payload } = tree;
  return collectSuffixes(tree)
    .sort((a, b) => compareBytes(payload.subarray(a), payload.subarray(b)))
    .map((start) => `${start}\t${escapeBytes(payload.subarray(start))}`)
    .join('\n');
}

/** Warn when the last byte cannot act as a terminator. */
function checkTerminator(payload: Uint8Array): void {
  if (payload.length === 0) return;
  const last = payload[payload.length - 1];
  if (payload.indexOf(last) < payload.length - 1) {
    const hex = `0x${last.toString(16).padStart(2, '0')}`;
    warn(`cli: last byte ${hex} also occurs earlier; some suffixes stay implicit`, {
      byte: last,
    });
  }
}

function render(tree: SuffixTree, options: CliOptions): string {
  switch (options.format) {
    case 'stats':
      return formatStats(tree);
    case 'suffixes':
      return formatSuffixes(tree);
    case 'tree':
      return renderTree(tree);
  }
}

/**
 * Run the command line. Returns the process exit code.
 */
export function run(argv: readonly string[], io: CliIO): number {
  try {
    const options = parseCliOptions(argv, io.env);
    if (options.help) {
      io.stdout(`${USAGE}\n`);
      return 0;
    }

    const payload = loadPayload(options, io.readFile);
    checkTerminator(payload);
    const tree = buildSuffixTree(payload, {
      children: options.children,
      copyPayload: false,
      verify: options.verify,
    });
    debug('cli: built tree', { bytes: payload.length, format: options.format });

    const output = render(tree, options);
    io.stdout(output.length > 0 ? `${output}\n` : '');
    return 0;
  } catch (error: unknown) {
    io.stderr(`error: ${errorMessage(error)}\n`);
    return 1;
  }
}
