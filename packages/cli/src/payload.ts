// ============================================================================
// @sufftree/cli — Payload Loading
// ============================================================================

import { readFileSync } from 'node:fs';
import type { CliOptions } from './config.js';

/** Built when no payload source is given. */
export const DEMO_PAYLOAD = 'bananas$';

const textEncoder = new TextEncoder();

export type ReadFile = (path: string) => Uint8Array;

const readFromDisk: ReadFile = (path) => new Uint8Array(readFileSync(path));

/**
 * Resolve the bytes to index from the options, appending the terminator
 * when one is requested and the payload does not already end with it.
 */
export function loadPayload(options: CliOptions, readFile: ReadFile = readFromDisk): Uint8Array {
  let bytes: Uint8Array;
  if (options.file !== undefined) {
    bytes = readFile(options.file);
  } else if (options.hex !== undefined) {
    bytes = new Uint8Array(Buffer.from(options.hex, 'hex'));
  } else {
    bytes = textEncoder.encode(options.text ?? DEMO_PAYLOAD);
  }

  if (options.terminator === undefined) return bytes;

  const term = options.terminator.charCodeAt(0);
  if (bytes.length > 0 && bytes[bytes.length - 1] === term) return bytes;

  const out = new Uint8Array(bytes.length + 1);
  out.set(bytes);
  out[bytes.length] = term;
  return out;
}
