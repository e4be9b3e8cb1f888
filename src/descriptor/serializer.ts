/**
 * feistel-shuffle — Descriptor serializer
 *
 * Encodes everything needed to rebuild a permutation into a fixed-size
 * binary descriptor, so an ordering can be stored and replayed later.
 *
 * Binary format:
 *   Offset  Size    Content
 *   0       4       Magic bytes: "FPRM" (0x46, 0x50, 0x52, 0x4D)
 *   4       1       Version: 1
 *   5       1       Round function: 0 = arx, 1 = sbox
 *   6       4       Rounds (uint32 LE)
 *   10      8       Seed (uint64 LE)
 *   18      8       Range - 1 (uint64 LE)
 */

import type { Permutation, RoundFunctionKind } from '../types.js';

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Magic bytes identifying a descriptor: "FPRM". */
export const DESCRIPTOR_MAGIC = new Uint8Array([0x46, 0x50, 0x52, 0x4d]);

/** Current descriptor format version. */
export const DESCRIPTOR_VERSION = 1;

/** Header size: 4 (magic) + 1 (version) = 5 bytes. */
export const HEADER_SIZE = 5;

/** Total descriptor size in bytes. */
export const DESCRIPTOR_SIZE = HEADER_SIZE + 1 + 4 + 8 + 8;

/** Wire codes for each round function. */
export const ROUND_FUNCTION_CODES: Readonly<Record<RoundFunctionKind, number>> = {
  arx: 0,
  sbox: 1,
};

// ---------------------------------------------------------------------------
// Serializer
// ---------------------------------------------------------------------------

/**
 * Encode a permutation's configuration.
 *
 * `range - 1` is stored so the full 2^64 domain fits in eight bytes.
 */
export function serializePermutation(permutation: Permutation): Uint8Array {
  const { range, seed, rounds } = permutation.parameters;

  const descriptor = new Uint8Array(DESCRIPTOR_SIZE);
  const view = new DataView(descriptor.buffer, descriptor.byteOffset, descriptor.byteLength);

  let offset = 0;

  // Magic bytes
  descriptor.set(DESCRIPTOR_MAGIC, offset);
  offset += DESCRIPTOR_MAGIC.byteLength;

  // Version
  descriptor[offset] = DESCRIPTOR_VERSION;
  offset += 1;

  descriptor[offset] = ROUND_FUNCTION_CODES[permutation.roundFunction];
  offset += 1;

  view.setUint32(offset, rounds, true);
  offset += 4;

  view.setBigUint64(offset, seed, true);
  offset += 8;

  view.setBigUint64(offset, range - 1n, true);

  return descriptor;
}
