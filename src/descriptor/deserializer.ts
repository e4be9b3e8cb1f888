/**
 * feistel-shuffle — Descriptor deserializer
 *
 * Decodes a descriptor produced by `serializePermutation` and rebuilds the
 * permutation. Validates size, magic bytes, version and field values.
 *
 * See serializer.ts for the binary layout.
 */

import type { Permutation, PermutationConfig, Result, RoundFunctionKind } from '../types.js';
import type { ShuffleError } from '../errors.js';
import { invalidDescriptor } from '../errors.js';
import { tryCreatePermutation } from '../permutation.js';
import { isRoundFunctionKind } from '../round/round-function.js';
import {
  DESCRIPTOR_MAGIC,
  DESCRIPTOR_SIZE,
  DESCRIPTOR_VERSION,
  HEADER_SIZE,
  ROUND_FUNCTION_CODES,
} from './serializer.js';

/** Reverse lookup of `ROUND_FUNCTION_CODES`. */
function roundFunctionFromCode(code: number): RoundFunctionKind | null {
  for (const [kind, value] of Object.entries(ROUND_FUNCTION_CODES)) {
    if (value === code && isRoundFunctionKind(kind)) {
      return kind;
    }
  }
  return null;
}

// ---------------------------------------------------------------------------
// Deserializer
// ---------------------------------------------------------------------------

/**
 * Decode a descriptor into a permutation configuration.
 *
 * @param data - Bytes produced by `serializePermutation`.
 * @returns The configuration or an INVALID_DESCRIPTOR error.
 */
export function deserializePermutation(
  data: Uint8Array,
): Result<Required<PermutationConfig>, ShuffleError> {
  // --- Header validation ---------------------------------------------------
  if (data.byteLength < HEADER_SIZE) {
    return { ok: false, error: invalidDescriptor('too small — missing header') };
  }

  for (let i = 0; i < DESCRIPTOR_MAGIC.byteLength; i++) {
    if (data[i] !== DESCRIPTOR_MAGIC[i]) {
      return { ok: false, error: invalidDescriptor('bad magic bytes') };
    }
  }

  const version = data[HEADER_SIZE - 1];
  if (version !== DESCRIPTOR_VERSION) {
    return {
      ok: false,
      error: invalidDescriptor(
        `unsupported version: ${String(version)} (expected ${String(DESCRIPTOR_VERSION)})`,
      ),
    };
  }

  if (data.byteLength !== DESCRIPTOR_SIZE) {
    return {
      ok: false,
      error: invalidDescriptor(
        `expected ${String(DESCRIPTOR_SIZE)} bytes, got ${String(data.byteLength)}`,
      ),
    };
  }

  // --- Fields --------------------------------------------------------------
  const view = new DataView(data.buffer, data.byteOffset, data.byteLength);
  let offset = HEADER_SIZE;

  const code = view.getUint8(offset);
  offset += 1;
  const roundFunction = roundFunctionFromCode(code);
  if (roundFunction === null) {
    return { ok: false, error: invalidDescriptor(`unknown round function code: ${String(code)}`) };
  }

  const rounds = view.getUint32(offset, true);
  offset += 4;
  if (rounds < 1) {
    return { ok: false, error: invalidDescriptor('rounds must be at least 1') };
  }

  const seed = view.getBigUint64(offset, true);
  offset += 8;

  const range = view.getBigUint64(offset, true) + 1n;

  return { ok: true, value: { range, seed, rounds, roundFunction } };
}

/**
 * Rebuild the permutation a descriptor describes.
 *
 * @param data - Bytes produced by `serializePermutation`.
 */
export function restorePermutation(data: Uint8Array): Result<Permutation, ShuffleError> {
  const configResult = deserializePermutation(data);
  if (!configResult.ok) {
    return configResult;
  }
  return tryCreatePermutation(configResult.value);
}
