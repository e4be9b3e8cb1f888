/**
 * feistel-shuffle — Parameter derivation
 *
 * Splits the smallest power-of-two domain enclosing `range` into two
 * near-equal halves. The half combined on odd rounds (`a`) takes the odd bit.
 */

import type { PermutationParameters, Result } from '../types.js';
import { MAX_RANGE } from '../types.js';
import type { ShuffleError } from '../errors.js';
import { invalidRange, invalidRounds, invalidSeed } from '../errors.js';

// ---------------------------------------------------------------------------
// Normalization
// ---------------------------------------------------------------------------

/** Validate a range and widen it to bigint. */
export function normalizeRange(range: bigint | number): Result<bigint, ShuffleError> {
  if (typeof range === 'number' && !Number.isSafeInteger(range)) {
    return { ok: false, error: invalidRange(range, 'must be a safe integer') };
  }
  const value = BigInt(range);
  if (value <= 0n) {
    return { ok: false, error: invalidRange(range, 'must be greater than zero') };
  }
  if (value > MAX_RANGE) {
    return { ok: false, error: invalidRange(range, 'must not exceed 2^64') };
  }
  return { ok: true, value };
}

/** Validate a seed and reduce it to its unsigned 64-bit pattern. */
export function normalizeSeed(seed: bigint | number): Result<bigint, ShuffleError> {
  if (typeof seed === 'number' && !Number.isSafeInteger(seed)) {
    return { ok: false, error: invalidSeed(seed, 'must be a safe integer') };
  }
  return { ok: true, value: BigInt.asUintN(64, BigInt(seed)) };
}

// ---------------------------------------------------------------------------
// Bit Split
// ---------------------------------------------------------------------------

/** Bits needed to address `range` values: ceil(log2(range)), 0 for a range of 1. */
export function domainBits(range: bigint): number {
  const highest = range - 1n;
  return highest === 0n ? 0 : highest.toString(2).length;
}

/** Unsigned mask of `bits` ones (bits <= 32). */
export function maskOf(bits: number): number {
  return 2 ** bits - 1;
}

/**
 * Derive permutation parameters.
 *
 * @param range  - Domain size N, `1 <= N <= 2^64`.
 * @param seed   - Key; any safe integer or bigint.
 * @param rounds - Positive integer round count.
 */
export function buildParameters(
  range: bigint | number,
  seed: bigint | number,
  rounds: number,
): Result<PermutationParameters, ShuffleError> {
  const rangeResult = normalizeRange(range);
  if (!rangeResult.ok) {
    return rangeResult;
  }

  const seedResult = normalizeSeed(seed);
  if (!seedResult.ok) {
    return seedResult;
  }

  if (!Number.isInteger(rounds) || rounds < 1) {
    return { ok: false, error: invalidRounds(rounds) };
  }

  const bits = domainBits(rangeResult.value);
  const bBits = Math.floor(bits / 2);
  const aBits = bits - bBits;

  const parameters: PermutationParameters = Object.freeze({
    range: rangeResult.value,
    seed: seedResult.value,
    rounds,
    aBits,
    bBits,
    aMask: maskOf(aBits),
    bMask: maskOf(bBits),
  });

  return { ok: true, value: parameters };
}
