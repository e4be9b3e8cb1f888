/**
 * feistel-shuffle — Seed sources
 *
 * Supplies 64-bit seeds when the caller does not provide one. The permutation
 * treats a seed as an opaque bit pattern.
 */

import { randomBytes } from 'node:crypto';

/** Provider of 64-bit seeds. */
export interface SeedSource {
  /** Return an unsigned 64-bit seed. */
  nextSeed(): bigint;
}

/** Seed source backed by the operating system's CSPRNG. */
export function createCryptoSeedSource(): SeedSource {
  return {
    nextSeed(): bigint {
      return randomBytes(8).readBigUInt64LE(0);
    },
  };
}

/**
 * Seed source that always returns the same seed. For reproducible runs and
 * tests.
 */
export function createFixedSeedSource(seed: bigint): SeedSource {
  const fixed = BigInt.asUintN(64, seed);
  return {
    nextSeed(): bigint {
      return fixed;
    },
  };
}
