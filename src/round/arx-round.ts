/**
 * feistel-shuffle — ARX round function
 *
 * Add-rotate-xor mixing in the shape of a HalfSipHash round over four 32-bit
 * words initialised from (round index, right half, seed low, seed high).
 */

import type { RoundFunction } from '../types.js';
import { rotl32, splitWords } from './words.js';

/** Number of mixing steps applied per call. */
export const ARX_MIX_STEPS = 4;

/** XORed into the seed's high word so a zero seed never yields an all-zero state. */
export const ARX_STATE_CONSTANT = 0x6c796765;

/**
 * Create an ARX round function keyed by `seed`.
 *
 * @param seed - Unsigned 64-bit key.
 */
export function createArxRound(seed: bigint): RoundFunction {
  const { hi: seedHi, lo: seedLo } = splitWords(seed);
  const keyHi = (seedHi ^ ARX_STATE_CONSTANT) >>> 0;

  return (round: number, right: number): number => {
    let v0 = round >>> 0;
    let v1 = right >>> 0;
    let v2 = seedLo;
    let v3 = keyHi;

    for (let step = 0; step < ARX_MIX_STEPS; step++) {
      v0 = (v0 + v1) >>> 0;
      v1 = rotl32(v1, 5) ^ v0;
      v0 = rotl32(v0, 16);
      v2 = (v2 + v3) >>> 0;
      v3 = rotl32(v3, 8) ^ v2;
      v0 = (v0 + v3) >>> 0;
      v3 = rotl32(v3, 7) ^ v0;
      v2 = (v2 + v1) >>> 0;
      v1 = rotl32(v1, 13) ^ v2;
      v2 = rotl32(v2, 16);
    }

    return (v1 ^ v3) >>> 0;
  };
}
