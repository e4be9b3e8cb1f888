/**
 * feistel-shuffle — Substitution-table round function
 *
 * With (hi, lo) = rotl64(seed ^ K, round), `t = lo ^ rotl32(hi, 16) ^ right`
 * is split into four bytes. Each byte indexes one of the four tables for the
 * round's parity and the lookups are XORed.
 */

import type { RoundFunction } from '../types.js';
import { SBOX_TABLES } from './sbox-tables.js';
import { rotl32, rotl64, splitWords, xorWords } from './words.js';

/** Mixed into the seed so a zero seed still varies with the round index. */
export const SBOX_KEY_CONSTANT = 0x9e3779b97f4a7c15n;

/**
 * Create a substitution-table round function keyed by `seed`.
 *
 * @param seed - Unsigned 64-bit key.
 */
export function createSboxRound(seed: bigint): RoundFunction {
  const key = xorWords(splitWords(seed), splitWords(SBOX_KEY_CONSTANT));

  return (round: number, right: number): number => {
    const rotated = rotl64(key, round);
    const t = (rotated.lo ^ rotl32(rotated.hi, 16) ^ right) >>> 0;
    const base = (round & 1) === 1 ? 0 : 4;

    return (
      (SBOX_TABLES[base][t & 0xff] ^
        SBOX_TABLES[base + 1][(t >>> 8) & 0xff] ^
        SBOX_TABLES[base + 2][(t >>> 16) & 0xff] ^
        SBOX_TABLES[base + 3][t >>> 24]) >>>
      0
    );
  };
}
