/**
 * feistel-shuffle — 32-bit word helpers
 *
 * Round functions work on unsigned 32-bit numbers; 64-bit keys are carried as
 * a (hi, lo) pair so no per-round bigint arithmetic is needed.
 */

/** A 64-bit value split into unsigned 32-bit halves. */
export interface Words64 {
  readonly hi: number;
  readonly lo: number;
}

/** Split an unsigned 64-bit bigint into words. */
export function splitWords(value: bigint): Words64 {
  return {
    hi: Number((value >> 32n) & 0xffffffffn),
    lo: Number(value & 0xffffffffn),
  };
}

/** Rotate an unsigned 32-bit word left by `shift` (0..31). */
export function rotl32(value: number, shift: number): number {
  if (shift === 0) {
    return value >>> 0;
  }
  return ((value << shift) | (value >>> (32 - shift))) >>> 0;
}

/** Rotate a 64-bit word pair left by `shift` (taken modulo 64). */
export function rotl64(words: Words64, shift: number): Words64 {
  let s = shift & 63;
  let { hi, lo } = words;

  if (s >= 32) {
    [hi, lo] = [lo, hi];
    s -= 32;
  }
  if (s === 0) {
    return { hi, lo };
  }

  return {
    hi: ((hi << s) | (lo >>> (32 - s))) >>> 0,
    lo: ((lo << s) | (hi >>> (32 - s))) >>> 0,
  };
}

/** XOR two 64-bit word pairs. */
export function xorWords(a: Words64, b: Words64): Words64 {
  return { hi: (a.hi ^ b.hi) >>> 0, lo: (a.lo ^ b.lo) >>> 0 };
}
