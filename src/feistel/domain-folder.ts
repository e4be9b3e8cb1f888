/**
 * feistel-shuffle — Cycle walking
 *
 * Re-applies the superset cipher until the value falls inside `[0, range)`.
 * Because the cipher is a bijection, the walk from any in-domain start ends
 * at the next in-domain element of its cycle.
 */

import type { ShuffleStep } from '../types.js';
import type { Cipher } from './feistel-core.js';

/** Fold the cipher onto `[0, range)`. */
export function foldDomain(cipher: Cipher, range: bigint, value: bigint): bigint {
  let current = cipher(value);
  while (current >= range) {
    current = cipher(current);
  }
  return current;
}

/** `foldDomain` that also reports how many cipher applications were needed. */
export function walkDomain(cipher: Cipher, range: bigint, value: bigint): ShuffleStep {
  let current = cipher(value);
  let steps = 1;
  while (current >= range) {
    current = cipher(current);
    steps += 1;
  }
  return { value: current, steps };
}
