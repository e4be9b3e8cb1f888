/**
 * feistel-shuffle — Feistel network
 *
 * Unbalanced Feistel network over `[0, 2^(aBits + bBits))`. Odd rounds add
 * into the `a`-wide half, even rounds into the `b`-wide half, so each round is
 * an invertible add-then-swap whatever the round function returns.
 */

import type { PermutationParameters, RoundFunction } from '../types.js';

/** A bijection over the power-of-two superset domain. */
export type Cipher = (value: bigint) => bigint;

/**
 * Build the Feistel cipher for the given parameters and round function.
 *
 * The returned function expects `value < 2^(aBits + bBits)`.
 */
export function createFeistelCipher(
  parameters: PermutationParameters,
  roundFunction: RoundFunction,
): Cipher {
  const { rounds, aBits, aMask, bMask } = parameters;
  const shift = BigInt(aBits);
  const lowMask = BigInt(aMask);
  const oddRounds = (rounds & 1) === 1;

  return (value: bigint): bigint => {
    let left = Number(value & lowMask);
    let right = Number(value >> shift);

    for (let round = 1; round <= rounds; round++) {
      const mask = (round & 1) === 1 ? aMask : bMask;
      const mixed = ((left + roundFunction(round, right)) & mask) >>> 0;
      left = right;
      right = mixed;
    }

    // After an odd number of rounds the a-wide half sits in `right`.
    if (oddRounds) {
      return (BigInt(left) << shift) + BigInt(right);
    }
    return (BigInt(right) << shift) + BigInt(left);
  };
}
