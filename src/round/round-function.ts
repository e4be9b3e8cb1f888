/**
 * feistel-shuffle — Round function selection
 *
 * Maps a strategy name to its keyed round function. The choice is made once
 * per permutation and never revisited.
 */

import type { Result, RoundFunction, RoundFunctionKind } from '../types.js';
import type { ShuffleError } from '../errors.js';
import { invalidRoundFunction } from '../errors.js';
import { createArxRound } from './arx-round.js';
import { createSboxRound } from './sbox-round.js';

/** Factories for each strategy. */
const ROUND_FACTORIES: Readonly<Record<RoundFunctionKind, (seed: bigint) => RoundFunction>> = {
  arx: createArxRound,
  sbox: createSboxRound,
};

/** Narrow an arbitrary string to a known strategy. */
export function isRoundFunctionKind(kind: string): kind is RoundFunctionKind {
  return Object.prototype.hasOwnProperty.call(ROUND_FACTORIES, kind);
}

/**
 * Create the round function for `kind`, keyed by `seed`.
 *
 * Unknown kinds yield `INVALID_ROUND_FUNCTION`.
 */
export function createRoundFunction(
  kind: string,
  seed: bigint,
): Result<RoundFunction, ShuffleError> {
  if (!isRoundFunctionKind(kind)) {
    return { ok: false, error: invalidRoundFunction(kind) };
  }
  return { ok: true, value: ROUND_FACTORIES[kind](seed) };
}
