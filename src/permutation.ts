/**
 * feistel-shuffle — Permutation factory.
 *
 * Builds an immutable `Permutation` from a configuration: parameters are
 * derived once, the round function strategy is chosen once, and every
 * `shuffle` call is a pure computation over them.
 */

import type {
  Permutation,
  PermutationConfig,
  PermutationParameters,
  RangeOptions,
  Result,
  RoundFunctionKind,
  ShuffleStep,
} from './types.js';
import { DEFAULT_ROUND_FUNCTION, DEFAULT_ROUNDS } from './types.js';
import type { ShuffleError } from './errors.js';
import { ShuffleContractError, indexOutOfRange, unsafeIntegerRange } from './errors.js';
import { buildParameters } from './params/parameter-builder.js';
import { createRoundFunction } from './round/round-function.js';
import { createFeistelCipher } from './feistel/feistel-core.js';
import type { Cipher } from './feistel/feistel-core.js';
import { foldDomain, walkDomain } from './feistel/domain-folder.js';
import { createCryptoSeedSource } from './seed/seed-source.js';

/** Largest range whose outputs all fit in a safe integer. */
const MAX_NUMBER_RANGE = BigInt(Number.MAX_SAFE_INTEGER) + 1n;

// ---------------------------------------------------------------------------
// Facade
// ---------------------------------------------------------------------------

function assemble(
  parameters: PermutationParameters,
  kind: RoundFunctionKind,
  cipher: Cipher,
): Permutation {
  const { range } = parameters;

  function requireIndex(index: bigint): void {
    if (index < 0n || index >= range) {
      throw new ShuffleContractError(indexOutOfRange(index, range));
    }
  }

  function shuffle(index: bigint): bigint {
    requireIndex(index);
    return foldDomain(cipher, range, index);
  }

  function* iterate(start: bigint, end: bigint): Generator<bigint, void, undefined> {
    for (let index = start; index < end; index++) {
      yield foldDomain(cipher, range, index);
    }
  }

  const permutation: Permutation = {
    parameters,
    roundFunction: kind,

    shuffle,

    at(index: number): number {
      if (range > MAX_NUMBER_RANGE) {
        throw new ShuffleContractError(unsafeIntegerRange(range));
      }
      if (!Number.isSafeInteger(index)) {
        throw new ShuffleContractError(indexOutOfRange(index, range));
      }
      return Number(shuffle(BigInt(index)));
    },

    walk(index: bigint): ShuffleStep {
      requireIndex(index);
      return walkDomain(cipher, range, index);
    },

    values(start = 0n, end = range): Generator<bigint, void, undefined> {
      // Checked before the generator is created, not on first next().
      if (start < 0n || start > range) {
        throw new ShuffleContractError(indexOutOfRange(start, range));
      }
      if (end < start || end > range) {
        throw new ShuffleContractError(indexOutOfRange(end, range));
      }
      return iterate(start, end);
    },
  };

  return Object.freeze(permutation);
}

// ---------------------------------------------------------------------------
// Factories
// ---------------------------------------------------------------------------

/**
 * Create a permutation, reporting invalid configuration as a Result.
 *
 * @param config - Range, seed, rounds and optional round function.
 * @returns The permutation or the first configuration error found.
 */
export function tryCreatePermutation(
  config: PermutationConfig,
): Result<Permutation, ShuffleError> {
  const parametersResult = buildParameters(config.range, config.seed, config.rounds);
  if (!parametersResult.ok) {
    return parametersResult;
  }
  const parameters = parametersResult.value;

  const kind = config.roundFunction ?? DEFAULT_ROUND_FUNCTION;
  const roundResult = createRoundFunction(kind, parameters.seed);
  if (!roundResult.ok) {
    return roundResult;
  }

  const cipher = createFeistelCipher(parameters, roundResult.value);
  return { ok: true, value: assemble(parameters, kind, cipher) };
}

/**
 * Create a permutation over `[0, config.range)`.
 *
 * @throws ShuffleContractError when the configuration is invalid (e.g. `range` 0).
 */
export function createPermutation(config: PermutationConfig): Permutation {
  const result = tryCreatePermutation(config);
  if (!result.ok) {
    throw new ShuffleContractError(result.error);
  }
  return result.value;
}

/**
 * Create a permutation with a seed drawn from `options.seedSource`
 * (default: the OS CSPRNG) and the default round count.
 *
 * @throws ShuffleContractError when `range` is invalid.
 */
export function createPermutationFromRange(
  range: bigint | number,
  options: RangeOptions = {},
): Permutation {
  const seedSource = options.seedSource ?? createCryptoSeedSource();
  return createPermutation({
    range,
    seed: seedSource.nextSeed(),
    rounds: options.rounds ?? DEFAULT_ROUNDS,
    roundFunction: options.roundFunction ?? DEFAULT_ROUND_FUNCTION,
  });
}
