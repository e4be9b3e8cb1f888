/**
 * feistel-shuffle — Permutation validator
 *
 * Exhaustive check that a permutation maps `[0, range)` onto itself exactly
 * once per value, with cycle-walk cost statistics. Allocates one byte per
 * domain element, so it is meant for tests and audits of modest ranges.
 */

import type { Permutation, Result } from '../types.js';
import { DEFAULT_VERIFY_LIMIT } from '../types.js';
import type { ShuffleError } from '../errors.js';
import { verifyLimitExceeded } from '../errors.js';

// ---------------------------------------------------------------------------
// Report Types
// ---------------------------------------------------------------------------

/** Two inputs that produced the same output. */
export interface PermutationCollision {
  readonly firstIndex: bigint;
  readonly secondIndex: bigint;
  readonly value: bigint;
}

/** Result of an exhaustive permutation check. */
export interface PermutationReport {
  /** Whether every input mapped to a distinct in-range output. */
  readonly bijective: boolean;
  /** Number of inputs visited before stopping. */
  readonly checked: bigint;
  /** First repeated output, if any. */
  readonly collision: PermutationCollision | null;
  /** First output outside `[0, range)`, if any. */
  readonly outOfRange: { readonly index: bigint; readonly value: bigint } | null;
  /** Total Feistel applications across all visited inputs. */
  readonly totalSteps: number;
  /** Largest number of Feistel applications for a single input. */
  readonly maxSteps: number;
}

/** Options for `verifyPermutation`. */
export interface VerifyOptions {
  /** Refuse ranges above this. Default: 2^24. */
  readonly limit?: bigint;
}

// ---------------------------------------------------------------------------
// Validator
// ---------------------------------------------------------------------------

/**
 * Visit every input of `permutation` and confirm the outputs form a
 * permutation of `[0, range)`.
 *
 * Stops at the first collision or out-of-range output.
 */
export function verifyPermutation(
  permutation: Permutation,
  options: VerifyOptions = {},
): Result<PermutationReport, ShuffleError> {
  const { range } = permutation.parameters;
  const limit = options.limit ?? DEFAULT_VERIFY_LIMIT;
  if (range > limit) {
    return { ok: false, error: verifyLimitExceeded(range, limit) };
  }

  const size = Number(range);
  const seen = new Uint8Array(size);

  let totalSteps = 0;
  let maxSteps = 0;

  for (let i = 0; i < size; i++) {
    const index = BigInt(i);
    const { value, steps } = permutation.walk(index);
    totalSteps += steps;
    if (steps > maxSteps) {
      maxSteps = steps;
    }

    if (value < 0n || value >= range) {
      return {
        ok: true,
        value: {
          bijective: false,
          checked: index + 1n,
          collision: null,
          outOfRange: { index, value },
          totalSteps,
          maxSteps,
        },
      };
    }

    const slot = Number(value);
    if (seen[slot] === 1) {
      return {
        ok: true,
        value: {
          bijective: false,
          checked: index + 1n,
          collision: {
            firstIndex: findOwner(permutation, value, index),
            secondIndex: index,
            value,
          },
          outOfRange: null,
          totalSteps,
          maxSteps,
        },
      };
    }
    seen[slot] = 1;
  }

  return {
    ok: true,
    value: {
      bijective: true,
      checked: range,
      collision: null,
      outOfRange: null,
      totalSteps,
      maxSteps,
    },
  };
}

/** Rescan inputs below `before` for the one that produced `value`. */
function findOwner(
  permutation: Permutation,
  value: bigint,
  before: bigint,
): bigint {
  for (let index = 0n; index < before; index++) {
    if (permutation.shuffle(index) === value) {
      return index;
    }
  }
  return before;
}
