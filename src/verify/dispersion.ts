/**
 * feistel-shuffle — Dispersion measurement
 *
 * Counts how often consecutive outputs go up versus down. A well-mixed
 * permutation has roughly as many ascents as descents; a near-monotonic
 * round function shows up as a large imbalance.
 */

import type { Permutation } from '../types.js';

/** Ascent/descent counts over a run of consecutive inputs. */
export interface DispersionReport {
  /** Pairs where `shuffle(i) > shuffle(i - 1)`. */
  readonly ascents: number;
  /** Pairs where `shuffle(i) < shuffle(i - 1)`. */
  readonly descents: number;
  /** `ascents - descents`. */
  readonly imbalance: number;
}

/**
 * Measure dispersion over inputs `[start, start + count)`.
 *
 * @throws ShuffleContractError when the run leaves the permutation's domain.
 */
export function measureDispersion(
  permutation: Permutation,
  start: bigint,
  count: number,
): DispersionReport {
  let ascents = 0;
  let descents = 0;
  let previous: bigint | null = null;

  for (const value of permutation.values(start, start + BigInt(count))) {
    if (previous !== null) {
      if (value > previous) {
        ascents += 1;
      } else if (value < previous) {
        descents += 1;
      }
    }
    previous = value;
  }

  return { ascents, descents, imbalance: ascents - descents };
}
