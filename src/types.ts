/**
 * feistel-shuffle — Core type definitions
 *
 * All public types for format-preserving permutations over `[0, range)`.
 */

// ---------------------------------------------------------------------------
// Result Type
// ---------------------------------------------------------------------------

/** Success branch of a Result. */
export interface ResultOk<T> {
  readonly ok: true;
  readonly value: T;
}

/** Failure branch of a Result. */
export interface ResultErr<E> {
  readonly ok: false;
  readonly error: E;
}

/** Discriminated union for fallible operations. */
export type Result<T, E> = ResultOk<T> | ResultErr<E>;

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

/** Largest supported domain: the full unsigned 64-bit space. */
export const MAX_RANGE = 1n << 64n;

/** Default values for PermutationConfig. */
export const DEFAULT_ROUNDS = 3;
export const DEFAULT_ROUND_FUNCTION: RoundFunctionKind = 'arx';

/** Ranges above this are refused by `verifyPermutation` unless a limit is given. */
export const DEFAULT_VERIFY_LIMIT = 1n << 24n;

// ---------------------------------------------------------------------------
// Round Functions
// ---------------------------------------------------------------------------

/** Available round function strategies. */
export type RoundFunctionKind = 'arx' | 'sbox';

/**
 * Keyed mixing primitive invoked once per Feistel round. The seed is bound
 * when the function is created.
 *
 * `right` is an unsigned 32-bit half; the return value is an unsigned 32-bit
 * integer which the caller truncates to the active half width.
 */
export type RoundFunction = (round: number, right: number) => number;

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

/** Configuration for creating a permutation. */
export interface PermutationConfig {
  /** Domain size N; outputs cover `[0, range)`. Must be in `[1, 2^64]`. */
  readonly range: bigint | number;
  /** 64-bit key. Negative values are taken as their two's complement bit pattern. */
  readonly seed: bigint | number;
  /** Feistel rounds, a positive integer. Default: 3. */
  readonly rounds: number;
  /** Round function strategy. Default: 'arx'. */
  readonly roundFunction?: RoundFunctionKind;
}

/** Options for `createPermutationFromRange`. */
export interface RangeOptions {
  /** Entropy provider for the seed. Default: `node:crypto` random bytes. */
  readonly seedSource?: import('./seed/seed-source.js').SeedSource;
  readonly rounds?: number;
  readonly roundFunction?: RoundFunctionKind;
}

// ---------------------------------------------------------------------------
// Parameters
// ---------------------------------------------------------------------------

/** Immutable parameters derived once from a configuration. */
export interface PermutationParameters {
  readonly range: bigint;
  readonly seed: bigint;
  readonly rounds: number;
  /** Width of the half combined on odd rounds; receives the odd leftover bit. */
  readonly aBits: number;
  readonly bBits: number;
  readonly aMask: number;
  readonly bMask: number;
}

// ---------------------------------------------------------------------------
// Permutation
// ---------------------------------------------------------------------------

/** A single `shuffle` outcome with its cycle-walk cost. */
export interface ShuffleStep {
  /** The permuted value, in `[0, range)`. */
  readonly value: bigint;
  /** Number of Feistel applications needed to land inside the domain (>= 1). */
  readonly steps: number;
}

/** A keyed bijection over `[0, range)`. */
export interface Permutation {
  readonly parameters: PermutationParameters;
  readonly roundFunction: RoundFunctionKind;

  /** Map `index` to its position in the permuted order. Throws on `index >= range`. */
  shuffle(index: bigint): bigint;

  /** Number variant of `shuffle`; requires `range <= 2^53`. */
  at(index: number): number;

  /** `shuffle` with the number of Feistel applications it took. */
  walk(index: bigint): ShuffleStep;

  /** Yield `shuffle(i)` for `i` in `[start, end)`. Defaults to the whole domain. */
  values(start?: bigint, end?: bigint): Generator<bigint, void, undefined>;
}

// ---------------------------------------------------------------------------
// Re-export ShuffleError from errors module (type-only)
// ---------------------------------------------------------------------------

export type { ShuffleError, ShuffleErrorCode } from './errors.js';
