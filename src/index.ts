/**
 * feistel-shuffle — Deterministic, collision-free permutations of `[0, N)` without materializing the domain.
 *
 * @packageDocumentation
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type {
  Result,
  ResultOk,
  ResultErr,
  RoundFunction,
  RoundFunctionKind,
  PermutationConfig,
  RangeOptions,
  PermutationParameters,
  ShuffleStep,
  Permutation,
  ShuffleError,
  ShuffleErrorCode,
} from './types.js';

export {
  MAX_RANGE,
  DEFAULT_ROUNDS,
  DEFAULT_ROUND_FUNCTION,
  DEFAULT_VERIFY_LIMIT,
} from './types.js';

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export {
  ShuffleContractError,
  describeError,
  invalidRange,
  invalidSeed,
  invalidRounds,
  invalidRoundFunction,
  indexOutOfRange,
  unsafeIntegerRange,
  invalidDescriptor,
  verifyLimitExceeded,
} from './errors.js';

// ---------------------------------------------------------------------------
// Permutations
// ---------------------------------------------------------------------------

export {
  createPermutation,
  tryCreatePermutation,
  createPermutationFromRange,
} from './permutation.js';

export { buildParameters } from './params/parameter-builder.js';

export type { SeedSource } from './seed/seed-source.js';
export { createCryptoSeedSource, createFixedSeedSource } from './seed/seed-source.js';

// ---------------------------------------------------------------------------
// Descriptors
// ---------------------------------------------------------------------------

export { serializePermutation, DESCRIPTOR_SIZE } from './descriptor/serializer.js';
export { deserializePermutation, restorePermutation } from './descriptor/deserializer.js';

// ---------------------------------------------------------------------------
// Verification
// ---------------------------------------------------------------------------

export type {
  PermutationReport,
  PermutationCollision,
  VerifyOptions,
} from './verify/permutation-validator.js';
export { verifyPermutation } from './verify/permutation-validator.js';

export type { DispersionReport } from './verify/dispersion.js';
export { measureDispersion } from './verify/dispersion.js';
