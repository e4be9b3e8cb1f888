/**
 * feistel-shuffle — Error types
 *
 * Discriminated union of all errors the library can produce, factory functions
 * for each variant, and the Error subclass thrown on contract violations.
 */

// ---------------------------------------------------------------------------
// Error Codes
// ---------------------------------------------------------------------------

/** All possible error codes. */
export type ShuffleErrorCode =
  | 'INVALID_RANGE'
  | 'INVALID_SEED'
  | 'INVALID_ROUNDS'
  | 'INVALID_ROUND_FUNCTION'
  | 'INDEX_OUT_OF_RANGE'
  | 'UNSAFE_INTEGER_RANGE'
  | 'INVALID_DESCRIPTOR'
  | 'VERIFY_LIMIT_EXCEEDED';

// ---------------------------------------------------------------------------
// Error Union
// ---------------------------------------------------------------------------

/** Discriminated union of all errors. */
export type ShuffleError =
  | {
      readonly code: 'INVALID_RANGE';
      readonly range: bigint | number;
      readonly reason: string;
    }
  | {
      readonly code: 'INVALID_SEED';
      readonly seed: bigint | number;
      readonly reason: string;
    }
  | {
      readonly code: 'INVALID_ROUNDS';
      readonly rounds: number;
    }
  | {
      readonly code: 'INVALID_ROUND_FUNCTION';
      readonly kind: string;
    }
  | {
      readonly code: 'INDEX_OUT_OF_RANGE';
      readonly index: bigint | number;
      readonly range: bigint;
    }
  | {
      readonly code: 'UNSAFE_INTEGER_RANGE';
      readonly range: bigint;
    }
  | {
      readonly code: 'INVALID_DESCRIPTOR';
      readonly reason: string;
    }
  | {
      readonly code: 'VERIFY_LIMIT_EXCEEDED';
      readonly range: bigint;
      readonly limit: bigint;
    };

// ---------------------------------------------------------------------------
// Error Constructors
// ---------------------------------------------------------------------------

/** Create an INVALID_RANGE error. */
export function invalidRange(range: bigint | number, reason: string): ShuffleError {
  return { code: 'INVALID_RANGE', range, reason } as const;
}

/** Create an INVALID_SEED error. */
export function invalidSeed(seed: bigint | number, reason: string): ShuffleError {
  return { code: 'INVALID_SEED', seed, reason } as const;
}

/** Create an INVALID_ROUNDS error. */
export function invalidRounds(rounds: number): ShuffleError {
  return { code: 'INVALID_ROUNDS', rounds } as const;
}

/** Create an INVALID_ROUND_FUNCTION error. */
export function invalidRoundFunction(kind: string): ShuffleError {
  return { code: 'INVALID_ROUND_FUNCTION', kind } as const;
}

/** Create an INDEX_OUT_OF_RANGE error. */
export function indexOutOfRange(index: bigint | number, range: bigint): ShuffleError {
  return { code: 'INDEX_OUT_OF_RANGE', index, range } as const;
}

/** Create an UNSAFE_INTEGER_RANGE error. */
export function unsafeIntegerRange(range: bigint): ShuffleError {
  return { code: 'UNSAFE_INTEGER_RANGE', range } as const;
}

/** Create an INVALID_DESCRIPTOR error. */
export function invalidDescriptor(reason: string): ShuffleError {
  return { code: 'INVALID_DESCRIPTOR', reason } as const;
}

/** Create a VERIFY_LIMIT_EXCEEDED error. */
export function verifyLimitExceeded(range: bigint, limit: bigint): ShuffleError {
  return { code: 'VERIFY_LIMIT_EXCEEDED', range, limit } as const;
}

// ---------------------------------------------------------------------------
// Formatting
// ---------------------------------------------------------------------------

/** Render an error as a one-line message. */
export function describeError(error: ShuffleError): string {
  switch (error.code) {
    case 'INVALID_RANGE':
      return `Invalid range ${String(error.range)}: ${error.reason}`;
    case 'INVALID_SEED':
      return `Invalid seed ${String(error.seed)}: ${error.reason}`;
    case 'INVALID_ROUNDS':
      return `Invalid round count ${String(error.rounds)}: must be a positive integer`;
    case 'INVALID_ROUND_FUNCTION':
      return `Unknown round function: ${error.kind}`;
    case 'INDEX_OUT_OF_RANGE':
      return `Index ${String(error.index)} is outside [0, ${String(error.range)})`;
    case 'UNSAFE_INTEGER_RANGE':
      return `Range ${String(error.range)} exceeds Number.MAX_SAFE_INTEGER + 1; use shuffle() with bigint`;
    case 'INVALID_DESCRIPTOR':
      return `Invalid descriptor: ${error.reason}`;
    case 'VERIFY_LIMIT_EXCEEDED':
      return `Range ${String(error.range)} exceeds verification limit ${String(error.limit)}`;
  }
}

// ---------------------------------------------------------------------------
// Thrown Error
// ---------------------------------------------------------------------------

/**
 * Thrown when a caller breaks the construction or `shuffle` contract.
 * Carries the typed error for programmatic inspection.
 */
export class ShuffleContractError extends Error {
  readonly error: ShuffleError;

  constructor(error: ShuffleError) {
    super(describeError(error));
    this.name = 'ShuffleContractError';
    this.error = error;
  }
}
