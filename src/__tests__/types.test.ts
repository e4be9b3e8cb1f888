import { describe, it, expect } from 'vitest';
import type {
  Result,
  RoundFunctionKind,
  PermutationConfig,
  PermutationParameters,
  ShuffleStep,
  ShuffleError,
  ShuffleErrorCode,
} from '../types.js';
import {
  MAX_RANGE,
  DEFAULT_ROUNDS,
  DEFAULT_ROUND_FUNCTION,
  DEFAULT_VERIFY_LIMIT,
} from '../types.js';
import { invalidRange, indexOutOfRange } from '../errors.js';
import * as api from '../index.js';

// ---------------------------------------------------------------------------
// Helpers — compile-time type assertions
// ---------------------------------------------------------------------------

/**
 * Asserts that the value is assignable to T. Compilation fails if not.
 */
function assertType<T>(_value: T): void {
  // compile-time only
}

// ---------------------------------------------------------------------------
// Default Constants
// ---------------------------------------------------------------------------

describe('default constants', () => {
  it('has correct default values', () => {
    expect(MAX_RANGE).toBe(18_446_744_073_709_551_616n);
    expect(DEFAULT_ROUNDS).toBe(3);
    expect(DEFAULT_ROUND_FUNCTION).toBe('arx');
    expect(DEFAULT_VERIFY_LIMIT).toBe(16_777_216n);
  });
});

// ---------------------------------------------------------------------------
// Result<T, E>
// ---------------------------------------------------------------------------

describe('Result type', () => {
  it('narrows on ok: true', () => {
    const result: Result<bigint, ShuffleError> = { ok: true, value: 42n };
    if (result.ok) {
      expect(result.value).toBe(42n);
      assertType<bigint>(result.value);
    }
  });

  it('narrows on ok: false', () => {
    const result: Result<bigint, ShuffleError> = {
      ok: false,
      error: invalidRange(0n, 'must be greater than zero'),
    };
    if (!result.ok) {
      expect(result.error.code).toBe('INVALID_RANGE');
      assertType<ShuffleError>(result.error);
    }
  });
});

// ---------------------------------------------------------------------------
// Configuration and parameters
// ---------------------------------------------------------------------------

describe('PermutationConfig', () => {
  it('accepts number and bigint fields', () => {
    const fromNumbers: PermutationConfig = { range: 10, seed: 1, rounds: 3 };
    const fromBigints: PermutationConfig = { range: 10n, seed: 1n, rounds: 3, roundFunction: 'sbox' };
    expect(fromNumbers.range).toBe(10);
    expect(fromBigints.roundFunction).toBe('sbox');
  });
});

describe('PermutationParameters', () => {
  it('is a plain value type', () => {
    const params: PermutationParameters = {
      range: 100n,
      seed: 0n,
      rounds: 4,
      aBits: 4,
      bBits: 3,
      aMask: 15,
      bMask: 7,
    };
    expect(params.aMask).toBe(2 ** params.aBits - 1);
  });
});

describe('ShuffleStep', () => {
  it('pairs a value with its step count', () => {
    const step: ShuffleStep = { value: 3n, steps: 2 };
    expect(step.steps).toBe(2);
  });
});

describe('RoundFunctionKind', () => {
  it('covers both strategies', () => {
    const kinds: RoundFunctionKind[] = ['arx', 'sbox'];
    expect(kinds).toHaveLength(2);
  });
});

// ---------------------------------------------------------------------------
// ShuffleError
// ---------------------------------------------------------------------------

describe('ShuffleError', () => {
  it('discriminates on code', () => {
    const error: ShuffleError = indexOutOfRange(5n, 4n);
    if (error.code === 'INDEX_OUT_OF_RANGE') {
      assertType<bigint | number>(error.index);
      expect(error.range).toBe(4n);
    }
  });

  it('lists every code', () => {
    const codes: ShuffleErrorCode[] = [
      'INVALID_RANGE',
      'INVALID_SEED',
      'INVALID_ROUNDS',
      'INVALID_ROUND_FUNCTION',
      'INDEX_OUT_OF_RANGE',
      'UNSAFE_INTEGER_RANGE',
      'INVALID_DESCRIPTOR',
      'VERIFY_LIMIT_EXCEEDED',
    ];
    expect(new Set(codes).size).toBe(8);
  });
});

// ---------------------------------------------------------------------------
// Package entry point
// ---------------------------------------------------------------------------

describe('package exports', () => {
  it('exposes the factories', () => {
    expect(typeof api.createPermutation).toBe('function');
    expect(typeof api.tryCreatePermutation).toBe('function');
    expect(typeof api.createPermutationFromRange).toBe('function');
    expect(typeof api.serializePermutation).toBe('function');
    expect(typeof api.restorePermutation).toBe('function');
    expect(typeof api.verifyPermutation).toBe('function');
    expect(typeof api.measureDispersion).toBe('function');
  });

  it('exposes the contract error', () => {
    expect(new api.ShuffleContractError(api.invalidRounds(0))).toBeInstanceOf(Error);
  });
});
