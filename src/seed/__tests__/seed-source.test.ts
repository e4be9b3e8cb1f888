/**
 * feistel-shuffle — Seed source unit tests
 */

import { describe, it, expect } from 'vitest';
import { createCryptoSeedSource, createFixedSeedSource } from '../seed-source.js';

describe('createCryptoSeedSource', () => {
  it('returns unsigned 64-bit seeds', () => {
    const source = createCryptoSeedSource();
    for (let i = 0; i < 20; i++) {
      const seed = source.nextSeed();
      expect(typeof seed).toBe('bigint');
      expect(seed >= 0n && seed < 1n << 64n).toBe(true);
    }
  });

  it('returns fresh seeds on each call', () => {
    const source = createCryptoSeedSource();
    const seeds = new Set<bigint>();
    for (let i = 0; i < 20; i++) {
      seeds.add(source.nextSeed());
    }
    expect(seeds.size).toBe(20);
  });
});

describe('createFixedSeedSource', () => {
  it('always returns the configured seed', () => {
    const source = createFixedSeedSource(1234n);
    expect(source.nextSeed()).toBe(1234n);
    expect(source.nextSeed()).toBe(1234n);
  });

  it('reduces the seed to 64 bits', () => {
    expect(createFixedSeedSource(-1n).nextSeed()).toBe((1n << 64n) - 1n);
    expect(createFixedSeedSource((1n << 64n) + 3n).nextSeed()).toBe(3n);
  });
});
