/**
 * feistel-shuffle — Substitution tables
 *
 * Eight 256-entry tables of unsigned 32-bit values, generated once at module
 * load from a fixed-seed Mulberry32 stream and frozen. Tables 0–3 serve odd
 * rounds, 4–7 even rounds.
 */

/** Number of tables. */
export const SBOX_TABLE_COUNT = 8;

/** Entries per table (one per byte value). */
export const SBOX_TABLE_SIZE = 256;

/** Fixed seed of the generating stream. Changing it changes every table. */
export const SBOX_GENERATOR_SEED = 0x5eed5b0c;

/**
 * Advance the Mulberry32 state by one step.
 *
 * @returns Tuple of [output, nextState].
 */
function mulberry32Step(state: number): readonly [number, number] {
  let t = (state + 0x6d2b79f5) | 0;
  const nextState = t;
  t = Math.imul(t ^ (t >>> 15), t | 1);
  t = (t + Math.imul(t ^ (t >>> 7), t | 61)) ^ t;
  const output = (t ^ (t >>> 14)) >>> 0;
  return [output, nextState] as const;
}

/** Generate the tables from the fixed seed. */
function generateTables(seed: number): readonly (readonly number[])[] {
  let state = seed | 0;
  const tables: (readonly number[])[] = [];

  for (let t = 0; t < SBOX_TABLE_COUNT; t++) {
    const table: number[] = [];
    for (let i = 0; i < SBOX_TABLE_SIZE; i++) {
      const [output, nextState] = mulberry32Step(state);
      state = nextState;
      table.push(output);
    }
    tables.push(Object.freeze(table));
  }

  return Object.freeze(tables);
}

/** Process-wide read-only substitution tables. */
export const SBOX_TABLES: readonly (readonly number[])[] = generateTables(SBOX_GENERATOR_SEED);
