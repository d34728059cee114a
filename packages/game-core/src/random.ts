// packages/game-core/src/random.ts
//
// Random sources for word selection. `Math.random` is the default; a string
// seed gives a deterministic source for daily/seeded play and for tests.

/** Returns a number in [0, 1). */
export type RandomSource = () => number;

/**
 * FNV-1a hash of the seed string, as an unsigned 32-bit integer.
 */
export function hashSeed(seed: string): number {
  let h = 2166136261;
  for (const ch of seed) {
    h ^= ch.charCodeAt(0);
    h = Math.imul(h, 16777619);
  }
  return h >>> 0;
}

/**
 * Mulberry32 PRNG seeded from a string. Same seed, same sequence.
 */
export function createSeededRandom(seed: string): RandomSource {
  let state = hashSeed(seed);
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Picks an index in [0, length) from a random source. Values outside [0, 1)
 * are clamped to the nearest end; NaN picks the first index.
 */
export function pickIndex(length: number, random: RandomSource): number {
  const index = Math.floor(random() * length);
  if (Number.isNaN(index)) return 0;
  return Math.max(0, Math.min(length - 1, index));
}
