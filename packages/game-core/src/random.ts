// packages/game-core/src/random.ts
//
// Random sources for secret generation. Each session gets its own source so
// no generator state is shared between games, and tests can pass a seeded one.

/** Returns a float in [0, 1), like Math.random. */
export type RandomSource = () => number;

export const defaultRandom: RandomSource = () => Math.random();

/** 32-bit FNV-1a hash of a string. */
export function hashSeed(seed: string): number {
  let h = 2166136261;
  for (const ch of seed) {
    h ^= ch.charCodeAt(0);
    h = Math.imul(h, 16777619);
  }
  return h >>> 0;
}

/**
 * seededRandom returns a deterministic source for the given seed
 * (mulberry32 over the FNV-1a hash of the seed string).
 *
 * Example:
 *   const a = seededRandom('daily-42'); const b = seededRandom('daily-42');
 *   a() === b() // true
 */
export function seededRandom(seed: string): RandomSource {
  let state = hashSeed(seed);
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}
