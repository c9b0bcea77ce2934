/**
 * Random sources for plan generation
 * A source returns a float in [0, 1), like Math.random
 */

export type RandomSource = () => number;

export const defaultRandom: RandomSource = Math.random;

/**
 * Reproducible source (mulberry32) for tests and replays
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Uniform pick, undefined for an empty list
 */
export function pickOne<T>(items: readonly T[], random: RandomSource): T | undefined {
  if (items.length === 0) return undefined;
  const index = Math.min(Math.floor(random() * items.length), items.length - 1);
  return items[index];
}
