/**
 * Random number helpers. Every random choice in the engine goes through an
 * injected Rng so a seeded session replays identically.
 */

/** Returns a float in [0, 1) */
export type Rng = () => number;

/**
 * Small seeded PRNG (mulberry32).
 */
export function mulberry32(seed: number): Rng {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function createRng(seed?: number): Rng {
  return seed === undefined ? Math.random : mulberry32(seed);
}

/**
 * Integer in [min, max], both inclusive.
 */
export function randomInt(min: number, max: number, rng: Rng): number {
  return min + Math.floor(rng() * (max - min + 1));
}

/**
 * Uniform pick from a non-empty list.
 *
 * @throws Error if the list is empty
 */
export function pickRandom<T>(items: readonly T[], rng: Rng): T {
  if (items.length === 0) {
    throw new Error('Cannot pick from an empty list');
  }
  const index = Math.min(items.length - 1, Math.floor(rng() * items.length));
  return items[index];
}
