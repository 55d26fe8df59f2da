import seedrandom from 'seedrandom';

/** Returns a float in [0, 1). */
export type Rng = () => number;

export const DELAY_MIN = 1.0;
export const DELAY_MAX = 1.3;

/**
 * Create the generator shared by a simulation run. Without a seed the
 * generator is auto-seeded and runs are not reproducible.
 */
export function createRng(seed?: number | string): Rng {
  const prng =
    seed === undefined ? seedrandom() : seedrandom(String(seed));
  return () => prng();
}

export function uniform(rng: Rng, min: number, max: number): number {
  return min + rng() * (max - min);
}

export function delayMultiplier(rng: Rng): number {
  return uniform(rng, DELAY_MIN, DELAY_MAX);
}
