/**
 * Seedable pseudorandom source owned by a render session. Never shared between
 * sessions, so tests can pin every random choice with a seed.
 */
export interface RandomSource {
  /** Uniform float in [0, 1) */
  next(): number;
  /** Uniform float in [min, max) */
  uniform(min: number, max: number): number;
  /** Uniform integer in [min, max], both ends inclusive */
  int(min: number, max: number): number;
}

/**
 * xorshift32. A zero seed would lock the generator at zero, so it is replaced by 1.
 */
export function createRandom(seed: number): RandomSource {
  let state = seed >>> 0 || 1;

  const next = () => {
    let x = state;
    x ^= x << 13;
    x ^= x >>> 17;
    x ^= x << 5;
    state = x >>> 0 || 1;
    return state / 4294967296;
  };

  return {
    next,
    uniform: (min, max) => min + next() * (max - min),
    int: (min, max) => min + Math.floor(next() * (max - min + 1)),
  };
}

/** Seed from the wall clock for sessions that do not ask for reproducibility */
export const randomSeed = (): number => Date.now() >>> 0;
