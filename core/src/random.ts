/**
 * Source of uniformly distributed numbers in [0, 1).
 *
 * Every random choice in a run (avatar slot, transition kinds) goes through an
 * injected source so a seed reproduces the run.
 */
export interface RandomSource {
  next(): number;
}

export const mathRandomSource: RandomSource = {
  next: () => Math.random(),
};

/**
 * mulberry32 generator. Same seed, same sequence.
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return {
    next(): number {
      state = (state + 0x6d2b79f5) >>> 0;
      let t = state;
      t = Math.imul(t ^ (t >>> 15), t | 1);
      t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
      return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    },
  };
}

/**
 * Uniform integer in [min, max] (inclusive).
 */
export function randomInt(random: RandomSource, min: number, max: number): number {
  if (!Number.isInteger(min) || !Number.isInteger(max) || max < min) {
    throw new RangeError(`Invalid integer range [${min}, ${max}]`);
  }
  const span = max - min + 1;
  const value = Math.floor(random.next() * span);
  // Guards against a source that returns exactly 1.
  return min + Math.min(value, span - 1);
}

export function pickOne<T>(random: RandomSource, items: readonly T[]): T {
  if (items.length === 0) {
    throw new RangeError('Cannot pick from an empty list');
  }
  const item = items[randomInt(random, 0, items.length - 1)];
  if (item === undefined) {
    throw new RangeError('Random index fell outside the list');
  }
  return item;
}
