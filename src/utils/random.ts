import seedrandom from "seedrandom";

/**
 * Source of uniformly distributed numbers in `[0, 1)`. Randomised steps take
 * one explicitly instead of reaching for a shared global generator, so a run
 * can be replayed by passing the same seed again.
 */
export interface RandomSource {
  next(): number;
}

/**
 * Creates a {@link RandomSource}. With a seed the sequence is reproducible;
 * without one the generator is seeded from fresh entropy on every call.
 */
export function createRandomSource(seed?: string | number): RandomSource {
  const prng = seed === undefined ? seedrandom() : seedrandom(String(seed));
  return { next: () => prng() };
}

/** Integer in `[0, bound)`. */
export function nextInt(random: RandomSource, bound: number): number {
  return Math.floor(random.next() * bound);
}

/** Fisher–Yates shuffle performed in place. */
export function shuffleInPlace<T extends { length: number; [index: number]: number }>(
  values: T,
  random: RandomSource,
): T {
  for (let index = values.length - 1; index > 0; index -= 1) {
    const swapWith = nextInt(random, index + 1);
    const held = values[index];
    values[index] = values[swapWith];
    values[swapWith] = held;
  }
  return values;
}
