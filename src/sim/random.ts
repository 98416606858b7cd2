/**
 * Pseudo-random source threaded through a simulation run. Every random choice
 * (initiators, background traffic, non-FIFO insertion points) draws from the
 * source handed to the run, so a seeded source replays the same trace.
 */
export interface RandomSource {
  /** Returns a float in `[0, 1)`. */
  next(): number;
}

const MODULUS = 2147483647; // 2^31 - 1
const MULTIPLIER = 48271; // Park–Miller recommended multiplier

/** Source backed by {@link Math.random}; the non-deterministic default. */
export const systemRandom: RandomSource = {
  next: () => Math.random(),
};

/**
 * Folds a seed token into a strictly positive 31-bit state with a polynomial
 * rolling hash. Numbers are folded through their decimal representation.
 */
function deriveSeed(token: string | number): number {
  const text = String(token);
  let hash = 0;
  for (let index = 0; index < text.length; index += 1) {
    hash = (hash * 31 + text.charCodeAt(index)) % MODULUS;
  }
  // The generator never leaves zero, so fall back to 1.
  return hash === 0 ? 1 : hash;
}

/** Park–Miller linear congruential generator seeded from {@link seed}. */
export function createSeededRandom(seed: string | number): RandomSource {
  let state = deriveSeed(seed);
  return {
    next: () => {
      state = (state * MULTIPLIER) % MODULUS;
      return (state - 1) / (MODULUS - 1);
    },
  };
}

/** Uniform integer in `[0, bound)`. */
export function randomIndex(random: RandomSource, bound: number): number {
  if (bound <= 0) {
    throw new RangeError(`randomIndex expects a positive bound, received ${bound}`);
  }
  return Math.min(bound - 1, Math.floor(random.next() * bound));
}

/** Uniform element of a non-empty list. */
export function pickOne<T>(random: RandomSource, items: readonly T[]): T {
  const item = items[randomIndex(random, items.length)];
  if (item === undefined) {
    throw new RangeError("pickOne expects a non-empty list");
  }
  return item;
}

/**
 * Uniform selection of `amount` distinct elements (fewer when the list is
 * shorter) using a partial Fisher–Yates shuffle over a copy.
 */
export function pickMany<T>(random: RandomSource, items: readonly T[], amount: number): T[] {
  const pool = [...items];
  const count = Math.max(0, Math.min(amount, pool.length));
  for (let index = 0; index < count; index += 1) {
    const swap = index + randomIndex(random, pool.length - index);
    [pool[index], pool[swap]] = [pool[swap], pool[index]];
  }
  return pool.slice(0, count);
}
