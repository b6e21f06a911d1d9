/**
 * Injected randomness.
 *
 * Every random branch in the negotiation core draws from a RandomSource handed
 * in by the caller, so a fixed seed replays a round exactly.
 */

import seedrandom from 'seedrandom';

export interface RandomSource {
  /** Float in [0, 1). */
  next(): number;
}

/** Seeded stream over seedrandom's ARC4 generator. */
export class SeededRandom implements RandomSource {
  private readonly prng: seedrandom.PRNG;

  constructor(seed: number | string) {
    this.prng = seedrandom(String(seed));
  }

  next(): number {
    return this.prng();
  }
}

export function uniform(rng: RandomSource, min: number, max: number): number {
  return min + (max - min) * rng.next();
}

export function chance(rng: RandomSource, probability: number): boolean {
  return rng.next() < probability;
}

/**
 * Weighted draw. Entries with non-positive weight are never picked.
 * Returns undefined when nothing has positive weight.
 */
export function pickWeighted<T>(rng: RandomSource, entries: ReadonlyArray<readonly [T, number]>): T | undefined {
  let total = 0;
  for (const [, weight] of entries) {
    if (weight > 0) total += weight;
  }
  if (total <= 0) return undefined;

  let roll = rng.next() * total;
  let last: T | undefined;
  for (const [item, weight] of entries) {
    if (weight <= 0) continue;
    last = item;
    roll -= weight;
    if (roll < 0) return item;
  }
  return last;
}

export function pickOne<T>(rng: RandomSource, items: readonly T[]): T | undefined {
  if (items.length === 0) return undefined;
  return items[Math.floor(rng.next() * items.length)];
}

/** k items without replacement, in draw order. */
export function sample<T>(rng: RandomSource, items: readonly T[], k: number): T[] {
  const pool = [...items];
  const picked: T[] = [];
  while (picked.length < k && pool.length > 0) {
    const index = Math.floor(rng.next() * pool.length);
    picked.push(...pool.splice(index, 1));
  }
  return picked;
}
