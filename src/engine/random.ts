import seedrandom from "seedrandom";

import { clampInt } from "@/lib/util";

/** Uniform source in [0, 1). Every engine function takes one explicitly. */
export type Rng = () => number;

export function createRng(seed?: string | number): Rng {
  const prng = seed === undefined ? seedrandom() : seedrandom(String(seed));
  return () => prng();
}

/** Inclusive on both ends. */
export function randomInt(random: Rng, min: number, max: number): number {
  if (max <= min) {
    return min;
  }
  return clampInt(min + Math.floor(random() * (max - min + 1)), min, max);
}

export function pick<T>(random: Rng, items: readonly T[]): T | undefined {
  if (items.length === 0) {
    return undefined;
  }
  return items[randomInt(random, 0, items.length - 1)];
}

export function shuffle<T>(random: Rng, items: readonly T[]): T[] {
  const result = [...items];
  for (let i = result.length - 1; i > 0; i -= 1) {
    const j = randomInt(random, 0, i);
    [result[i], result[j]] = [result[j], result[i]];
  }
  return result;
}

/** Draws without replacement; returns every item when `count` exceeds the pool. */
export function sample<T>(random: Rng, items: readonly T[], count: number): T[] {
  const pool = [...items];
  const take = Math.max(0, Math.min(count, pool.length));
  for (let i = 0; i < take; i += 1) {
    const j = randomInt(random, i, pool.length - 1);
    [pool[i], pool[j]] = [pool[j], pool[i]];
  }
  return pool.slice(0, take);
}
