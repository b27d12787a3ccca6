/**
 * Randomness helpers.
 *
 * All selection code draws from a RandomSource so tests can pin the
 * sequence. A RandomSource returns a float in [0, 1), like Math.random.
 */

export type RandomSource = () => number;

export const defaultRandom: RandomSource = Math.random;

export function randomIndex(length: number, random: RandomSource): number {
  if (length <= 0) {
    throw new RangeError("Cannot pick from an empty list");
  }
  // Guard against sources that return exactly 1
  return Math.min(Math.floor(random() * length), length - 1);
}

export function pickOne<T>(items: readonly T[], random: RandomSource): T {
  return items[randomIndex(items.length, random)];
}

/** Fisher-Yates shuffle; returns a new array. */
export function shuffle<T>(items: readonly T[], random: RandomSource): T[] {
  const result = [...items];
  for (let i = result.length - 1; i > 0; i--) {
    const j = randomIndex(i + 1, random);
    [result[i], result[j]] = [result[j], result[i]];
  }
  return result;
}

/** Draw `count` distinct items without replacement. */
export function sample<T>(items: readonly T[], count: number, random: RandomSource): T[] {
  if (count > items.length) {
    throw new RangeError(`Cannot sample ${count} items from ${items.length}`);
  }
  const pool = [...items];
  const picked: T[] = [];
  for (let n = 0; n < count; n++) {
    const idx = randomIndex(pool.length, random);
    picked.push(pool[idx]);
    pool.splice(idx, 1);
  }
  return picked;
}

