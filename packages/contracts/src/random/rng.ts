/**
 * Helpers that turn any `() => number` source in [0, 1) into integers,
 * picks and shuffles.
 */

/**
 * Random integer between min and max (inclusive)
 * @param rng - Random number generator function (returns 0 to 1)
 */
export function range(rng: () => number, min: number, max: number): number {
  return ~~(rng() * (max - min + 1)) + min;
}

/**
 * Random choice from an array. Returns undefined for an empty array.
 */
export function choice<T>(rng: () => number, array: readonly [T, ...T[]]): T;
export function choice<T>(rng: () => number, array: readonly T[]): T | undefined;
export function choice<T>(rng: () => number, array: readonly T[]): T | undefined {
  if (array.length === 0) return undefined;
  return array[range(rng, 0, array.length - 1)];
}

/**
 * Fisher-Yates shuffle into a new array; the input is left untouched.
 */
export function shuffle<T>(rng: () => number, array: readonly T[]): T[] {
  const result: T[] = Array.from(array);
  for (let i = result.length - 1; i > 0; i--) {
    const j = range(rng, 0, i);
    const temp = result[i] as T;
    result[i] = result[j] as T;
    result[j] = temp;
  }
  return result;
}

/**
 * True with the given probability (0 to 1).
 */
export function probability(rng: () => number, chance: number): boolean {
  return rng() < chance;
}
