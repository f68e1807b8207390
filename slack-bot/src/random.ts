import type { Random } from "./types.js";

/** Integer in [min, max], both inclusive. */
export function randomInt(rng: Random, min: number, max: number): number {
  return min + Math.floor(rng() * (max - min + 1));
}

/**
 * Fisher-Yates shuffle (modern, from end to start).
 * Returns a **new** array; the input is never mutated.
 */
export function shuffle<T>(array: readonly T[], rng: Random): T[] {
  const result = array.slice();
  for (let i = result.length - 1; i > 0; i--) {
    const j = Math.floor(rng() * (i + 1));
    const tmp = result[i];
    result[i] = result[j];
    result[j] = tmp;
  }
  return result;
}

/** @throws {RangeError} if the array is empty. */
export function pick<T>(array: readonly T[], rng: Random): T {
  if (array.length === 0) {
    throw new RangeError("Cannot pick from an empty array");
  }
  return array[Math.floor(rng() * array.length)];
}
