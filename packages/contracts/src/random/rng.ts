/**
 * Anything that yields uniformly distributed numbers in [0, 1).
 * Combat policies and AI decisions take one of these, never Math.random.
 */
export interface RandomSource {
  next(): number;
}

/**
 * Random integer between min and max (inclusive)
 */
export function range(rng: RandomSource, min: number, max: number): number {
  return ~~(rng.next() * (max - min + 1)) + min;
}

/**
 * Random choice from an array; undefined when the array is empty.
 */
export function choice<T>(rng: RandomSource, array: readonly [T, ...T[]]): T;
export function choice<T>(rng: RandomSource, array: readonly T[]): T | undefined;
export function choice<T>(rng: RandomSource, array: readonly T[]): T | undefined {
  if (array.length === 0) return undefined;
  return array[range(rng, 0, array.length - 1)];
}

/**
 * Boolean with given probability
 */
export function probability(rng: RandomSource, chance: number): boolean {
  return rng.next() < chance;
}

/**
 * Mixes several integers into one 32-bit seed (FNV-1a over the words).
 * Used to give every (seed, turn, entity) triple its own stream.
 */
export function deriveSeed(...parts: readonly number[]): number {
  let hash = 0x811c9dc5;
  for (const part of parts) {
    let word = part >>> 0;
    for (let i = 0; i < 4; i++) {
      hash ^= word & 0xff;
      hash = Math.imul(hash, 0x01000193) >>> 0;
      word >>>= 8;
    }
  }
  return hash >>> 0;
}
