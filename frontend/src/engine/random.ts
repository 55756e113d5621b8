/** Returns a float in [0, 1). */
export type RandomSource = () => number;

export const defaultRandom: RandomSource = () => Math.random();

/**
 * Seedable generator for reproducible bomb draws.
 * Mulberry32: same seed, same sequence.
 */
export function createSeededRandom(seed: number): RandomSource {
  let s = seed >>> 0;
  return function next(): number {
    let t = (s = (s + 0x6d2b79f5) >>> 0);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Uniform integer in [1, n]. */
export function drawIndex(random: RandomSource, n: number): number {
  const r = random();
  if (!(r >= 0 && r < 1)) throw new RangeError(`random source returned ${r}, expected [0, 1)`);
  return Math.floor(r * n) + 1;
}

const ID_ALPHABET = 'ABCDEFGHJKLMNPQRSTUVWXYZ23456789';

export function rid(random: RandomSource, len = 6) {
  return Array.from({ length: len }, () => ID_ALPHABET[Math.floor(random() * ID_ALPHABET.length)]).join('');
}
