import type { Random } from './types.js';

export const mathRandom: Random = () => Math.random();

/** Mulberry32. The same seed always yields the same sequence. */
export function createSeededRandom(seed: number): Random {
  let s = seed >>> 0;
  return () => {
    let t = (s = (s + 0x6d2b79f5) >>> 0);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}
