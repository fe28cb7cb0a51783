import type { RandomSource } from '../types/index.js';

const DEFAULT_SEED = 1337;

// Linear congruential generator; same seed, same sequence
export function createSeededRandom(seed?: number): RandomSource {
  let state = (seed ?? DEFAULT_SEED) >>> 0;
  if (state === 0) {
    state = DEFAULT_SEED;
  }
  return () => {
    state = (state * 1664525 + 1013904223) >>> 0;
    return state / 0x100000000;
  };
}
