export type RandomSource = () => number;

export const DEFAULT_SEED = 42;

// mulberry32: 32-bit state, floats in [0, 1).
export const createRandom = (seed: number): RandomSource => {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
};

export const randomIndex = (random: RandomSource, length: number): number =>
  Math.min(length - 1, Math.floor(random() * length));
