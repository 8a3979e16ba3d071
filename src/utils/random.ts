export type RandomSource = () => number;

// murmur3 finalizer, spreads neighbouring seeds over the whole state space
function fmix32(value: number): number {
  let h = value >>> 0;
  h = Math.imul(h ^ (h >>> 16), 0x85ebca6b);
  h = Math.imul(h ^ (h >>> 13), 0xc2b2ae35);
  return (h ^ (h >>> 16)) >>> 0;
}

/** Folds the bits above 32 back in, so `s` and `s + 2^32` seed different streams. */
function scrambleSeed(seed: number): number {
  const high = Math.floor(seed / 4294967296);
  return fmix32((seed >>> 0) ^ fmix32(high));
}

/** Linear congruential stream in [0, 1); identical seeds give identical streams. */
export function createSeededRng(seed: number): RandomSource {
  let state = scrambleSeed(seed);
  return () => {
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
    return state / 4294967296;
  };
}

export function randomIndex(rng: RandomSource, length: number): number {
  const value = rng();
  if (!Number.isFinite(value) || value <= 0) return 0;
  if (value >= 1) return length - 1;
  return Math.floor(value * length);
}

export function generateSeed(): number {
  return Date.now() % 2147483647;
}
