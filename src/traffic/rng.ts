export type RandomFn = () => number;

export const DEFAULT_SEED = 0x12345678;

export function normalizeSeed(seed?: number | null): number {
  if (typeof seed === "number" && Number.isFinite(seed)) {
    return seed | 0;
  }
  return DEFAULT_SEED;
}

// Mulberry32.
export function createRng(seed: number): RandomFn {
  let t = seed | 0;
  return () => {
    t |= 0;
    t = (t + 0x6d2b79f5) | 0;
    let r = Math.imul(t ^ (t >>> 15), 1 | t);
    r ^= r + Math.imul(r ^ (r >>> 7), 61 | r);
    return ((r ^ (r >>> 14)) >>> 0) / 4294967296;
  };
}

/** Inclusive integer draw in [min, max]. */
export function randomInt(rng: RandomFn, min: number, max: number): number {
  const span = max - min + 1;
  const idx = Math.floor(rng() * span);
  return min + Math.min(span - 1, Math.max(0, idx));
}

export function clamp(value: number, min: number, max: number): number {
  if (value < min) return min;
  if (value > max) return max;
  return value;
}
