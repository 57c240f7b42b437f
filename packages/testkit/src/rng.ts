/**
 * Seeded 32-bit generator for reproducible randomized tests.
 * Same seed, same sequence, on every platform.
 */
export type Rng = Readonly<{
  /** Next unsigned 32-bit integer. */
  u32: () => number;
  /** Next float in [0, 1). */
  next: () => number;
}>;

export function createRng(seed: number): Rng {
  let state = seed >>> 0;
  const u32 = (): number => {
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
    return state;
  };
  return Object.freeze({
    u32,
    next: () => u32() / 4294967296,
  });
}
