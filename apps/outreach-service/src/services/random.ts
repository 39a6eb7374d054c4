/**
 * Source of uniform numbers in [0, 1). Injected into the template composer
 * so callers can pin output with a seed.
 */
export type RandomSource = () => number;

export const defaultRandom: RandomSource = Math.random;

/**
 * Deterministic source (mulberry32). Same seed, same sequence.
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Uniformly pick one item. Throws on an empty list.
 */
export function pick<T>(items: readonly T[], random: RandomSource = defaultRandom): T {
  if (items.length === 0) {
    throw new Error("Cannot pick from an empty list");
  }
  const index = Math.min(items.length - 1, Math.floor(random() * items.length));
  return items[index];
}
