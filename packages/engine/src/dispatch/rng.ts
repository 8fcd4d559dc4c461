export type RandomSource = () => number;

/** mulberry32: small, fast and reproducible for a given 32-bit seed. */
export function mulberry32(seed: number): RandomSource {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function createRandom(seed?: number): RandomSource {
  return seed === undefined ? Math.random : mulberry32(seed);
}

export function pick<T>(items: readonly T[], random: RandomSource): T {
  if (items.length === 0) throw new RangeError("Cannot pick from an empty list");
  return items[Math.floor(random() * items.length) % items.length];
}
