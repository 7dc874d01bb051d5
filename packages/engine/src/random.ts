/**
 * Uniform choice helpers. Every strategy takes a `() => number` source so
 * harness runs and tests can swap Math.random for a seeded generator.
 */

export type RandomSource = () => number;

/**
 * Seeded PRNG: xoshiro128** with its 128-bit state filled by splitmix32.
 * Produces uniform [0, 1) values.
 */
export function createSeededRandom(seed: number): RandomSource {
  let s = seed | 0;
  const splitmix32 = () => {
    s = (s + 0x9e3779b9) | 0;
    let t = s ^ (s >>> 16);
    t = Math.imul(t, 0x21f0aaad);
    t = t ^ (t >>> 15);
    t = Math.imul(t, 0x735a2d97);
    return (t ^ (t >>> 15)) >>> 0;
  };

  let a = splitmix32();
  let b = splitmix32();
  let c = splitmix32();
  let d = splitmix32();

  return () => {
    const t = b << 9;
    let r = a * 5;
    r = ((r << 7) | (r >>> 25)) * 9;
    c ^= a;
    d ^= b;
    b ^= c;
    a ^= d;
    c ^= t;
    d = (d << 11) | (d >>> 21);
    return (r >>> 0) / 4294967296;
  };
}

export function pickRandom<T>(items: readonly T[], random: RandomSource): T {
  if (items.length === 0) {
    throw new Error("Cannot pick from an empty list");
  }
  const idx = Math.min(items.length - 1, Math.floor(random() * items.length));
  return items[idx];
}

/** Fisher–Yates; returns a new array. */
export function shuffle<T>(items: readonly T[], random: RandomSource): T[] {
  const out = items.slice();
  for (let i = out.length - 1; i > 0; i--) {
    const j = Math.min(i, Math.floor(random() * (i + 1)));
    [out[i], out[j]] = [out[j], out[i]];
  }
  return out;
}
