export type RandomSource = () => number;

/**
 * Seeded uniform generator on [0, 1) (mulberry32). Two sources built from the
 * same seed yield the same stream.
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

/** Seeded source when a seed is given, a freshly seeded one otherwise. */
export function randomSource(seed?: number): RandomSource {
  if (seed === undefined) {
    return createSeededRandom(Math.floor(Math.random() * 4294967296));
  }
  return createSeededRandom(seed);
}

/** Standard normal draws via the Box-Muller transform. */
export function createNormalSampler(random: RandomSource): () => number {
  let spare: number | null = null;
  return () => {
    if (spare !== null) {
      const value = spare;
      spare = null;
      return value;
    }
    let u = 0;
    let v = 0;
    while (u === 0) u = random();
    while (v === 0) v = random();
    const radius = Math.sqrt(-2.0 * Math.log(u));
    spare = radius * Math.sin(2.0 * Math.PI * v);
    return radius * Math.cos(2.0 * Math.PI * v);
  };
}

/** FNV-1a hash of a string key, mixed with a base seed. */
export function deriveSeed(baseSeed: number, key: string): number {
  let hash = (0x811c9dc5 ^ (baseSeed >>> 0)) >>> 0;
  for (let i = 0; i < key.length; i++) {
    hash ^= key.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193) >>> 0;
  }
  return hash;
}
