/** Uniform source in [0, 1) */
export type Rng = () => number;

export function mulberry32(seed: number): Rng {
  let state = seed >>> 0;
  return function mulberry32Generator() {
    let t = (state = (state + 0x6d2b79f5) >>> 0);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function randomInt(rng: Rng, exclusiveMax: number): number {
  return Math.floor(rng() * exclusiveMax);
}

export function pickOne<T>(rng: Rng, items: readonly T[]): T {
  const item = items[randomInt(rng, items.length)];
  if (item === undefined) {
    throw new RangeError("Cannot pick from an empty list");
  }
  return item;
}

export function randomSeed(): number {
  const seedBuffer = new Uint32Array(1);
  globalThis.crypto.getRandomValues(seedBuffer);
  return seedBuffer[0];
}
