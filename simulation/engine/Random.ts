export interface RandomSource {
  /** Uniform sample in [0, 1). */
  next(): number;
}

export function createRandom(seed: number): RandomSource {
  let t = seed >>> 0;
  return {
    next: () => {
      t += 0x6d2b79f5;
      let x = t;
      x = Math.imul(x ^ (x >>> 15), x | 1);
      x ^= x + Math.imul(x ^ (x >>> 7), x | 61);
      return ((x ^ (x >>> 14)) >>> 0) / 4294967296;
    },
  };
}

export function uniform(rng: RandomSource, low: number, high: number): number {
  return low + (high - low) * rng.next();
}

// Box-Muller. 1 - next() keeps the log argument in (0, 1].
export function normal(rng: RandomSource, mean: number, stddev: number): number {
  const u1 = 1 - rng.next();
  const u2 = rng.next();
  const z = Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
  return mean + stddev * z;
}

// Mixes sweep coordinates into a base seed so every run gets its own stream.
export function deriveSeed(base: number, ...parts: Array<number | string>): number {
  let hash = base >>> 0;
  for (const part of parts) {
    const text = String(part);
    for (let i = 0; i < text.length; i += 1) {
      hash = Math.imul(hash ^ text.charCodeAt(i), 0x01000193) >>> 0;
    }
    hash = Math.imul(hash ^ 0x2c, 0x01000193) >>> 0;
  }
  return hash;
}
