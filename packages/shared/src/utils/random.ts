export interface SeededRandom {
  /** Uniform float in [0, 1). */
  next(): number;
  /** Uniform integer in [0, max). */
  nextInt(max: number): number;
  choice<T>(items: readonly T[]): T;
  sample<T>(items: readonly T[], count: number): T[];
}

// mulberry32
function createGenerator(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state += 0x6d2b79f5;
    let r = Math.imul(state ^ (state >>> 15), state | 1);
    r ^= r + Math.imul(r ^ (r >>> 7), r | 61);
    return ((r ^ (r >>> 14)) >>> 0) / 4294967296;
  };
}

export function createSeededRandom(seed: number): SeededRandom {
  const generate = createGenerator(seed);

  const nextInt = (max: number): number => Math.floor(generate() * max);

  return {
    next: generate,
    nextInt,

    choice<T>(items: readonly T[]): T {
      if (items.length === 0) {
        throw new RangeError('Cannot choose from an empty list');
      }
      return items[nextInt(items.length)];
    },

    sample<T>(items: readonly T[], count: number): T[] {
      const pool = [...items];
      const size = Math.min(count, pool.length);
      for (let i = 0; i < size; i++) {
        const j = i + nextInt(pool.length - i);
        [pool[i], pool[j]] = [pool[j], pool[i]];
      }
      return pool.slice(0, size);
    },
  };
}
