import { describe, it, expect } from 'vitest';
import { createSeededRandom } from './random.js';

describe('createSeededRandom', () => {
  it('should produce the same sequence for the same seed', () => {
    const a = createSeededRandom(1337);
    const b = createSeededRandom(1337);
    const first = Array.from({ length: 5 }, () => a.next());
    const second = Array.from({ length: 5 }, () => b.next());
    expect(first).toEqual(second);
  });

  it('should produce different sequences for different seeds', () => {
    const a = createSeededRandom(1);
    const b = createSeededRandom(2);
    expect(a.next()).not.toBe(b.next());
  });

  it('should stay within [0, 1)', () => {
    const rng = createSeededRandom(42);
    for (let i = 0; i < 200; i++) {
      const value = rng.next();
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });

  it('should sample distinct items without exceeding the pool', () => {
    const rng = createSeededRandom(7);
    const picked = rng.sample(['a', 'b', 'c', 'd'], 3);
    expect(picked).toHaveLength(3);
    expect(new Set(picked).size).toBe(3);
    expect(rng.sample(['a', 'b'], 5)).toHaveLength(2);
  });

  it('should throw when choosing from an empty list', () => {
    const rng = createSeededRandom(7);
    expect(() => rng.choice([])).toThrow(RangeError);
  });
});
