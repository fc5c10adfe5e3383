import { describe, it, expect } from '@jest/globals';
import { SeededRandom, hashSeed } from '../../src/utils/seeded-random';

describe('SeededRandom', () => {
  it('should hash strings deterministically', () => {
    expect(hashSeed('')).toBe(2166136261);
    expect(hashSeed('abc')).toBe(hashSeed('abc'));
    expect(hashSeed('abc')).not.toBe(hashSeed('abd'));
  });

  it('should replay the same sequence for the same seed', () => {
    const a = new SeededRandom(42);
    const b = new SeededRandom(42);
    const first = Array.from({ length: 10 }, () => a.next());
    const second = Array.from({ length: 10 }, () => b.next());
    expect(first).toEqual(second);
    first.forEach((value) => {
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    });
  });

  it('should stay within integer bounds', () => {
    const rng = new SeededRandom(7);
    for (let i = 0; i < 100; i++) {
      const value = rng.int(2, 5);
      expect(value).toBeGreaterThanOrEqual(2);
      expect(value).toBeLessThanOrEqual(5);
    }
  });

  it('should shuffle into a new permutation', () => {
    const source = [1, 2, 3, 4, 5, 6];
    const shuffled = new SeededRandom(99).shuffle(source);
    expect(source).toEqual([1, 2, 3, 4, 5, 6]);
    expect([...shuffled].sort()).toEqual(source);
    expect(new SeededRandom(99).shuffle(source)).toEqual(shuffled);
  });
});
