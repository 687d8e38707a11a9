import { describe, it, expect } from '@jest/globals';
import { createSeededRandom } from '@/lib/seededRandom';

describe('createSeededRandom', () => {
  it('should replay the same sequence for the same seed', () => {
    const a = createSeededRandom(1234);
    const b = createSeededRandom(1234);
    const seqA = Array.from({ length: 20 }, () => a.next());
    const seqB = Array.from({ length: 20 }, () => b.next());
    expect(seqA).toEqual(seqB);
  });

  it('should diverge for different seeds', () => {
    const a = createSeededRandom(1);
    const b = createSeededRandom(2);
    expect(Array.from({ length: 5 }, () => a.next())).not.toEqual(Array.from({ length: 5 }, () => b.next()));
  });

  it('should produce floats in [0, 1)', () => {
    const rng = createSeededRandom(99);
    for (let i = 0; i < 1000; i++) {
      const x = rng.next();
      expect(x).toBeGreaterThanOrEqual(0);
      expect(x).toBeLessThan(1);
    }
  });

  it('should keep int and between inside their bounds', () => {
    const rng = createSeededRandom(7);
    for (let i = 0; i < 500; i++) {
      const n = rng.int(5);
      expect(Number.isInteger(n)).toBe(true);
      expect(n).toBeGreaterThanOrEqual(0);
      expect(n).toBeLessThan(5);

      const m = rng.between(1, 3);
      expect(m).toBeGreaterThanOrEqual(1);
      expect(m).toBeLessThanOrEqual(3);
    }
    expect(rng.int(0)).toBe(0);
    expect(rng.between(4, 4)).toBe(4);
  });

  it('should honour the probability extremes of chance', () => {
    const rng = createSeededRandom(5);
    for (let i = 0; i < 100; i++) {
      expect(rng.chance(0)).toBe(false);
      expect(rng.chance(1)).toBe(true);
    }
  });

  it('should pick from the items or returns undefined for none', () => {
    const rng = createSeededRandom(11);
    const items = ['a', 'b', 'c'];
    for (let i = 0; i < 50; i++) {
      expect(items).toContain(rng.pick(items));
    }
    expect(rng.pick([])).toBeUndefined();
  });

  it('should normalize the seed to an unsigned 32-bit integer', () => {
    expect(createSeededRandom(-1).seed).toBe(4294967295);
    expect(createSeededRandom(2 ** 32 + 3).seed).toBe(3);
  });
});
