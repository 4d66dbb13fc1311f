import { describe, it, expect } from 'vitest';
import { createSeededRandom, pickOne, randomInt, type RandomSource } from './random.js';

function fixedSource(values: number[]): RandomSource {
  let index = 0;
  return {
    next: () => {
      const value = values[index % values.length];
      index += 1;
      return value ?? 0;
    },
  };
}

describe('random', () => {
  describe('createSeededRandom', () => {
    it('produces the same sequence for the same seed', () => {
      const a = createSeededRandom(42);
      const b = createSeededRandom(42);
      const seqA = Array.from({ length: 5 }, () => a.next());
      const seqB = Array.from({ length: 5 }, () => b.next());

      expect(seqA).toEqual(seqB);
    });

    it('produces different sequences for different seeds', () => {
      const a = createSeededRandom(1);
      const b = createSeededRandom(2);

      expect(a.next()).not.toBe(b.next());
    });

    it('stays within [0, 1)', () => {
      const random = createSeededRandom(7);
      for (let i = 0; i < 1000; i++) {
        const value = random.next();
        expect(value).toBeGreaterThanOrEqual(0);
        expect(value).toBeLessThan(1);
      }
    });
  });

  describe('randomInt', () => {
    it('maps the unit interval onto an inclusive range', () => {
      expect(randomInt(fixedSource([0]), 1, 7)).toBe(1);
      expect(randomInt(fixedSource([0.5]), 1, 7)).toBe(4);
      expect(randomInt(fixedSource([0.999]), 1, 7)).toBe(7);
    });

    it('clamps a source that returns exactly 1', () => {
      expect(randomInt(fixedSource([1]), 1, 7)).toBe(7);
    });

    it('rejects inverted or fractional ranges', () => {
      expect(() => randomInt(fixedSource([0]), 5, 4)).toThrow(RangeError);
      expect(() => randomInt(fixedSource([0]), 0.5, 4)).toThrow(RangeError);
    });
  });

  describe('pickOne', () => {
    it('selects by position', () => {
      expect(pickOne(fixedSource([0.7]), ['a', 'b', 'c'])).toBe('c');
    });

    it('rejects an empty list', () => {
      expect(() => pickOne(fixedSource([0]), [])).toThrow(RangeError);
    });
  });
});
