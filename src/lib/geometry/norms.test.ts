import { describe, expect, it } from 'vitest';
import { aggregate, argMin, pairedDistance } from './norms';
import { createSeededRandom } from './random';

const first = [{ x: 0, y: 0 }, { x: 0, y: 0 }];
const second = [{ x: 3, y: 4 }, { x: 0, y: 1 }];

describe('pairedDistance', () => {
  it('sums distances under l1', () => {
    expect(pairedDistance(first, second, 0, 'l1')).toBe(6);
  });

  it('takes the root of summed squares under l2', () => {
    expect(pairedDistance(first, second, 0, 'l2')).toBeCloseTo(Math.sqrt(26), 10);
  });

  it('keeps the largest distance under linf', () => {
    expect(pairedDistance(first, second, 1, 'linf')).toBe(5);
  });
});

describe('argMin', () => {
  it('keeps the first of equal minima', () => {
    expect(argMin([3, 1, 2, 1])).toBe(1);
  });
});

describe('createSeededRandom', () => {
  it('repeats the sequence for the same seed', () => {
    const a = createSeededRandom(42);
    const b = createSeededRandom(42);
    const seqA = [a(), a(), a()];
    expect([b(), b(), b()]).toEqual(seqA);
    for (const value of seqA) {
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });
});

describe('aggregate', () => {
  it('returns zero for no values', () => {
    expect(aggregate([], 'l2')).toBe(0);
  });

  it('wraps a longer first list around the cyclic second list', () => {
    const open = [{ x: 0, y: 0 }, { x: 1, y: 0 }, { x: 0, y: 0 }];
    const ring = [{ x: 0, y: 0 }, { x: 1, y: 0 }];
    expect(pairedDistance(open, ring, 0, 'l1')).toBe(0);
  });
});
