import { describe, expect, it } from 'vitest';
import { createContourSet, createLoop } from '@/lib/geometry';
import type { MorphPair } from '@/types/morphing';
import { MorphCache, generateMorphKey } from './morph-cache';

function pair(x: number): MorphPair {
  const contours = createContourSet(createLoop([{ x, y: 0 }]));
  return { source: contours, destination: contours };
}

describe('generateMorphKey', () => {
  it('encodes strategy, rotations and geometry', () => {
    const a = createContourSet(createLoop([{ x: 1, y: 2 }]), [createLoop([{ x: 0, y: 0 }])]);
    const b = createContourSet(createLoop([{ x: 3, y: 4 }], false));
    expect(generateMorphKey(a, b, { rotation1: 0, rotation2: 90 }, 'simple')).toBe(
      'simple#0:90#c[1,2]|c[0,0]=>o[3,4]'
    );
  });
});

describe('MorphCache', () => {
  it('evicts the least recently used entry', () => {
    const cache = new MorphCache(2);
    cache.set('a', pair(1));
    cache.set('b', pair(2));
    cache.get('a');
    cache.set('c', pair(3));

    expect(cache.get('b')).toBeUndefined();
    expect(cache.get('a')).toEqual(pair(1));
    expect(cache.getStats().evictions).toBe(1);
  });

  it('computes a value only on a miss', () => {
    const cache = new MorphCache();
    let calls = 0;
    const create = () => {
      calls++;
      return pair(1);
    };
    cache.getOrCreate('k', create);
    cache.getOrCreate('k', create);
    expect(calls).toBe(1);
  });

  it('freezes stored values', () => {
    const cache = new MorphCache();
    const value = pair(5);
    cache.set('k', value);
    expect(Object.isFrozen(cache.get('k'))).toBe(true);
  });
});
