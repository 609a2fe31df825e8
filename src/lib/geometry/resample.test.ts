import { describe, expect, it } from 'vitest';
import { createLoop } from './loop-utils';
import { resampleLoop } from './resample';

describe('resampleLoop', () => {
  it('spreads points along a closed loop including the closing edge', () => {
    const square = createLoop([
      { x: 0, y: 0 },
      { x: 10, y: 0 },
      { x: 10, y: 10 },
      { x: 0, y: 10 },
    ]);

    expect(resampleLoop(square, 8).points).toEqual([
      { x: 0, y: 0 },
      { x: 5, y: 0 },
      { x: 10, y: 0 },
      { x: 10, y: 5 },
      { x: 10, y: 10 },
      { x: 5, y: 10 },
      { x: 0, y: 10 },
      { x: 0, y: 5 },
    ]);
  });

  it('keeps both endpoints of an open loop', () => {
    const line = createLoop([{ x: 0, y: 0 }, { x: 30, y: 0 }], false);
    const resampled = resampleLoop(line, 4);

    expect(resampled.closed).toBe(false);
    expect(resampled.points).toEqual([
      { x: 0, y: 0 },
      { x: 10, y: 0 },
      { x: 20, y: 0 },
      { x: 30, y: 0 },
    ]);
  });

  it('repeats the only location of a zero-length loop', () => {
    const dot = createLoop([{ x: 2, y: 3 }, { x: 2, y: 3 }]);
    expect(resampleLoop(dot, 3).points).toEqual([
      { x: 2, y: 3 },
      { x: 2, y: 3 },
      { x: 2, y: 3 },
    ]);
  });

  it('leaves an empty loop empty', () => {
    expect(resampleLoop(createLoop([]), 5).points).toEqual([]);
  });
});
