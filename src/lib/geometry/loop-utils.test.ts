import { describe, expect, it } from 'vitest';
import {
  createLoop,
  createZeroLoop,
  loopBounds,
  loopCentroid,
  loopLength,
  reverseLoop,
  rotatePoint,
  shiftPoints,
  signedArea,
} from './loop-utils';

const square = createLoop([
  { x: 0, y: 0 },
  { x: 10, y: 0 },
  { x: 10, y: 10 },
  { x: 0, y: 10 },
]);

describe('loopCentroid', () => {
  it('uses the area centroid for closed loops', () => {
    expect(loopCentroid(square)).toEqual({ x: 5, y: 5 });
  });

  it('uses the vertex mean for open loops', () => {
    const line = createLoop([{ x: 0, y: 0 }, { x: 30, y: 0 }], false);
    expect(loopCentroid(line)).toEqual({ x: 15, y: 0 });
  });

  it('falls back to the vertex mean when the area vanishes', () => {
    const flat = createLoop([{ x: 0, y: 0 }, { x: 1, y: 0 }, { x: 2, y: 0 }]);
    expect(loopCentroid(flat)).toEqual({ x: 1, y: 0 });
  });
});

describe('signedArea', () => {
  it('flips sign with orientation', () => {
    expect(signedArea(square.points)).toBe(100);
    expect(signedArea(reverseLoop(square).points)).toBe(-100);
  });
});

describe('loopLength', () => {
  it('includes the closing edge only for closed loops', () => {
    expect(loopLength(square)).toBe(40);
    expect(loopLength({ ...square, closed: false })).toBe(30);
  });
});

describe('loopBounds', () => {
  it('spans every point', () => {
    expect(loopBounds(square)).toEqual({ minX: 0, minY: 0, maxX: 10, maxY: 10 });
  });
});

describe('shiftPoints', () => {
  it('rotates left by the offset', () => {
    expect(shiftPoints([1, 2, 3, 4, 5], 2)).toEqual([3, 4, 5, 1, 2]);
  });

  it('wraps negative offsets', () => {
    expect(shiftPoints([1, 2, 3, 4, 5], -1)).toEqual([5, 1, 2, 3, 4]);
  });
});

describe('rotatePoint', () => {
  it('rotates a quarter turn counter-clockwise', () => {
    const rotated = rotatePoint({ x: 1, y: 0 }, 90);
    expect(rotated.x).toBeCloseTo(0, 10);
    expect(rotated.y).toBeCloseTo(1, 10);
  });
});

describe('createZeroLoop', () => {
  it('collapses every point onto the reference centroid', () => {
    const zero = createZeroLoop(square, 3);
    expect(zero.closed).toBe(true);
    expect(zero.points).toEqual([
      { x: 5, y: 5 },
      { x: 5, y: 5 },
      { x: 5, y: 5 },
    ]);
  });
});
