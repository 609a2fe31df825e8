import { describe, expect, it } from 'vitest';
import { loopCentroid } from '@/lib/geometry';
import { makeCircleLoop, makeHoleRow, makeLineLoop, makeRectLoop, makeStarLoop } from './shape-generators';

describe('makeCircleLoop', () => {
  it('starts at the top and steps clockwise on screen', () => {
    const [top, right, bottom, left] = makeCircleLoop({ radius: 10, segments: 4 }).points;
    expect(top?.x).toBeCloseTo(0, 10);
    expect(top?.y).toBeCloseTo(-10, 10);
    expect(right?.x).toBeCloseTo(10, 10);
    expect(bottom?.y).toBeCloseTo(10, 10);
    expect(left?.x).toBeCloseTo(-10, 10);
  });
});

describe('makeRectLoop', () => {
  it('is centred on the origin', () => {
    expect(makeRectLoop({ width: 4, height: 2 }).points).toEqual([
      { x: -2, y: -1 },
      { x: 2, y: -1 },
      { x: 2, y: 1 },
      { x: -2, y: 1 },
    ]);
  });
});

describe('makeStarLoop', () => {
  it('alternates outer and inner radii', () => {
    const star = makeStarLoop({ points: 5, outerRadius: 10, innerRadius: 4 });
    expect(star.points).toHaveLength(10);
    expect(Math.hypot(star.points[0]!.x, star.points[0]!.y)).toBeCloseTo(10, 10);
    expect(Math.hypot(star.points[1]!.x, star.points[1]!.y)).toBeCloseTo(4, 10);
  });
});

describe('makeLineLoop', () => {
  it('is open with evenly spaced points', () => {
    const line = makeLineLoop({ length: 30, segments: 3 });
    expect(line.closed).toBe(false);
    expect(line.points.map((p) => p.x)).toEqual([-15, -5, 5, 15]);
  });
});

describe('makeHoleRow', () => {
  it('centres the row on the origin', () => {
    const holes = makeHoleRow({ count: 3, holeRadius: 2, spacing: 10, segments: 8 });
    const centres = holes.map((hole) => loopCentroid(hole));
    expect(centres[0]?.x).toBeCloseTo(-10, 8);
    expect(centres[1]?.x).toBeCloseTo(0, 8);
    expect(centres[2]?.x).toBeCloseTo(10, 8);
    expect(holes.every((hole) => hole.closed)).toBe(true);
  });
});
