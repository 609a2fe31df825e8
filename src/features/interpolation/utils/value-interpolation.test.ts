import { describe, expect, it } from 'vitest';
import { NO_COLOR, rgba } from '@/lib/color';
import { createContourSet, createLoop } from '@/lib/geometry';
import {
  attributeKind,
  circularMidpoint,
  inbetween,
  interpolateAngle,
  interpolateValue,
  lerp,
  stepValue,
} from './value-interpolation';

describe('lerp', () => {
  it('interpolates linearly', () => {
    expect(lerp(10, 20, 0.25)).toBe(12.5);
  });
});

describe('interpolateAngle', () => {
  it('takes the shortest arc across zero', () => {
    expect(interpolateAngle(350, 10, 0.5)).toBe(0);
    expect(interpolateAngle(350, 10, 0.25)).toBe(355);
  });

  it('goes backwards when that is shorter', () => {
    expect(interpolateAngle(10, 350, 0.5)).toBe(0);
    expect(interpolateAngle(90, 0, 0.5)).toBe(45);
  });

  it('normalizes inputs outside one turn', () => {
    expect(interpolateAngle(-30, 390, 0.5)).toBe(0);
  });

  it('folds a remainder just below zero to 0 instead of 360', () => {
    expect(interpolateAngle(0, 90, -1e-17)).toBe(0);
  });
});

describe('stepValue', () => {
  it('switches at the midpoint', () => {
    expect(stepValue('a', 'b', 0.49)).toBe('a');
    expect(stepValue('a', 'b', 0.5)).toBe('b');
  });
});

describe('inbetween', () => {
  it('excludes both ends', () => {
    expect(inbetween(0, 10, 4)).toEqual([2, 4, 6, 8]);
  });
});

describe('circularMidpoint', () => {
  it('averages across the wrap', () => {
    expect(circularMidpoint([350, 10])).toBeCloseTo(0, 10);
    expect(circularMidpoint([80, 100])).toBeCloseTo(90, 10);
  });

  it('stays inside [0, 360) when the mean lands just below zero', () => {
    const mid = circularMidpoint([350, 10]);
    expect(mid).toBeGreaterThanOrEqual(0);
    expect(mid).toBeLessThan(360);
  });
});

describe('attributeKind', () => {
  it('classifies every value', () => {
    expect(attributeKind(3)).toBe('number');
    expect(attributeKind(rgba(0, 0, 0))).toBe('color');
    expect(attributeKind(NO_COLOR)).toBe('color');
    expect(attributeKind(createContourSet(createLoop([])))).toBe('contours');
    expect(attributeKind('bold')).toBe('discrete');
    expect(attributeKind(null)).toBe('discrete');
  });
});

describe('interpolateValue', () => {
  it('uses the shortest arc for angular numbers', () => {
    expect(interpolateValue(350, 10, 0.5, { angular: true })).toBe(0);
    expect(interpolateValue(350, 10, 0.5)).toBe(180);
  });

  it('blends colors', () => {
    expect(interpolateValue(rgba(0, 0, 0, 0), rgba(200, 100, 50, 1), 0.5)).toEqual(rgba(100, 50, 25, 0.5));
  });

  it('steps discrete and mismatched values', () => {
    expect(interpolateValue(true, false, 0.4)).toBe(true);
    expect(interpolateValue(1, 'x', 0.6)).toBe('x');
  });
});
