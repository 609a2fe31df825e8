/**
 * Attribute value interpolation.
 * Numbers, angles, colors and discrete values; contour sets go through the
 * morphing adapter instead.
 */

import { interpolateColor } from '@/lib/color';
import { isColor, isContourSet } from '@/lib/guards';
import type { AttributeKind, AttributeValue } from '@/types/snapshot';

export function lerp(start: number, end: number, t: number): number {
  return start + (end - start) * t;
}

function normalizeDegrees(angle: number): number {
  const wrapped = angle % 360;
  const positive = wrapped < 0 ? wrapped + 360 : wrapped;
  // A tiny negative remainder rounds up to exactly 360.
  return positive >= 360 ? 0 : positive;
}

/**
 * Interpolate along the shortest signed arc; the result lies in [0, 360).
 * 350 -> 10 at t = 0.5 gives 0, not 180.
 */
export function interpolateAngle(start: number, end: number, t: number): number {
  const from = normalizeDegrees(start);
  let diff = normalizeDegrees(end) - from;
  if (diff > 180) diff -= 360;
  else if (diff < -180) diff += 360;
  return normalizeDegrees(from + diff * t);
}

/**
 * Start value below the midpoint, end value from it onward
 */
export function stepValue<T>(start: T, end: T, t: number): T {
  return t < 0.5 ? start : end;
}

/**
 * `count` evenly spaced values strictly between start and end
 */
export function inbetween(start: number, end: number, count: number): number[] {
  return Array.from({ length: count }, (_, i) => lerp(start, end, (i + 1) / (count + 1)));
}

/**
 * Mean direction of a set of angles (degrees), by vector averaging.
 * Opposite angles cancel to 0.
 */
export function circularMidpoint(angles: readonly number[]): number {
  let x = 0;
  let y = 0;
  for (const angle of angles) {
    const rad = (angle * Math.PI) / 180;
    x += Math.cos(rad);
    y += Math.sin(rad);
  }
  if (Math.abs(x) < 1e-12 && Math.abs(y) < 1e-12) return 0;
  return normalizeDegrees((Math.atan2(y, x) * 180) / Math.PI);
}

export function attributeKind(value: AttributeValue): AttributeKind {
  if (typeof value === 'number') return 'number';
  if (isColor(value)) return 'color';
  if (isContourSet(value)) return 'contours';
  return 'discrete';
}

/**
 * Interpolate a non-geometry attribute. Mismatched kinds step.
 */
export function interpolateValue(
  start: AttributeValue,
  end: AttributeValue,
  t: number,
  options: { angular?: boolean } = {}
): AttributeValue {
  if (start === end) return start;
  if (typeof start === 'number' && typeof end === 'number') {
    return options.angular ? interpolateAngle(start, end, t) : lerp(start, end, t);
  }
  if (isColor(start) && isColor(end)) return interpolateColor(start, end, t);
  return stepValue(start, end, t);
}
