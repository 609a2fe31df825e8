/**
 * Point-loop utilities
 *
 * Loops are immutable; every transform returns a new loop.
 */

import type { Bounds, ContourLoop, ContourSet, Point } from '@/types/geometry';

const AREA_EPSILON = 1e-10;

export function createLoop(points: readonly Point[], closed = true): ContourLoop {
  return { points, closed };
}

export function createContourSet(outer: ContourLoop, holes: readonly ContourLoop[] = []): ContourSet {
  return { kind: 'contours', outer, holes };
}

export function distance(a: Point, b: Point): number {
  return Math.hypot(b.x - a.x, b.y - a.y);
}

export function lerpPoint(a: Point, b: Point, t: number): Point {
  return { x: a.x + (b.x - a.x) * t, y: a.y + (b.y - a.y) * t };
}

/**
 * Rotate a point about the origin (degrees, counter-clockwise in a y-up frame)
 */
export function rotatePoint(point: Point, degrees: number): Point {
  if (degrees === 0) return point;
  const rad = (degrees * Math.PI) / 180;
  const cos = Math.cos(rad);
  const sin = Math.sin(rad);
  return {
    x: point.x * cos - point.y * sin,
    y: point.x * sin + point.y * cos,
  };
}

/**
 * Signed shoelace area. Open loops are treated as if closed.
 */
export function signedArea(points: readonly Point[]): number {
  let area = 0;
  for (let i = 0; i < points.length; i++) {
    const a = points[i]!;
    const b = points[(i + 1) % points.length]!;
    area += a.x * b.y - b.x * a.y;
  }
  return area / 2;
}

export function meanPoint(points: readonly Point[]): Point {
  if (points.length === 0) return { x: 0, y: 0 };
  let x = 0;
  let y = 0;
  for (const p of points) {
    x += p.x;
    y += p.y;
  }
  return { x: x / points.length, y: y / points.length };
}

/**
 * Area-weighted centroid for closed loops, vertex mean for open or
 * near-zero-area loops.
 */
export function loopCentroid(loop: ContourLoop): Point {
  const { points } = loop;
  if (!loop.closed || points.length < 3) return meanPoint(points);

  const area = signedArea(points);
  if (Math.abs(area) < AREA_EPSILON) return meanPoint(points);

  let cx = 0;
  let cy = 0;
  for (let i = 0; i < points.length; i++) {
    const a = points[i]!;
    const b = points[(i + 1) % points.length]!;
    const cross = a.x * b.y - b.x * a.y;
    cx += (a.x + b.x) * cross;
    cy += (a.y + b.y) * cross;
  }
  return { x: cx / (6 * area), y: cy / (6 * area) };
}

export function loopBounds(loop: ContourLoop): Bounds {
  if (loop.points.length === 0) return { minX: 0, minY: 0, maxX: 0, maxY: 0 };
  const bounds: Bounds = { minX: Infinity, minY: Infinity, maxX: -Infinity, maxY: -Infinity };
  for (const p of loop.points) {
    bounds.minX = Math.min(bounds.minX, p.x);
    bounds.minY = Math.min(bounds.minY, p.y);
    bounds.maxX = Math.max(bounds.maxX, p.x);
    bounds.maxY = Math.max(bounds.maxY, p.y);
  }
  return bounds;
}

/**
 * Total edge length, including the closing edge of a closed loop
 */
export function loopLength(loop: ContourLoop): number {
  const { points } = loop;
  let total = 0;
  for (let i = 1; i < points.length; i++) {
    total += distance(points[i - 1]!, points[i]!);
  }
  if (loop.closed && points.length > 1) {
    total += distance(points[points.length - 1]!, points[0]!);
  }
  return total;
}

export function reverseLoop(loop: ContourLoop): ContourLoop {
  return { points: [...loop.points].reverse(), closed: loop.closed };
}

export function translateLoop(loop: ContourLoop, dx: number, dy: number): ContourLoop {
  return { points: loop.points.map((p) => ({ x: p.x + dx, y: p.y + dy })), closed: loop.closed };
}

export function scaleLoop(loop: ContourLoop, sx: number, sy: number = sx): ContourLoop {
  return { points: loop.points.map((p) => ({ x: p.x * sx, y: p.y * sy })), closed: loop.closed };
}

export function rotatePoints(points: readonly Point[], degrees: number): Point[] {
  return points.map((p) => rotatePoint(p, degrees));
}

export function rotateLoop(loop: ContourLoop, degrees: number): ContourLoop {
  return { points: rotatePoints(loop.points, degrees), closed: loop.closed };
}

/**
 * Left-rotate a point list: shiftPoints([a, b, c, d], 1) -> [b, c, d, a]
 */
export function shiftPoints<T>(points: readonly T[], offset: number): T[] {
  const n = points.length;
  if (n === 0) return [];
  const k = ((offset % n) + n) % n;
  return [...points.slice(k), ...points.slice(0, k)];
}

/**
 * Closed loop with every point on the reference loop's centroid.
 * Used as the start or end of a hole that grows or shrinks.
 */
export function createZeroLoop(reference: ContourLoop, count: number = reference.points.length): ContourLoop {
  const center = loopCentroid(reference);
  return {
    points: Array.from({ length: count }, () => ({ x: center.x, y: center.y })),
    closed: true,
  };
}
