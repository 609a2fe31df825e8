/**
 * Contour generators for the built-in variants.
 *
 * All loops are centred on the origin and start from the top (negative y),
 * proceeding clockwise on screen.
 */

import type { ContourLoop, Point } from '@/types/geometry';

function radialLoop(count: number, radiusAt: (i: number) => { rx: number; ry: number }): ContourLoop {
  const points: Point[] = [];
  const angleStep = (Math.PI * 2) / count;
  for (let i = 0; i < count; i++) {
    const angle = i * angleStep - Math.PI / 2; // Start from top
    const { rx, ry } = radiusAt(i);
    points.push({ x: rx * Math.cos(angle), y: ry * Math.sin(angle) });
  }
  return { points, closed: true };
}

/**
 * Generate a circle as a regular loop of `segments` points
 */
export function makeCircleLoop(options: { radius: number; segments?: number }): ContourLoop {
  const { radius, segments = 64 } = options;
  return radialLoop(segments, () => ({ rx: radius, ry: radius }));
}

/**
 * Generate an ellipse loop
 */
export function makeEllipseLoop(options: { rx: number; ry: number; segments?: number }): ContourLoop {
  const { rx, ry, segments = 64 } = options;
  return radialLoop(segments, () => ({ rx, ry }));
}

/**
 * Generate a rectangle loop, starting at the top-left corner
 */
export function makeRectLoop(options: { width: number; height: number }): ContourLoop {
  const hw = options.width / 2;
  const hh = options.height / 2;
  return {
    points: [
      { x: -hw, y: -hh },
      { x: hw, y: -hh },
      { x: hw, y: hh },
      { x: -hw, y: hh },
    ],
    closed: true,
  };
}

/**
 * Generate a regular polygon loop
 */
export function makePolygonLoop(options: { sides: number; radius: number }): ContourLoop {
  const { sides, radius } = options;
  return radialLoop(Math.max(3, Math.round(sides)), () => ({ rx: radius, ry: radius }));
}

/**
 * Generate a star loop alternating outer and inner vertices
 */
export function makeStarLoop(options: { points: number; outerRadius: number; innerRadius: number }): ContourLoop {
  const { outerRadius, innerRadius } = options;
  const tips = Math.max(2, Math.round(options.points));
  return radialLoop(tips * 2, (i) => {
    const radius = i % 2 === 0 ? outerRadius : innerRadius;
    return { rx: radius, ry: radius };
  });
}

/**
 * Generate a horizontal open line of `segments` + 1 points
 */
export function makeLineLoop(options: { length: number; segments?: number }): ContourLoop {
  const { length, segments = 1 } = options;
  const points: Point[] = [];
  for (let i = 0; i <= segments; i++) {
    points.push({ x: -length / 2 + (length * i) / segments, y: 0 });
  }
  return { points, closed: false };
}

/**
 * Circular holes spread evenly on a ring around the origin.
 * A single hole sits on the centre.
 */
export function makeHoleRing(options: {
  count: number;
  holeRadius: number;
  ringRadius: number;
  segments?: number;
}): ContourLoop[] {
  const { count, holeRadius, ringRadius, segments = 24 } = options;
  const holes: ContourLoop[] = [];
  for (let i = 0; i < count; i++) {
    const angle = (i * Math.PI * 2) / count - Math.PI / 2;
    const cx = count === 1 ? 0 : ringRadius * Math.cos(angle);
    const cy = count === 1 ? 0 : ringRadius * Math.sin(angle);
    const circle = makeCircleLoop({ radius: holeRadius, segments });
    holes.push({
      points: circle.points.map((p) => ({ x: p.x + cx, y: p.y + cy })),
      closed: true,
    });
  }
  return holes;
}

/**
 * Circular holes in a horizontal row centred on the origin
 */
export function makeHoleRow(options: {
  count: number;
  holeRadius: number;
  spacing: number;
  segments?: number;
}): ContourLoop[] {
  const { count, holeRadius, spacing, segments = 24 } = options;
  const holes: ContourLoop[] = [];
  for (let i = 0; i < count; i++) {
    const cx = (i - (count - 1) / 2) * spacing;
    const circle = makeCircleLoop({ radius: holeRadius, segments });
    holes.push({
      points: circle.points.map((p) => ({ x: p.x + cx, y: p.y })),
      closed: true,
    });
  }
  return holes;
}
