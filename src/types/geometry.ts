/**
 * Geometry types for shape-valued attributes.
 */

export interface Point {
  readonly x: number;
  readonly y: number;
}

/**
 * Ordered point loop. A closed loop wraps from its last point back to the first;
 * the first point is never repeated at the end.
 */
export interface ContourLoop {
  readonly points: readonly Point[];
  readonly closed: boolean;
}

/**
 * Outer boundary plus anonymous holes. Holes are always closed and are only
 * distinguished by their geometry and position in the list.
 */
export interface ContourSet {
  readonly kind: 'contours';
  readonly outer: ContourLoop;
  readonly holes: readonly ContourLoop[];
}

export interface Bounds {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
}

/** Point-distance aggregation used when scoring candidate alignments */
export type DistanceNorm = 'l1' | 'l2' | 'linf';
