/**
 * Morphing strategy contracts: vertex aligners and hole matchers.
 */

import type { ContourLoop, ContourSet, Point } from './geometry';

/**
 * Closedness and declared rotation (degrees) of the two loops being aligned.
 */
export interface AlignmentContext {
  rotation1: number;
  rotation2: number;
  closed1: boolean;
  closed2: boolean;
}

export interface AlignmentResult {
  /** Start-index shift; point i of the shifted loop becomes point (i + offset) mod n */
  offset: number;
  /** Loop the offset applies to. Only a closed loop is ever shifted. */
  shifted: 'first' | 'second';
  /** Whether the second loop's orientation is reversed before shifting */
  reversed: boolean;
}

export type AlignerId = 'angular' | 'euclidean' | 'none';

/**
 * Finds the correspondence between two equally sized point lists.
 * Implementations never mutate their inputs.
 */
export interface VertexAligner {
  readonly id: AlignerId | string;
  /** Identifies the strategy and its parameters in memo keys */
  readonly cacheKey: string;
  align(first: readonly Point[], second: readonly Point[], context: AlignmentContext): AlignmentResult;
}

export interface HolePair {
  source: number;
  destination: number;
}

/** Holes that move together; one side of a group always has a single member */
export interface HoleGroup {
  sources: readonly number[];
  destinations: readonly number[];
}

export interface HoleCorrespondence {
  /** Matched holes; an index may repeat when holes merge or split */
  pairs: readonly HolePair[];
  /** Source holes that collapse to a point at their own centroid */
  shrink: readonly number[];
  /** Destination holes that expand from a point at their own centroid */
  grow: readonly number[];
  /** Merge/split groups, one per pairing target */
  groups: readonly HoleGroup[];
}

export type HoleMatcherId = 'clustering' | 'greedy' | 'discrete' | 'simple' | 'optimal-assignment';

export interface HoleMatcher {
  readonly id: HoleMatcherId | string;
  readonly cacheKey: string;
  match(sources: readonly ContourLoop[], destinations: readonly ContourLoop[]): HoleCorrespondence;
}

/**
 * Two contour sets with identical structure: same hole count and the same
 * point count per loop, ready for per-point interpolation.
 */
export interface MorphPair {
  readonly source: ContourSet;
  readonly destination: ContourSet;
}

/** Per-segment strategy override carried on a keystate */
export interface MorphingOverride {
  holeMatcher?: HoleMatcher | HoleMatcherId;
  aligner?: VertexAligner | AlignerId;
}
