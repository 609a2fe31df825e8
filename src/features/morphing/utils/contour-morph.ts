/**
 * Contour Morphing Adapter
 *
 * Turns two arbitrary contour sets into a structurally identical pair (same
 * hole count, same point count per loop, aligned start points) and
 * interpolates between them point by point.
 */

import type { AlignmentOptions } from '@/lib/config';
import { createLoop, createContourSet, createZeroLoop, lerpPoint, resampleLoop, reverseLoop, shiftPoints } from '@/lib/geometry';
import type { ContourLoop, ContourSet } from '@/types/geometry';
import type { AlignmentContext, AlignmentResult, HoleMatcher, MorphPair, VertexAligner } from '@/types/morphing';
import { createAngularAligner, selectAligner } from '../aligners';
import type { MorphCache } from './morph-cache';
import { generateMorphKey } from './morph-cache';

export interface MorphStrategies {
  holeMatcher: HoleMatcher;
  alignment: AlignmentOptions;
  /** Replaces the closedness-based choice for the outer boundary */
  aligner?: VertexAligner;
  /** Fixed point count per loop; otherwise the larger of each pair */
  resolution?: number;
}

export interface MorphRotation {
  rotation1: number;
  rotation2: number;
}

function shiftLoop(loop: ContourLoop, offset: number): ContourLoop {
  return offset === 0 ? loop : createLoop(shiftPoints(loop.points, offset), loop.closed);
}

function applyAlignment(first: ContourLoop, second: ContourLoop, result: AlignmentResult): [ContourLoop, ContourLoop] {
  const oriented = result.reversed ? reverseLoop(second) : second;
  return result.shifted === 'first'
    ? [shiftLoop(first, result.offset), oriented]
    : [first, shiftLoop(oriented, result.offset)];
}

/** Open copy of a closed loop with its start point repeated at the end */
function unroll(loop: ContourLoop): ContourLoop {
  const first = loop.points[0];
  return createLoop(first ? [...loop.points, first] : [], false);
}

/**
 * Resample and align two boundaries.
 *
 * When exactly one side is closed, the closed ring gets n points and the open
 * side n + 1; after alignment the ring is unrolled so both come back open with
 * n + 1 points and the open loop's end meets the ring's start.
 */
export function alignBoundaries(
  first: ContourLoop,
  second: ContourLoop,
  context: AlignmentContext,
  aligner: VertexAligner,
  resolution?: number
): [ContourLoop, ContourLoop] {
  const count1 = first.points.length;
  const count2 = second.points.length;
  if (count1 === 0 && count2 === 0) return [first, second];

  if (count1 === 0 || count2 === 0) {
    const present = count1 === 0 ? second : first;
    const resampled = resampleLoop(present, resolution ?? present.points.length);
    const zero = { ...createZeroLoop(resampled), closed: resampled.closed };
    return count1 === 0 ? [zero, resampled] : [resampled, zero];
  }

  const n = resolution ?? Math.max(count1, count2);
  const mixed = first.closed !== second.closed;
  const a = resampleLoop(first, mixed && !first.closed ? n + 1 : n);
  const b = resampleLoop(second, mixed && !second.closed ? n + 1 : n);

  const [alignedA, alignedB] = applyAlignment(a, b, aligner.align(a.points, b.points, context));
  if (!mixed) return [alignedA, alignedB];
  return [alignedA.closed ? unroll(alignedA) : alignedA, alignedB.closed ? unroll(alignedB) : alignedB];
}

/**
 * Prepare a structurally matched pair of contour sets.
 * Holes are ordered: matched pairs, then shrinking sources, then growing destinations.
 */
export function prepareMorph(
  source: ContourSet,
  destination: ContourSet,
  rotation: MorphRotation,
  strategies: MorphStrategies
): MorphPair {
  const { resolution, alignment } = strategies;
  const context: AlignmentContext = {
    ...rotation,
    closed1: source.outer.closed,
    closed2: destination.outer.closed,
  };
  const outerAligner = strategies.aligner ?? selectAligner(context, alignment);
  const [outer1, outer2] = alignBoundaries(source.outer, destination.outer, context, outerAligner, resolution);

  const holeAligner = createAngularAligner(alignment.norm);
  const holeContext: AlignmentContext = { rotation1: 0, rotation2: 0, closed1: true, closed2: true };
  const correspondence = strategies.holeMatcher.match(source.holes, destination.holes);

  const holes1: ContourLoop[] = [];
  const holes2: ContourLoop[] = [];
  for (const { source: s, destination: d } of correspondence.pairs) {
    const [h1, h2] = alignBoundaries(source.holes[s]!, destination.holes[d]!, holeContext, holeAligner, resolution);
    holes1.push(h1);
    holes2.push(h2);
  }
  for (const s of correspondence.shrink) {
    const hole = source.holes[s]!;
    const resampled = resampleLoop(hole, resolution ?? hole.points.length);
    holes1.push(resampled);
    holes2.push(createZeroLoop(resampled));
  }
  for (const d of correspondence.grow) {
    const hole = destination.holes[d]!;
    const resampled = resampleLoop(hole, resolution ?? hole.points.length);
    holes1.push(createZeroLoop(resampled));
    holes2.push(resampled);
  }

  return {
    source: createContourSet(outer1, holes1),
    destination: createContourSet(outer2, holes2),
  };
}

function lerpLoop(a: ContourLoop, b: ContourLoop, t: number): ContourLoop {
  return createLoop(
    a.points.map((p, i) => lerpPoint(p, b.points[i] ?? p, t)),
    a.closed && b.closed
  );
}

/**
 * Per-point interpolation of a prepared pair
 */
export function interpolateMorph(pair: MorphPair, t: number): ContourSet {
  const { source, destination } = pair;
  return createContourSet(
    lerpLoop(source.outer, destination.outer, t),
    source.holes.map((hole, i) => lerpLoop(hole, destination.holes[i] ?? hole, t))
  );
}

/**
 * Strategy portion of a memo key.
 * The alignment options stay in the key even with an outer override, since
 * holes are always aligned with the configured norm.
 */
export function strategyCacheKey(strategies: MorphStrategies): string {
  const { alignment } = strategies;
  return [
    strategies.holeMatcher.cacheKey,
    strategies.aligner?.cacheKey ?? 'auto',
    `${alignment.norm}:${alignment.openAligner}`,
    strategies.resolution ?? 'max',
  ].join('/');
}

/**
 * Prepare a pair through the memo table when one is given
 */
export function prepareMorphCached(
  source: ContourSet,
  destination: ContourSet,
  rotation: MorphRotation,
  strategies: MorphStrategies,
  cache?: MorphCache
): MorphPair {
  if (!cache) return prepareMorph(source, destination, rotation, strategies);
  const key = generateMorphKey(source, destination, rotation, strategyCacheKey(strategies));
  return cache.getOrCreate(key, () => prepareMorph(source, destination, rotation, strategies));
}
