/**
 * Angular aligner for closed-to-closed boundaries.
 *
 * Each point is described by its bearing around the loop's vertex mean, measured
 * clockwise from "up". The second loop's start index is chosen so that paired
 * bearings agree best. Declared rotations are applied before bearings are taken.
 */

import { aggregate, argMin, meanPoint, rotatePoints } from '@/lib/geometry';
import type { DistanceNorm, Point } from '@/types/geometry';
import type { AlignmentContext, AlignmentResult, VertexAligner } from '@/types/morphing';

const TWO_PI = Math.PI * 2;

/**
 * Bearing of every point around the vertex mean, in [0, 2π)
 */
export function centroidAngles(points: readonly Point[]): number[] {
  const center = meanPoint(points);
  return points.map((p) => {
    const angle = Math.atan2(p.x - center.x, -(p.y - center.y));
    return angle < 0 ? angle + TWO_PI : angle;
  });
}

/**
 * Shortest angular separation, in [0, π]
 */
export function angleDistance(a: number, b: number): number {
  const diff = Math.abs(a - b) % TWO_PI;
  return diff > Math.PI ? TWO_PI - diff : diff;
}

export const NO_ALIGNMENT: AlignmentResult = Object.freeze({ offset: 0, shifted: 'second' as const, reversed: false });

export function createAngularAligner(norm: DistanceNorm = 'l1'): VertexAligner {
  return {
    id: 'angular',
    cacheKey: `angular:${norm}`,
    align(first: readonly Point[], second: readonly Point[], context: AlignmentContext): AlignmentResult {
      const n = first.length;
      if (n < 2 || second.length !== n) return NO_ALIGNMENT;

      const angles1 = centroidAngles(rotatePoints(first, context.rotation1));
      const angles2 = centroidAngles(rotatePoints(second, context.rotation2));

      const scores: number[] = [];
      for (let offset = 0; offset < n; offset++) {
        scores.push(aggregate(angles1.map((a, i) => angleDistance(a, angles2[(i + offset) % n]!)), norm));
      }
      return { offset: argMin(scores), shifted: 'second', reversed: false };
    },
  };
}
