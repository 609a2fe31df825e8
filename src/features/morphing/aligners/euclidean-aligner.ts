/**
 * Euclidean aligner for boundaries where at least one side is open.
 *
 * Open-to-closed: the closed loop is treated as a ring and every start offset is
 * scored against the open loop (O(n^2)). Open-to-open: only the second loop's
 * orientation is in question. Scores use rotated coordinates; the result is
 * applied to the unrotated points.
 */

import { argMin, pairedDistance, rotatePoints } from '@/lib/geometry';
import type { DistanceNorm, Point } from '@/types/geometry';
import type { AlignmentContext, AlignmentResult, VertexAligner } from '@/types/morphing';
import { NO_ALIGNMENT } from './angular-aligner';

function ringOffsets(open: readonly Point[], ring: readonly Point[], norm: DistanceNorm): number {
  const scores: number[] = [];
  for (let offset = 0; offset < ring.length; offset++) {
    scores.push(pairedDistance(open, ring, offset, norm));
  }
  return argMin(scores);
}

export function createEuclideanAligner(norm: DistanceNorm = 'l1'): VertexAligner {
  return {
    id: 'euclidean',
    cacheKey: `euclidean:${norm}`,
    align(first: readonly Point[], second: readonly Point[], context: AlignmentContext): AlignmentResult {
      if (first.length < 2 || second.length < 2) return NO_ALIGNMENT;

      const rotated1 = rotatePoints(first, context.rotation1);
      const rotated2 = rotatePoints(second, context.rotation2);

      if (context.closed2) {
        return { offset: ringOffsets(rotated1, rotated2, norm), shifted: 'second', reversed: false };
      }
      if (context.closed1) {
        return { offset: ringOffsets(rotated2, rotated1, norm), shifted: 'first', reversed: false };
      }

      if (first.length !== second.length) return NO_ALIGNMENT;
      const forward = pairedDistance(rotated1, rotated2, 0, norm);
      const backward = pairedDistance(rotated1, [...rotated2].reverse(), 0, norm);
      return { offset: 0, shifted: 'second', reversed: backward < forward };
    },
  };
}
