/**
 * Vertex aligners and default selection by closedness.
 */

import type { AlignmentOptions } from '@/lib/config';
import type { AlignerId, AlignmentContext, VertexAligner } from '@/types/morphing';
import { NO_ALIGNMENT, angleDistance, centroidAngles, createAngularAligner } from './angular-aligner';
import { createEuclideanAligner } from './euclidean-aligner';

export { NO_ALIGNMENT, angleDistance, centroidAngles, createAngularAligner, createEuclideanAligner };

/**
 * Keeps the incoming correspondence
 */
export const noneAligner: VertexAligner = {
  id: 'none',
  cacheKey: 'none',
  align: () => NO_ALIGNMENT,
};

export function createAligner(id: AlignerId, options: AlignmentOptions): VertexAligner {
  switch (id) {
    case 'angular':
      return createAngularAligner(options.norm);
    case 'euclidean':
      return createEuclideanAligner(options.norm);
    case 'none':
      return noneAligner;
  }
}

/**
 * Default aligner for a pair of boundaries: angular when both are closed,
 * euclidean when exactly one is open, and the configured choice for open pairs.
 */
export function selectAligner(context: AlignmentContext, options: AlignmentOptions): VertexAligner {
  if (context.closed1 && context.closed2) return createAngularAligner(options.norm);
  if (context.closed1 || context.closed2) return createEuclideanAligner(options.norm);
  return createAligner(options.openAligner, options);
}
