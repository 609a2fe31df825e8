/**
 * Morphing feature - public API
 *
 * Vertex alignment, hole matching and the contour adapter that combines them.
 */

export {
  createAligner,
  createAngularAligner,
  createEuclideanAligner,
  noneAligner,
  selectAligner,
} from './aligners';
export {
  createClusteringMatcher,
  createDiscreteMatcher,
  createGreedyMatcher,
  createHoleMatcher,
  createOptimalMatcher,
  createSimpleMatcher,
} from './hole-matchers';
export {
  alignBoundaries,
  interpolateMorph,
  prepareMorph,
  prepareMorphCached,
  strategyCacheKey,
} from './utils/contour-morph';
export type { MorphRotation, MorphStrategies } from './utils/contour-morph';
export { MorphCache, createMorphCache, generateMorphKey } from './utils/morph-cache';
export type { MorphCacheStats } from './utils/morph-cache';
