/**
 * Hole matching strategies and the factory that builds one from configuration.
 */

import type { MorphingConfig } from '@/lib/config';
import type { HoleMatcher, HoleMatcherId } from '@/types/morphing';
import { createClusteringMatcher } from './clustering-matcher';
import { createDiscreteMatcher } from './discrete-matcher';
import { createGreedyMatcher } from './greedy-matcher';
import { createOptimalMatcher } from './optimal-matcher';
import { createSimpleMatcher } from './simple-matcher';

export { createClusteringMatcher, createDiscreteMatcher, createGreedyMatcher, createOptimalMatcher, createSimpleMatcher };

export function createHoleMatcher(id: HoleMatcherId, config: MorphingConfig): HoleMatcher {
  switch (id) {
    case 'clustering':
      return createClusteringMatcher(config.clustering);
    case 'greedy':
      return createGreedyMatcher();
    case 'discrete':
      return createDiscreteMatcher();
    case 'simple':
      return createSimpleMatcher();
    case 'optimal-assignment':
      return createOptimalMatcher();
  }
}
