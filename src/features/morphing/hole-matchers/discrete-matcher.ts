/**
 * Discrete hole matching.
 *
 * Pairs min(N, M) holes nearest-first. Excess source holes shrink to a point in
 * place; excess destination holes grow from a point in place.
 */

import type { ContourLoop } from '@/types/geometry';
import type { HoleCorrespondence, HoleMatcher } from '@/types/morphing';
import { correspondenceFromGroups, holeCentroids, pairNearest, range } from './matching-utils';
import { resolveTrivialCases } from './trivial-cases';

export function createDiscreteMatcher(): HoleMatcher {
  return {
    id: 'discrete',
    cacheKey: 'discrete',
    match(sources: readonly ContourLoop[], destinations: readonly ContourLoop[]): HoleCorrespondence {
      const trivial = resolveTrivialCases(sources, destinations);
      if (trivial) return trivial;

      const pairs = pairNearest(holeCentroids(sources), holeCentroids(destinations));
      const matchedSources = new Set(pairs.map(([s]) => s));
      const matchedDestinations = new Set(pairs.map(([, d]) => d));

      return correspondenceFromGroups(
        pairs.map(([s, d]) => ({ sources: [s], destinations: [d] })),
        range(sources.length).filter((s) => !matchedSources.has(s)),
        range(destinations.length).filter((d) => !matchedDestinations.has(d))
      );
    },
  };
}
