/**
 * Greedy hole matching.
 *
 * Holes on the smaller side each take their nearest unmatched partner on the
 * larger side; the larger side's leftovers then merge into (or split from)
 * their nearest hole on the smaller side. No hole disappears.
 */

import type { ContourLoop } from '@/types/geometry';
import type { HoleCorrespondence, HoleMatcher } from '@/types/morphing';
import {
  correspondenceFromGroups,
  holeCentroids,
  nearestIndex,
  pairNearest,
  range,
  toGroups,
} from './matching-utils';
import { resolveTrivialCases } from './trivial-cases';

export function createGreedyMatcher(): HoleMatcher {
  return {
    id: 'greedy',
    cacheKey: 'greedy',
    match(sources: readonly ContourLoop[], destinations: readonly ContourLoop[]): HoleCorrespondence {
      const trivial = resolveTrivialCases(sources, destinations);
      if (trivial) return trivial;

      const smallerIsSource = sources.length < destinations.length;
      const small = holeCentroids(smallerIsSource ? sources : destinations);
      const large = holeCentroids(smallerIsSource ? destinations : sources);

      const assignments = new Map<number, number[]>(range(small.length).map((i) => [i, []]));
      const taken = new Set<number>();
      for (const [s, l] of pairNearest(small, large)) {
        assignments.get(s)?.push(l);
        taken.add(l);
      }
      large.forEach((centroid, l) => {
        if (taken.has(l)) return;
        assignments.get(nearestIndex(centroid, small))?.push(l);
      });

      return correspondenceFromGroups(toGroups(assignments, smallerIsSource));
    },
  };
}
