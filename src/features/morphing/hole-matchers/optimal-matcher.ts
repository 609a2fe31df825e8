/**
 * Optimal-assignment hole matching.
 *
 * Pairs min(N, M) holes so that the summed centroid distance is globally
 * minimal, then merges or splits the larger side's leftovers into their
 * nearest partner, as the greedy strategy does.
 */

import { distance, solveAssignment } from '@/lib/geometry';
import type { ContourLoop } from '@/types/geometry';
import type { HoleCorrespondence, HoleMatcher } from '@/types/morphing';
import { correspondenceFromGroups, holeCentroids, nearestIndex, range, toGroups } from './matching-utils';
import { resolveTrivialCases } from './trivial-cases';

export function createOptimalMatcher(): HoleMatcher {
  return {
    id: 'optimal-assignment',
    cacheKey: 'optimal-assignment',
    match(sources: readonly ContourLoop[], destinations: readonly ContourLoop[]): HoleCorrespondence {
      const trivial = resolveTrivialCases(sources, destinations);
      if (trivial) return trivial;

      const smallerIsSource = sources.length < destinations.length;
      const small = holeCentroids(smallerIsSource ? sources : destinations);
      const large = holeCentroids(smallerIsSource ? destinations : sources);

      const assigned = solveAssignment(small.map((s) => large.map((l) => distance(s, l))));
      const assignments = new Map<number, number[]>(range(small.length).map((i) => [i, []]));
      const taken = new Set<number>();
      assigned.forEach((l, s) => {
        if (l < 0) return;
        assignments.get(s)?.push(l);
        taken.add(l);
      });
      large.forEach((centroid, l) => {
        if (taken.has(l)) return;
        assignments.get(nearestIndex(centroid, small))?.push(l);
      });

      return correspondenceFromGroups(toGroups(assignments, smallerIsSource));
    },
  };
}
