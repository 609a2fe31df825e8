/**
 * Clustering hole matching.
 *
 * The larger side's hole centroids are grouped by k-means into as many
 * clusters as the smaller side has holes. Each cluster then pairs with the
 * nearest unused hole on the smaller side, and every member of the cluster
 * merges into (or splits out of) that hole.
 */

import type { ClusteringOptions } from '@/lib/config';
import { balanceClusters, clusterMembers, createSeededRandom, kMeans, meanPoint } from '@/lib/geometry';
import { createLogger } from '@/lib/logger';
import type { ContourLoop } from '@/types/geometry';
import type { HoleCorrespondence, HoleMatcher } from '@/types/morphing';
import { correspondenceFromGroups, holeCentroids, pairNearest, toGroups } from './matching-utils';
import { resolveTrivialCases } from './trivial-cases';

const log = createLogger('ClusteringMatcher');

export function createClusteringMatcher(options: ClusteringOptions): HoleMatcher {
  const { balanceClusters: balance, maxIterations, randomSeed } = options;

  return {
    id: 'clustering',
    cacheKey: `clustering:${balance}:${maxIterations}:${randomSeed}`,
    match(sources: readonly ContourLoop[], destinations: readonly ContourLoop[]): HoleCorrespondence {
      const trivial = resolveTrivialCases(sources, destinations);
      if (trivial) return trivial;

      const smallerIsSource = sources.length < destinations.length;
      const small = holeCentroids(smallerIsSource ? sources : destinations);
      const large = holeCentroids(smallerIsSource ? destinations : sources);

      const result = kMeans(large, {
        k: small.length,
        maxIterations,
        random: createSeededRandom(randomSeed),
      });
      log.debug(`k-means settled after ${result.iterations} iterations`, { k: small.length, points: large.length });

      const assignments = balance ? balanceClusters(large, result.assignments, result.centers) : result.assignments;
      const members = clusterMembers(assignments, small.length);
      const centers = members.map((indices, cluster) =>
        indices.length > 0 ? meanPoint(indices.map((i) => large[i]!)) : result.centers[cluster]!
      );

      const bySmall = new Map<number, number[]>();
      for (const [cluster, s] of pairNearest(centers, small)) {
        bySmall.set(s, members[cluster] ?? []);
      }

      // A hole whose cluster came out empty has nothing to pair with
      const orphans = small.map((_, s) => s).filter((s) => (bySmall.get(s)?.length ?? 0) === 0);
      return correspondenceFromGroups(
        toGroups(bySmall, smallerIsSource),
        smallerIsSource ? orphans : [],
        smallerIsSource ? [] : orphans
      );
    },
  };
}
