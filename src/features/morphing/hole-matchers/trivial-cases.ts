import type { ContourLoop } from '@/types/geometry';
import type { HoleCorrespondence } from '@/types/morphing';
import { equalCountCorrespondence, unmatchedCorrespondence } from './matching-utils';

/**
 * Cases every strategy settles the same way: an empty side means pure
 * grow/shrink, equal counts mean one-to-one nearest pairing.
 */
export function resolveTrivialCases(
  sources: readonly ContourLoop[],
  destinations: readonly ContourLoop[]
): HoleCorrespondence | undefined {
  if (sources.length === 0 || destinations.length === 0) {
    return unmatchedCorrespondence(sources.length, destinations.length);
  }
  if (sources.length === destinations.length) {
    return equalCountCorrespondence(sources, destinations);
  }
  return undefined;
}
