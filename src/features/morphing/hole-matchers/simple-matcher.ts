import type { ContourLoop } from '@/types/geometry';
import type { HoleCorrespondence, HoleMatcher } from '@/types/morphing';
import { unmatchedCorrespondence } from './matching-utils';

/**
 * No matching: every source hole shrinks and every destination hole grows,
 * whatever the counts. Suits unrelated hole layouts.
 */
export function createSimpleMatcher(): HoleMatcher {
  return {
    id: 'simple',
    cacheKey: 'simple',
    match(sources: readonly ContourLoop[], destinations: readonly ContourLoop[]): HoleCorrespondence {
      return unmatchedCorrespondence(sources.length, destinations.length);
    },
  };
}
