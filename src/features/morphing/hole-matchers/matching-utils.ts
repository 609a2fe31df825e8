/**
 * Shared building blocks for hole matching strategies.
 */

import { distance, loopCentroid } from '@/lib/geometry';
import type { ContourLoop, Point } from '@/types/geometry';
import type { HoleCorrespondence, HoleGroup, HolePair } from '@/types/morphing';

export function holeCentroids(holes: readonly ContourLoop[]): Point[] {
  return holes.map(loopCentroid);
}

export function nearestIndex(target: Point, candidates: readonly Point[], exclude?: ReadonlySet<number>): number {
  let best = -1;
  let bestDistance = Infinity;
  candidates.forEach((candidate, index) => {
    if (exclude?.has(index)) return;
    const d = distance(target, candidate);
    if (d < bestDistance) {
      bestDistance = d;
      best = index;
    }
  });
  return best;
}

/**
 * Repeatedly pair the globally closest unmatched (a, b) until one side runs
 * out. Ties resolve to the lower `a` index, then the lower `b` index.
 */
export function pairNearest(a: readonly Point[], b: readonly Point[]): Array<[number, number]> {
  const candidates: Array<{ i: number; j: number; d: number }> = [];
  a.forEach((pa, i) => b.forEach((pb, j) => candidates.push({ i, j, d: distance(pa, pb) })));
  candidates.sort((x, y) => x.d - y.d || x.i - y.i || x.j - y.j);

  const usedA = new Set<number>();
  const usedB = new Set<number>();
  const pairs: Array<[number, number]> = [];
  const limit = Math.min(a.length, b.length);
  for (const { i, j } of candidates) {
    if (pairs.length === limit) break;
    if (usedA.has(i) || usedB.has(j)) continue;
    usedA.add(i);
    usedB.add(j);
    pairs.push([i, j]);
  }
  return pairs.sort((x, y) => x[0] - y[0]);
}

export function range(count: number): number[] {
  return Array.from({ length: count }, (_, i) => i);
}

/**
 * Every source shrinks, every destination grows.
 */
export function unmatchedCorrespondence(sourceCount: number, destinationCount: number): HoleCorrespondence {
  return { pairs: [], shrink: range(sourceCount), grow: range(destinationCount), groups: [] };
}

/**
 * One-to-one pairing used whenever both sides hold the same number of holes.
 */
export function equalCountCorrespondence(
  sources: readonly ContourLoop[],
  destinations: readonly ContourLoop[]
): HoleCorrespondence {
  const pairs = pairNearest(holeCentroids(sources), holeCentroids(destinations));
  return {
    pairs: pairs.map(([source, destination]) => ({ source, destination })),
    shrink: [],
    grow: [],
    groups: pairs.map(([source, destination]) => ({ sources: [source], destinations: [destination] })),
  };
}

/**
 * Build a correspondence from merge/split groups plus leftovers.
 * Groups are ordered by their first destination, then first source.
 */
export function correspondenceFromGroups(
  groups: HoleGroup[],
  shrink: number[] = [],
  grow: number[] = []
): HoleCorrespondence {
  const ordered = groups
    .map((g) => ({ sources: [...g.sources].sort((a, b) => a - b), destinations: [...g.destinations].sort((a, b) => a - b) }))
    .sort((x, y) => (x.destinations[0] ?? 0) - (y.destinations[0] ?? 0) || (x.sources[0] ?? 0) - (y.sources[0] ?? 0));

  const pairs: HolePair[] = [];
  for (const group of ordered) {
    for (const source of group.sources) {
      for (const destination of group.destinations) {
        pairs.push({ source, destination });
      }
    }
  }
  return {
    pairs,
    shrink: [...shrink].sort((a, b) => a - b),
    grow: [...grow].sort((a, b) => a - b),
    groups: ordered,
  };
}

/**
 * Orient a pairing computed from the smaller side back to source/destination.
 * `smallerIsSource` tells which side `small` indexes.
 */
export function toGroups(
  assignments: ReadonlyMap<number, number[]>,
  smallerIsSource: boolean
): HoleGroup[] {
  const groups: HoleGroup[] = [];
  for (const [small, large] of assignments) {
    if (large.length === 0) continue;
    groups.push(smallerIsSource ? { sources: [small], destinations: large } : { sources: large, destinations: [small] });
  }
  return groups;
}
