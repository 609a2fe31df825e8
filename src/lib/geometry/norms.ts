import type { DistanceNorm, Point } from '@/types/geometry';
import { distance } from './loop-utils';

/**
 * Fold per-point distances under a norm
 */
export function aggregate(values: readonly number[], norm: DistanceNorm): number {
  let total = 0;
  for (const d of values) {
    switch (norm) {
      case 'l1':
        total += d;
        break;
      case 'l2':
        total += d * d;
        break;
      case 'linf':
        total = Math.max(total, d);
        break;
    }
  }
  return norm === 'l2' ? Math.sqrt(total) : total;
}

/**
 * Distance between `first` and the cyclic list `second` read from `offset`.
 * `first` may be longer than `second`; its extra points wrap around again.
 */
export function pairedDistance(
  first: readonly Point[],
  second: readonly Point[],
  offset: number,
  norm: DistanceNorm
): number {
  const n = second.length;
  return aggregate(
    first.map((p, i) => distance(p, second[(i + offset) % n]!)),
    norm
  );
}

/**
 * Index of the smallest score; ties keep the earliest index.
 */
export function argMin(scores: readonly number[]): number {
  let best = 0;
  for (let i = 1; i < scores.length; i++) {
    if (scores[i]! < scores[best]!) best = i;
  }
  return best;
}
