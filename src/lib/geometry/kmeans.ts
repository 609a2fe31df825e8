/**
 * Seeded k-means over 2D points with k-means++ initialisation, plus a
 * rebalancing pass that evens out cluster sizes.
 */

import type { Point } from '@/types/geometry';
import { distance, meanPoint } from './loop-utils';

const CONVERGENCE_EPSILON = 1e-6;

export interface KMeansOptions {
  k: number;
  maxIterations: number;
  /** Uniform source in [0, 1); seeded for reproducible results */
  random: () => number;
}

export interface KMeansResult {
  /** Cluster index per input point */
  assignments: number[];
  centers: Point[];
  iterations: number;
}

function nearestCenter(point: Point, centers: readonly Point[]): number {
  let best = 0;
  let bestDistance = Infinity;
  centers.forEach((center, index) => {
    const d = distance(point, center);
    if (d < bestDistance) {
      bestDistance = d;
      best = index;
    }
  });
  return best;
}

function seedCenters(points: readonly Point[], k: number, random: () => number): Point[] {
  const centers: Point[] = [points[Math.floor(random() * points.length)]!];
  while (centers.length < k) {
    const weights = points.map((p) => {
      const d = distance(p, centers[nearestCenter(p, centers)]!);
      return d * d;
    });
    const total = weights.reduce((sum, w) => sum + w, 0);
    if (total === 0) {
      centers.push(points[Math.floor(random() * points.length)]!);
      continue;
    }
    let threshold = random() * total;
    let chosen = points.length - 1;
    for (let i = 0; i < weights.length; i++) {
      threshold -= weights[i]!;
      if (threshold < 0) {
        chosen = i;
        break;
      }
    }
    centers.push(points[chosen]!);
  }
  return centers;
}

/**
 * Members of each cluster, in input order
 */
export function clusterMembers(assignments: readonly number[], k: number): number[][] {
  const members: number[][] = Array.from({ length: k }, () => []);
  assignments.forEach((cluster, index) => members[cluster]?.push(index));
  return members;
}

function clusterCenters(points: readonly Point[], members: readonly number[][], previous: readonly Point[]): Point[] {
  return members.map((indices, cluster) =>
    indices.length > 0 ? meanPoint(indices.map((i) => points[i]!)) : previous[cluster]!
  );
}

export function kMeans(points: readonly Point[], options: KMeansOptions): KMeansResult {
  const k = Math.min(options.k, points.length);
  if (k <= 0) return { assignments: points.map(() => 0), centers: [], iterations: 0 };

  let centers = seedCenters(points, k, options.random);
  let assignments = points.map((p) => nearestCenter(p, centers));
  let iterations = 0;

  while (iterations < options.maxIterations) {
    iterations++;
    const next = clusterCenters(points, clusterMembers(assignments, k), centers);
    const shift = Math.max(...next.map((c, i) => distance(c, centers[i]!)));
    centers = next;
    assignments = points.map((p) => nearestCenter(p, centers));
    if (shift < CONVERGENCE_EPSILON) break;
  }

  return { assignments, centers, iterations };
}

/**
 * Move points out of the largest cluster into the smallest until sizes differ
 * by at most one. Each move takes the member closest to the receiving
 * cluster's centre.
 */
export function balanceClusters(
  points: readonly Point[],
  assignments: readonly number[],
  centers: readonly Point[]
): number[] {
  const k = centers.length;
  const result = [...assignments];
  if (k < 2) return result;

  for (;;) {
    const members = clusterMembers(result, k);
    const sizes = members.map((m) => m.length);
    const largest = sizes.indexOf(Math.max(...sizes));
    const smallest = sizes.indexOf(Math.min(...sizes));
    if (sizes[largest]! - sizes[smallest]! <= 1) return result;

    const target = clusterCenters(points, members, centers)[smallest]!;
    let moved = -1;
    let movedDistance = Infinity;
    for (const index of members[largest]!) {
      const d = distance(points[index]!, target);
      if (d < movedDistance) {
        movedDistance = d;
        moved = index;
      }
    }
    result[moved] = smallest;
  }
}
