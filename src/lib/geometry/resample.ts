/**
 * Arc-length resampling of point loops.
 */

import type { ContourLoop, Point } from '@/types/geometry';
import { distance, lerpPoint, loopLength } from './loop-utils';

/**
 * Resample a loop to `count` points spaced evenly along its length.
 *
 * Closed loops sample at i * L / count (the closing edge included, the start
 * point not repeated). Open loops keep both endpoints.
 */
export function resampleLoop(loop: ContourLoop, count: number): ContourLoop {
  const { points, closed } = loop;
  if (points.length === 0 || count <= 0) return { points: [], closed };

  const first = points[0]!;
  const total = loopLength(loop);
  if (points.length === 1 || total === 0) {
    return { points: Array.from({ length: count }, () => ({ x: first.x, y: first.y })), closed };
  }

  const path: Point[] = closed ? [...points, first] : [...points];
  const step = closed ? total / count : count > 1 ? total / (count - 1) : 0;

  const result: Point[] = [];
  let segment = 0;
  let segmentStart = 0;
  let segmentLength = distance(path[0]!, path[1]!);

  for (let i = 0; i < count; i++) {
    const target = Math.min(i * step, total);
    while (segment < path.length - 2 && segmentStart + segmentLength < target) {
      segmentStart += segmentLength;
      segment++;
      segmentLength = distance(path[segment]!, path[segment + 1]!);
    }
    const local = segmentLength === 0 ? 0 : (target - segmentStart) / segmentLength;
    result.push(lerpPoint(path[segment]!, path[segment + 1]!, Math.min(1, Math.max(0, local))));
  }

  if (!closed && count > 1) {
    // Pin the far endpoint against accumulated rounding
    const last = path[path.length - 1]!;
    result[count - 1] = { x: last.x, y: last.y };
  }

  return { points: result, closed };
}
