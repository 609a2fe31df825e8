/**
 * Batch frame rendering. Frames are independent, so a batch can be split
 * into contiguous ranges rendered by separate workers, each holding its own
 * animation built from the same input.
 */

import type { Snapshot } from '@/types/snapshot';
import type { Animation } from './animation';

export interface FrameRange {
  /** First frame index, inclusive */
  start: number;
  /** Last frame index, exclusive */
  end: number;
}

/**
 * `count` evenly spaced times from 0 to 1 inclusive. One frame sits at 0.
 */
export function frameTimes(count: number): number[] {
  if (!Number.isInteger(count) || count < 0) {
    throw new RangeError(`Frame count must be a non-negative integer, got ${count}`);
  }
  if (count === 1) return [0];
  return Array.from({ length: count }, (_, i) => (i === count - 1 ? 1 : i / (count - 1)));
}

/**
 * Render frames of a `count`-frame batch, all of them or just `range`
 */
export function sampleFrames(animation: Animation, count: number, range?: FrameRange): Snapshot[] {
  const times = frameTimes(count);
  const start = Math.max(0, range?.start ?? 0);
  const end = Math.min(count, range?.end ?? count);
  return times.slice(start, Math.max(start, end)).map((t) => animation.at(t));
}

/**
 * Split `count` frames into at most `shards` contiguous ranges of near-equal size
 */
export function splitFrameRanges(count: number, shards: number): FrameRange[] {
  const parts = Math.max(1, Math.min(shards, count));
  const ranges: FrameRange[] = [];
  for (let i = 0; i < parts; i++) {
    const start = Math.floor((i * count) / parts);
    const end = Math.floor(((i + 1) * count) / parts);
    if (end > start) ranges.push({ start, end });
  }
  return ranges;
}
