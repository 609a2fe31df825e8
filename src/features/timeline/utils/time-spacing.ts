/**
 * Time assignment and lookup shared by keystate and attribute timelines.
 */

/**
 * Fill missing times. A missing first time becomes 0, a missing last time 1,
 * and every run of missing times in between is spaced linearly between its
 * timed neighbours.
 */
export function fillMissingTimes(times: readonly (number | undefined)[]): number[] {
  const filled = [...times];
  if (filled.length === 0) return [];
  if (filled[0] === undefined) filled[0] = 0;
  if (filled.length > 1 && filled[filled.length - 1] === undefined) filled[filled.length - 1] = 1;

  let anchor = 0;
  for (let i = 1; i < filled.length; i++) {
    const time = filled[i];
    if (time === undefined) continue;
    const start = filled[anchor] ?? 0;
    const gap = i - anchor;
    for (let k = anchor + 1; k < i; k++) {
      filled[k] = start + ((time - start) * (k - anchor)) / gap;
    }
    anchor = i;
  }

  return filled.map((time) => time ?? 0);
}

/**
 * Index of the first time that does not exceed its predecessor, or -1
 */
export function findNonIncreasing(times: readonly number[]): number {
  for (let i = 1; i < times.length; i++) {
    if (times[i]! <= times[i - 1]!) return i;
  }
  return -1;
}

/**
 * Segment containing `t`: the largest i with times[i] <= t, capped so that
 * i + 1 is still a valid index. Callers handle t outside the span first.
 */
export function findSegmentIndex(times: readonly number[], t: number): number {
  let low = 0;
  let high = times.length - 2;
  while (low < high) {
    const mid = (low + high + 1) >> 1;
    if (times[mid]! <= t) low = mid;
    else high = mid - 1;
  }
  return Math.max(0, low);
}

/**
 * Local progress within [start, end], clamped to [0, 1]
 */
export function localProgress(start: number, end: number, t: number): number {
  const span = end - start;
  if (span <= 0) return 1;
  return Math.max(0, Math.min(1, (t - start) / span));
}
