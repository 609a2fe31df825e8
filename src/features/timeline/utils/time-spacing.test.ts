import { describe, expect, it } from 'vitest';
import { fillMissingTimes, findNonIncreasing, findSegmentIndex, localProgress } from './time-spacing';

describe('fillMissingTimes', () => {
  it('spaces untimed entries evenly across 0-1', () => {
    expect(fillMissingTimes([undefined, undefined, undefined, undefined, undefined])).toEqual([0, 0.25, 0.5, 0.75, 1]);
  });

  it('places an untimed entry between its timed neighbours', () => {
    expect(fillMissingTimes([0, undefined, 1])).toEqual([0, 0.5, 1]);
    expect(fillMissingTimes([undefined, 0.5, undefined, undefined])).toEqual([0, 0.5, 0.75, 1]);
  });

  it('keeps explicit times', () => {
    expect(fillMissingTimes([0.2, 0.4, 0.9])).toEqual([0.2, 0.4, 0.9]);
  });

  it('handles a single entry', () => {
    expect(fillMissingTimes([undefined])).toEqual([0]);
  });
});

describe('findNonIncreasing', () => {
  it('reports the first offending index', () => {
    expect(findNonIncreasing([0, 0.5, 0.5, 1])).toBe(2);
    expect(findNonIncreasing([0, 0.7, 0.3, 1])).toBe(2);
    expect(findNonIncreasing([0, 0.5, 1])).toBe(-1);
  });
});

describe('findSegmentIndex', () => {
  const times = [0, 0.25, 0.5, 1];

  it('finds the segment whose start is at or before t', () => {
    expect(findSegmentIndex(times, 0.1)).toBe(0);
    expect(findSegmentIndex(times, 0.25)).toBe(1);
    expect(findSegmentIndex(times, 0.75)).toBe(2);
  });

  it('caps at the last segment', () => {
    expect(findSegmentIndex(times, 1)).toBe(2);
  });
});

describe('localProgress', () => {
  it('normalizes and clamps', () => {
    expect(localProgress(0.5, 1, 0.75)).toBe(0.5);
    expect(localProgress(0.5, 1, 2)).toBe(1);
    expect(localProgress(0.5, 1, 0)).toBe(0);
  });
});
