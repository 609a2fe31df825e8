import { describe, expect, it } from 'vitest';
import { shiftPoints } from '@/lib/geometry';
import type { AlignmentContext } from '@/types/morphing';
import { angleDistance, createAngularAligner, createEuclideanAligner, noneAligner, selectAligner } from './index';

const line = [
  { x: -15, y: 0 },
  { x: -5, y: 0 },
  { x: 5, y: 0 },
  { x: 15, y: 0 },
];

const square = [
  { x: -5, y: -5 },
  { x: 5, y: -5 },
  { x: 5, y: 5 },
  { x: -5, y: 5 },
];

function context(overrides: Partial<AlignmentContext>): AlignmentContext {
  return { rotation1: 0, rotation2: 0, closed1: true, closed2: true, ...overrides };
}

describe('angleDistance', () => {
  it('measures the short way around', () => {
    expect(angleDistance(0.1, Math.PI * 2 - 0.1)).toBeCloseTo(0.2, 12);
  });
});

describe('angular aligner', () => {
  const aligner = createAngularAligner();

  it('recovers a cyclic shift of the same loop', () => {
    const result = aligner.align(square, shiftPoints(square, 1), context({}));
    expect(result).toEqual({ offset: 3, shifted: 'second', reversed: false });
  });

  it('accounts for declared rotation', () => {
    expect(aligner.align(square, square, context({})).offset).toBe(0);
    expect(aligner.align(square, square, context({ rotation2: 90 })).offset).toBe(3);
  });

  it('returns a zero offset for degenerate loops', () => {
    expect(aligner.align([{ x: 0, y: 0 }], [{ x: 1, y: 1 }], context({})).offset).toBe(0);
  });
});

describe('euclidean aligner', () => {
  const aligner = createEuclideanAligner();
  const openToClosed = context({ closed1: false });

  it('shifts the closed loop to follow the open one', () => {
    expect(aligner.align(line, square, openToClosed)).toEqual({ offset: 3, shifted: 'second', reversed: false });
  });

  it('finds a different offset once either shape is rotated', () => {
    expect(aligner.align(line, square, { ...openToClosed, rotation2: 90 }).offset).toBe(2);
    expect(aligner.align(line, square, { ...openToClosed, rotation1: 90 }).offset).toBe(0);
  });

  it('shifts the first loop when only it is closed', () => {
    expect(aligner.align(square, line, context({ closed2: false }))).toEqual({
      offset: 3,
      shifted: 'first',
      reversed: false,
    });
  });

  it('reverses an open loop running the other way', () => {
    const forward = [{ x: 0, y: 0 }, { x: 10, y: 0 }];
    const backward = [{ x: 10, y: 0 }, { x: 0, y: 0 }];
    const openPair = context({ closed1: false, closed2: false });
    expect(aligner.align(forward, backward, openPair).reversed).toBe(true);
    expect(aligner.align(forward, forward, openPair).reversed).toBe(false);
  });
});

describe('selectAligner', () => {
  const options = { norm: 'l1' as const, openAligner: 'none' as const };

  it('picks by closedness', () => {
    expect(selectAligner(context({}), options).id).toBe('angular');
    expect(selectAligner(context({ closed2: false }), options).id).toBe('euclidean');
    expect(selectAligner(context({ closed1: false, closed2: false }), options)).toBe(noneAligner);
  });

  it('honours the open-to-open default', () => {
    const aligner = selectAligner(context({ closed1: false, closed2: false }), { norm: 'l2', openAligner: 'euclidean' });
    expect(aligner.cacheKey).toBe('euclidean:l2');
  });
});
