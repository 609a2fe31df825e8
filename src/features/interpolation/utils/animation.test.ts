import { describe, expect, it } from 'vitest';
import { parseTimelineJson } from '@/features/timeline/utils/timeline-document';
import { rgba } from '@/lib/color';
import { IncompatibleAttributeError } from '@/lib/errors';
import { createContourSet } from '@/lib/geometry';
import { makeRectLoop } from '@/lib/shapes/shape-generators';
import { VariantRegistry } from '@/lib/shapes/variant-registry';
import { isContourSet } from '@/lib/guards';
import type { AttributeMap, Snapshot } from '@/types/snapshot';
import { createAnimation } from './animation';

// Variants without default easing interpolate linearly
function createTestRegistry(): VariantRegistry {
  const registry = new VariantRegistry();
  registry.register({ id: 'blob' });
  registry.register({ id: 'dot' });
  registry.register({ id: 'stepper', defaultEasing: { x: 'step' } });
  registry.register({
    id: 'square',
    generateContours: (a) => {
      const size = typeof a.size === 'number' ? a.size : 2;
      return createContourSet(makeRectLoop({ width: size, height: size }));
    },
  });
  return registry;
}

const snap = (variant: string, attributes: AttributeMap): Snapshot => ({ variant, attributes });

function numberAt(snapshot: Snapshot, name: string): number {
  const value = snapshot.attributes[name];
  if (typeof value !== 'number') throw new Error(`${name} is not a number`);
  return value;
}

describe('createAnimation', () => {
  it('returns the first and last snapshots exactly at the boundaries', () => {
    const first = snap('blob', { x: 0, rotation: 10 });
    const last = snap('dot', { x: 100, rotation: 350 });
    const animation = createAnimation({ keystates: [first, last], registry: createTestRegistry() });
    expect(animation.at(0)).toBe(first);
    expect(animation.at(1)).toBe(last);
    expect(animation.at(-0.5)).toBe(first);
    expect(animation.at(1.5)).toBe(last);
  });

  it('holds the first snapshot before a late first keystate', () => {
    const first = snap('blob', { x: 0 });
    const animation = createAnimation({
      keystates: [[0.5, first], snap('blob', { x: 10 })],
      registry: createTestRegistry(),
    });
    expect(animation.at(0.2)).toBe(first);
    expect(numberAt(animation.at(0.75), 'x')).toBe(5);
  });

  it('interpolates numbers on local segment progress', () => {
    const animation = createAnimation({
      keystates: [snap('blob', { x: 0 }), [0.25, snap('blob', { x: 50 })], snap('blob', { x: 100 })],
      registry: createTestRegistry(),
    });
    expect(numberAt(animation.at(0.125), 'x')).toBe(25);
    expect(numberAt(animation.at(0.625), 'x')).toBe(75);
  });

  it('is monotonic for numeric attributes with the stock easing', () => {
    const animation = createAnimation({
      keystates: [snap('circle', { x: 0, radius: 10 }), snap('circle', { x: 100, radius: 30 })],
    });
    let previous = -Infinity;
    for (let i = 0; i <= 20; i++) {
      const x = numberAt(animation.at(i / 20), 'x');
      expect(x).toBeGreaterThanOrEqual(previous);
      previous = x;
    }
  });

  it('rotates along the shortest arc', () => {
    const animation = createAnimation({
      keystates: [snap('blob', { rotation: 350 }), snap('blob', { rotation: 10 })],
      registry: createTestRegistry(),
    });
    expect(numberAt(animation.at(0.5), 'rotation')).toBe(0);
    expect(numberAt(animation.at(0.25), 'rotation')).toBe(355);
  });

  it('switches variant at the segment midpoint without a jump in shared attributes', () => {
    const animation = createAnimation({
      keystates: [snap('blob', { x: 0, spikes: 3 }), snap('dot', { x: 100, dotSize: 4 })],
      registry: createTestRegistry(),
    });
    const before = animation.at(0.49);
    const after = animation.at(0.5);
    expect(before.variant).toBe('blob');
    expect(after.variant).toBe('dot');
    expect(numberAt(before, 'x')).toBeCloseTo(49, 10);
    expect(numberAt(after, 'x')).toBeCloseTo(50, 10);
    expect(before.attributes).toHaveProperty('spikes', 3);
    expect(before.attributes).not.toHaveProperty('dotSize');
    expect(after.attributes).toHaveProperty('dotSize', 4);
    expect(after.attributes).not.toHaveProperty('spikes');
  });

  it('blends colors and steps discrete values', () => {
    const animation = createAnimation({
      keystates: [
        snap('blob', { fill: rgba(0, 0, 0), visible: true, label: 'a' }),
        snap('blob', { fill: rgba(200, 100, 0), visible: false, label: 'b' }),
      ],
      registry: createTestRegistry(),
    });
    expect(animation.at(0.5).attributes.fill).toEqual(rgba(100, 50, 0));
    expect(animation.at(0.4).attributes.visible).toBe(true);
    expect(animation.at(0.6).attributes.visible).toBe(false);
    expect(animation.at(0.6).attributes.label).toBe('b');
  });

  it('applies easing by priority', () => {
    const registry = createTestRegistry();
    const keystate = (easing?: Record<string, 'ease-in'>) => ({ snapshot: snap('stepper', { x: 100 }), easing });

    const fromVariant = createAnimation({ keystates: [snap('stepper', { x: 0 }), keystate()], registry });
    expect(numberAt(fromVariant.at(0.4), 'x')).toBe(0);

    const fromEntity = createAnimation({
      keystates: [snap('stepper', { x: 0 }), keystate()],
      easing: { x: 'ease-in' },
      registry,
    });
    expect(numberAt(fromEntity.at(0.5), 'x')).toBe(25);

    const fromKeystate = createAnimation({
      keystates: [snap('stepper', { x: 0 }), keystate({ x: 'ease-in' })],
      easing: { x: 'step' },
      registry,
    });
    expect(numberAt(fromKeystate.at(0.5), 'x')).toBe(25);
  });

  it('keeps one-sided attributes from the base side', () => {
    const animation = createAnimation({
      keystates: [snap('blob', { x: 0, label: 'a' }), snap('blob', { x: 10 })],
      registry: createTestRegistry(),
    });
    expect(animation.at(0.25).attributes.label).toBe('a');
    expect(animation.at(0.75).attributes).not.toHaveProperty('label');
  });

  it('rejects incompatible attributes in strict mode', () => {
    const registry = createTestRegistry();
    expect(() =>
      createAnimation({
        keystates: [snap('blob', { x: 0, label: 'a' }), snap('blob', { x: 10 })],
        registry,
        strict: true,
      })
    ).toThrow(new IncompatibleAttributeError('Segment 0: attribute "label" present only in the start snapshot', 'label'));

    expect(() =>
      createAnimation({
        keystates: [snap('blob', { x: 0 }), snap('blob', { x: 'wide' })],
        registry,
        strict: true,
      })
    ).toThrow('Segment 0: attribute "x" number cannot interpolate to discrete');
  });

  it('does not apply strict checks across a variant switch', () => {
    const animation = createAnimation({
      keystates: [snap('blob', { spikes: 3 }), snap('dot', { dotSize: 4 })],
      registry: createTestRegistry(),
      strict: true,
    });
    expect(animation.at(0.5).variant).toBe('dot');
  });

  it('morphs generated contours within a variant', () => {
    const animation = createAnimation({
      keystates: [snap('square', { size: 2 }), snap('square', { size: 4 })],
      registry: createTestRegistry(),
    });
    const contours = animation.at(0.5).attributes.contours;
    expect(isContourSet(contours)).toBe(true);
    if (!isContourSet(contours)) return;
    const expected = [
      [-1.5, -1.5],
      [1.5, -1.5],
      [1.5, 1.5],
      [-1.5, 1.5],
    ];
    expect(contours.outer.points).toHaveLength(4);
    contours.outer.points.forEach((point, i) => {
      expect(point.x).toBeCloseTo(expected[i]![0]!, 10);
      expect(point.y).toBeCloseTo(expected[i]![1]!, 10);
    });
    expect(contours.holes).toEqual([]);
  });

  it('prepares each segment morph once', () => {
    const animation = createAnimation({
      keystates: [snap('square', { size: 2 }), snap('square', { size: 4 })],
      registry: createTestRegistry(),
    });
    animation.at(0.25);
    animation.at(0.5);
    animation.at(0.75);
    expect(animation.cache.getStats()).toMatchObject({ entries: 1, hits: 2, misses: 1 });
  });

  it('does not morph across a variant switch', () => {
    const animation = createAnimation({
      keystates: [snap('square', { size: 2 }), snap('blob', { x: 0 })],
      registry: createTestRegistry(),
    });
    expect(animation.at(0.25).attributes).not.toHaveProperty('contours');
  });

  it('lets attribute timelines override keystate values at every instant', () => {
    const animation = createAnimation({
      keystates: [snap('blob', { x: 0, y: 0 }), snap('blob', { x: 100, y: 100 })],
      attributeTimelines: { x: [0, 10] },
      registry: createTestRegistry(),
    });
    expect(numberAt(animation.at(0.5), 'x')).toBe(5);
    expect(numberAt(animation.at(0.5), 'y')).toBe(50);
    expect(numberAt(animation.at(0), 'x')).toBe(0);
    expect(numberAt(animation.at(1), 'x')).toBe(10);
  });

  it('samples attribute timelines at their start for NaN', () => {
    const animation = createAnimation({
      keystates: [snap('blob', { x: 0, y: 0 }), snap('blob', { x: 100, y: 100 })],
      attributeTimelines: { x: [30, 10] },
      registry: createTestRegistry(),
    });
    const snapshot = animation.at(Number.NaN);
    expect(numberAt(snapshot, 'x')).toBe(30);
    expect(numberAt(snapshot, 'y')).toBe(0);
  });

  it('builds from a timeline document', () => {
    const doc = parseTimelineJson(
      JSON.stringify({
        version: 1,
        keystates: [
          { variant: 'blob', attributes: { x: 0 } },
          { snapshot: { variant: 'blob', attributes: { x: 100 } }, easing: { x: 'ease-in' } },
        ],
        morphing: { holeMatcher: 'greedy' },
      })
    );
    const animation = createAnimation({ ...doc, registry: createTestRegistry() });
    expect(animation.config.holeMatcher).toBe('greedy');
    expect(numberAt(animation.at(0.5), 'x')).toBe(25);
  });
});
