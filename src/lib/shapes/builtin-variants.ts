/**
 * Register Built-in Variants
 *
 * Populates a registry with the stock shape variants. The global registry is
 * filled once; other registries can be filled explicitly.
 */

import { createContourSet } from '@/lib/geometry';
import type { EasingMap } from '@/types/easing';
import type { AttributeMap } from '@/types/snapshot';
import {
  makeCircleLoop,
  makeEllipseLoop,
  makeHoleRing,
  makeHoleRow,
  makeLineLoop,
  makePolygonLoop,
  makeRectLoop,
  makeStarLoop,
} from './shape-generators';
import { variantRegistry } from './variant-registry';
import type { VariantRegistry } from './variant-registry';

/** Easing shared by every stock variant */
export const SHAPE_DEFAULT_EASING: EasingMap = {
  x: 'smoothstep',
  y: 'smoothstep',
  scale: 'smoothstep',
  rotation: 'smoothstep',
  opacity: 'linear',
  closed: 'step',
  pointCount: 'step',
};

function num(attributes: AttributeMap, key: string, fallback: number): number {
  const value = attributes[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

function count(attributes: AttributeMap, key: string, fallback: number): number {
  return Math.max(0, Math.round(num(attributes, key, fallback)));
}

export function registerShapeVariants(registry: VariantRegistry): void {
  registry.register({
    id: 'circle',
    defaultEasing: SHAPE_DEFAULT_EASING,
    generateContours: (a) =>
      createContourSet(makeCircleLoop({ radius: num(a, 'radius', 50), segments: count(a, 'segments', 64) })),
  });

  registry.register({
    id: 'ellipse',
    defaultEasing: SHAPE_DEFAULT_EASING,
    generateContours: (a) =>
      createContourSet(makeEllipseLoop({ rx: num(a, 'rx', 60), ry: num(a, 'ry', 40), segments: count(a, 'segments', 64) })),
  });

  registry.register({
    id: 'rectangle',
    defaultEasing: SHAPE_DEFAULT_EASING,
    generateContours: (a) =>
      createContourSet(makeRectLoop({ width: num(a, 'width', 100), height: num(a, 'height', 60) })),
  });

  registry.register({
    id: 'polygon',
    defaultEasing: SHAPE_DEFAULT_EASING,
    generateContours: (a) =>
      createContourSet(makePolygonLoop({ sides: count(a, 'sides', 6), radius: num(a, 'radius', 50) })),
  });

  registry.register({
    id: 'star',
    defaultEasing: SHAPE_DEFAULT_EASING,
    generateContours: (a) =>
      createContourSet(
        makeStarLoop({
          points: count(a, 'points', 5),
          outerRadius: num(a, 'outerRadius', 50),
          innerRadius: num(a, 'innerRadius', 25),
        })
      ),
  });

  registry.register({
    id: 'line',
    defaultEasing: SHAPE_DEFAULT_EASING,
    generateContours: (a) =>
      createContourSet(makeLineLoop({ length: num(a, 'length', 100), segments: Math.max(1, count(a, 'segments', 1)) })),
  });

  // Geometry comes from the explicit contours attribute
  registry.register({
    id: 'path',
    defaultEasing: SHAPE_DEFAULT_EASING,
  });

  registry.register({
    id: 'perforated-circle',
    defaultEasing: SHAPE_DEFAULT_EASING,
    generateContours: (a) => {
      const radius = num(a, 'radius', 50);
      return createContourSet(
        makeCircleLoop({ radius, segments: count(a, 'segments', 64) }),
        makeHoleRing({
          count: count(a, 'holeCount', 0),
          holeRadius: num(a, 'holeRadius', radius / 6),
          ringRadius: num(a, 'ringRadius', radius / 2),
        })
      );
    },
  });

  registry.register({
    id: 'perforated-rectangle',
    defaultEasing: SHAPE_DEFAULT_EASING,
    generateContours: (a) => {
      const width = num(a, 'width', 100);
      const height = num(a, 'height', 60);
      const holes = count(a, 'holeCount', 0);
      return createContourSet(
        makeRectLoop({ width, height }),
        makeHoleRow({
          count: holes,
          holeRadius: num(a, 'holeRadius', height / 6),
          spacing: num(a, 'holeSpacing', width / Math.max(1, holes + 1)),
        })
      );
    },
  });
}

let registered = false;

/**
 * Fill the global registry with the stock variants (idempotent).
 */
export function registerBuiltinVariants(): void {
  if (registered) return;
  registered = true;
  registerShapeVariants(variantRegistry);
}
