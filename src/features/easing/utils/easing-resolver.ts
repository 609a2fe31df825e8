/**
 * Easing Resolver
 *
 * Priority, highest first:
 * 1. the destination keystate's per-attribute easing
 * 2. the entity-level per-attribute override
 * 3. the start snapshot variant's default table
 * 4. linear
 */

import { variantRegistry } from '@/lib/shapes/variant-registry';
import type { VariantRegistry } from '@/lib/shapes/variant-registry';
import type { EasingFunction, EasingMap, EasingSpec } from '@/types/easing';
import type { KeyState } from '@/types/keystate';
import { getEasing, linear } from './easing';

function ownSpec(map: EasingMap | undefined, attribute: string): EasingSpec | undefined {
  return map !== undefined && Object.hasOwn(map, attribute) ? map[attribute] : undefined;
}

export function resolveEasing(
  attribute: string,
  from: KeyState,
  to: KeyState,
  globalEasing: EasingMap = {},
  registry: VariantRegistry = variantRegistry
): EasingFunction {
  const spec =
    ownSpec(to.easing, attribute) ??
    ownSpec(globalEasing, attribute) ??
    ownSpec(registry.get(from.snapshot.variant)?.defaultEasing, attribute);
  return spec === undefined ? linear : getEasing(spec);
}

/**
 * Easing per attribute for one segment, resolved once so frame evaluation
 * does a single map lookup per attribute.
 */
export function createSegmentEasing(
  from: KeyState,
  to: KeyState,
  globalEasing: EasingMap = {},
  registry: VariantRegistry = variantRegistry
): ReadonlyMap<string, EasingFunction> {
  const attributes = new Set([
    ...Object.keys(from.snapshot.attributes),
    ...Object.keys(to.snapshot.attributes),
  ]);
  const table = new Map<string, EasingFunction>();
  for (const attribute of attributes) {
    table.set(attribute, resolveEasing(attribute, from, to, globalEasing, registry));
  }
  return table;
}
