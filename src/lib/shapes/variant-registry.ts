/**
 * Variant Registry
 *
 * Map-based lookup from variant identifier to its interpolation defaults and
 * geometry generator. Variants are plain data plus functions; dispatch happens
 * here rather than through a class hierarchy.
 */

import { createLogger } from '@/lib/logger';
import { isContourSet } from '@/lib/guards';
import type { EasingMap } from '@/types/easing';
import type { ContourSet } from '@/types/geometry';
import type { AttributeMap, Snapshot } from '@/types/snapshot';
import { CONTOURS_ATTRIBUTE, DEFAULT_ANGLE_ATTRIBUTES } from '@/types/snapshot';

const log = createLogger('VariantRegistry');

export interface VariantDefinition {
  id: string;
  /** Default easing per attribute, used when nothing more specific applies */
  defaultEasing?: EasingMap;
  /** Numeric attributes interpolated along the shortest arc, in degrees */
  angleAttributes?: readonly string[];
  /** Builds the variant's geometry from its attributes */
  generateContours?: (attributes: AttributeMap) => ContourSet;
}

export class VariantRegistry {
  private entries: Map<string, VariantDefinition> = new Map();

  /**
   * Register a variant definition.
   */
  register(definition: VariantDefinition): void {
    if (this.entries.has(definition.id)) {
      log.warn(`Variant "${definition.id}" is being overwritten`);
    }
    this.entries.set(definition.id, definition);
  }

  unregister(id: string): boolean {
    return this.entries.delete(id);
  }

  get(id: string): VariantDefinition | undefined {
    return this.entries.get(id);
  }

  has(id: string): boolean {
    return this.entries.has(id);
  }

  getAll(): Map<string, VariantDefinition> {
    return new Map(this.entries);
  }

  getIds(): string[] {
    return Array.from(this.entries.keys());
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Angular attributes of a variant; unregistered variants use `rotation`.
   */
  getAngleAttributes(id: string): readonly string[] {
    return this.entries.get(id)?.angleAttributes ?? DEFAULT_ANGLE_ATTRIBUTES;
  }
}

/**
 * Global singleton variant registry.
 */
export const variantRegistry = new VariantRegistry();

/**
 * Geometry of a snapshot: its explicit contours attribute, else the
 * registered generator's output, else undefined.
 */
export function resolveContours(
  snapshot: Snapshot,
  registry: VariantRegistry = variantRegistry
): ContourSet | undefined {
  const explicit = snapshot.attributes[CONTOURS_ATTRIBUTE];
  if (isContourSet(explicit)) return explicit;
  return registry.get(snapshot.variant)?.generateContours?.(snapshot.attributes);
}
