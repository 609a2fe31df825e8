/**
 * Runtime narrowing for values that arrive untyped (JSON documents, raw
 * keystate entries) or as members of the attribute union.
 */

import type { EasingFunction } from '@/types/easing';
import type { ContourLoop, ContourSet, Point } from '@/types/geometry';
import type { HoleMatcher, VertexAligner } from '@/types/morphing';
import type { AttributeValue, Color, Snapshot } from '@/types/snapshot';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isPoint(value: unknown): value is Point {
  return isRecord(value) && typeof value.x === 'number' && typeof value.y === 'number';
}

export function isContourLoop(value: unknown): value is ContourLoop {
  return (
    isRecord(value) &&
    typeof value.closed === 'boolean' &&
    Array.isArray(value.points) &&
    value.points.every(isPoint)
  );
}

export function isContourSet(value: unknown): value is ContourSet {
  return (
    isRecord(value) &&
    value.kind === 'contours' &&
    isContourLoop(value.outer) &&
    Array.isArray(value.holes) &&
    value.holes.every(isContourLoop)
  );
}

export function isColor(value: unknown): value is Color {
  if (!isRecord(value)) return false;
  if (value.kind === 'none') return true;
  return (
    value.kind === 'rgba' &&
    typeof value.r === 'number' &&
    typeof value.g === 'number' &&
    typeof value.b === 'number' &&
    typeof value.a === 'number'
  );
}

export function isAttributeValue(value: unknown): value is AttributeValue {
  return (
    value === null ||
    typeof value === 'number' ||
    typeof value === 'string' ||
    typeof value === 'boolean' ||
    isColor(value) ||
    isContourSet(value)
  );
}

export function isSnapshot(value: unknown): value is Snapshot {
  return (
    isRecord(value) &&
    typeof value.variant === 'string' &&
    isRecord(value.attributes) &&
    Object.values(value.attributes).every(isAttributeValue)
  );
}

export function isEasingFunction(value: unknown): value is EasingFunction {
  return typeof value === 'function';
}

export function isHoleMatcher(value: unknown): value is HoleMatcher {
  return (
    isRecord(value) &&
    typeof value.id === 'string' &&
    typeof value.cacheKey === 'string' &&
    typeof value.match === 'function'
  );
}

export function isVertexAligner(value: unknown): value is VertexAligner {
  return (
    isRecord(value) &&
    typeof value.id === 'string' &&
    typeof value.cacheKey === 'string' &&
    typeof value.align === 'function'
  );
}
