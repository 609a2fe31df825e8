/**
 * Attribute snapshots.
 * A snapshot is an immutable attribute map tagged with its variant identifier
 * (the concrete entity kind such as 'circle' or 'star').
 */

import type { ContourSet } from './geometry';

/** RGB channels 0-255, alpha 0-1 */
export interface RgbaColor {
  readonly kind: 'rgba';
  readonly r: number;
  readonly g: number;
  readonly b: number;
  readonly a: number;
}

/** Absent paint. Interpolating against it yields the other color unchanged. */
export interface NoColor {
  readonly kind: 'none';
}

export type Color = RgbaColor | NoColor;

export type AttributeValue = number | string | boolean | null | Color | ContourSet;

export type AttributeMap = Readonly<Record<string, AttributeValue>>;

export interface Snapshot {
  readonly variant: string;
  readonly attributes: AttributeMap;
}

/** How an attribute value is interpolated */
export type AttributeKind = 'number' | 'color' | 'contours' | 'discrete';

/** Reserved attribute carrying explicit or generated geometry */
export const CONTOURS_ATTRIBUTE = 'contours';

/** Default angular attributes, interpolated along the shortest arc */
export const DEFAULT_ANGLE_ATTRIBUTES: readonly string[] = ['rotation'];
