/**
 * Easing types.
 * An easing remaps normalized progress (0-1) to eased progress.
 */

/** Function form of an easing: progress in, eased progress out */
export type EasingFunction = (t: number) => number;

/** Curve families that come in in/out/in-out forms */
export type EasingFamily =
  | 'quad'
  | 'cubic'
  | 'quart'
  | 'quint'
  | 'sine'
  | 'expo'
  | 'circ'
  | 'back'
  | 'elastic'
  | 'bounce';

/** Named easings available from the catalog */
export type EasingName =
  | 'linear'
  | 'step'
  | 'smoothstep'
  | 'ease-in'
  | 'ease-out'
  | 'ease-in-out'
  | `ease-in-${EasingFamily}`
  | `ease-out-${EasingFamily}`
  | `ease-in-out-${EasingFamily}`
  | 'cubic-bezier'
  | 'spring';

/** Anything the engine accepts where an easing is expected */
export type EasingSpec = EasingName | EasingFunction;

/** Per-attribute easing table */
export type EasingMap = Readonly<Record<string, EasingSpec>>;

/**
 * Cubic bezier control points for custom easing curves.
 * Values typically range 0-1 for x, can exceed 0-1 for y (overshoot).
 */
export interface BezierControlPoints {
  /** First control point X (0-1) */
  x1: number;
  /** First control point Y (can exceed 0-1 for overshoot) */
  y1: number;
  /** Second control point X (0-1) */
  x2: number;
  /** Second control point Y (can exceed 0-1 for overshoot) */
  y2: number;
}

/**
 * Spring physics parameters for physics-based easing.
 */
export interface SpringParameters {
  /** Spring stiffness (default: 170) */
  tension: number;
  /** Damping coefficient (default: 26) */
  friction: number;
  /** Object mass (default: 1) */
  mass: number;
}

export const EASING_FAMILIES: readonly EasingFamily[] = [
  'quad',
  'cubic',
  'quart',
  'quint',
  'sine',
  'expo',
  'circ',
  'back',
  'elastic',
  'bounce',
];

/**
 * Default spring parameters
 */
export const DEFAULT_SPRING_PARAMS: SpringParameters = {
  tension: 170,
  friction: 26,
  mass: 1,
};

/**
 * Default bezier control points (ease-in-out curve)
 */
export const DEFAULT_BEZIER_POINTS: BezierControlPoints = {
  x1: 0.42,
  y1: 0,
  x2: 0.58,
  y2: 1,
};
