/**
 * Easing functions for keystate interpolation.
 * Each function takes a progress value (0-1) and returns an eased value.
 * Back, elastic and spring curves overshoot; every curve maps 0 to 0 and 1 to 1.
 */

import type {
  BezierControlPoints,
  EasingFamily,
  EasingFunction,
  EasingName,
  EasingSpec,
  SpringParameters,
} from '@/types/easing';
import { DEFAULT_BEZIER_POINTS, DEFAULT_SPRING_PARAMS, EASING_FAMILIES } from '@/types/easing';

/**
 * Linear easing - constant speed
 */
export function linear(t: number): number {
  return t;
}

/**
 * Jumps from start to end at the midpoint
 */
export function step(t: number): number {
  return t < 0.5 ? 0 : 1;
}

/**
 * Hermite smoothstep, t^2 (3 - 2t)
 */
export function smoothstep(t: number): number {
  return t * t * (3 - 2 * t);
}

// ============================================================================
// Curve families
// ============================================================================

interface EasingVariants {
  in: EasingFunction;
  out: EasingFunction;
  inOut: EasingFunction;
}

function powerFamily(power: number): EasingVariants {
  return {
    in: (t) => t ** power,
    out: (t) => 1 - (1 - t) ** power,
    inOut: (t) =>
      t < 0.5 ? 2 ** (power - 1) * t ** power : 1 - (-2 * t + 2) ** power / 2,
  };
}

const BACK_C1 = 1.70158;
const BACK_C2 = BACK_C1 * 1.525;
const BACK_C3 = BACK_C1 + 1;
const ELASTIC_C4 = (2 * Math.PI) / 3;
const ELASTIC_C5 = (2 * Math.PI) / 4.5;
const BOUNCE_N1 = 7.5625;
const BOUNCE_D1 = 2.75;

function bounceOut(t: number): number {
  if (t < 1 / BOUNCE_D1) {
    return BOUNCE_N1 * t * t;
  }
  if (t < 2 / BOUNCE_D1) {
    const u = t - 1.5 / BOUNCE_D1;
    return BOUNCE_N1 * u * u + 0.75;
  }
  if (t < 2.5 / BOUNCE_D1) {
    const u = t - 2.25 / BOUNCE_D1;
    return BOUNCE_N1 * u * u + 0.9375;
  }
  const u = t - 2.625 / BOUNCE_D1;
  return BOUNCE_N1 * u * u + 0.984375;
}

const families: Record<EasingFamily, EasingVariants> = {
  quad: powerFamily(2),
  cubic: powerFamily(3),
  quart: powerFamily(4),
  quint: powerFamily(5),
  sine: {
    in: (t) => 1 - Math.cos((t * Math.PI) / 2),
    out: (t) => Math.sin((t * Math.PI) / 2),
    inOut: (t) => -(Math.cos(Math.PI * t) - 1) / 2,
  },
  expo: {
    in: (t) => (t === 0 ? 0 : 2 ** (10 * t - 10)),
    out: (t) => (t === 1 ? 1 : 1 - 2 ** (-10 * t)),
    inOut: (t) => {
      if (t === 0 || t === 1) return t;
      return t < 0.5 ? 2 ** (20 * t - 10) / 2 : (2 - 2 ** (-20 * t + 10)) / 2;
    },
  },
  circ: {
    in: (t) => 1 - Math.sqrt(1 - t * t),
    out: (t) => Math.sqrt(1 - (t - 1) ** 2),
    inOut: (t) =>
      t < 0.5
        ? (1 - Math.sqrt(1 - (2 * t) ** 2)) / 2
        : (Math.sqrt(1 - (-2 * t + 2) ** 2) + 1) / 2,
  },
  back: {
    in: (t) => BACK_C3 * t ** 3 - BACK_C1 * t * t,
    out: (t) => 1 + BACK_C3 * (t - 1) ** 3 + BACK_C1 * (t - 1) ** 2,
    inOut: (t) =>
      t < 0.5
        ? ((2 * t) ** 2 * ((BACK_C2 + 1) * 2 * t - BACK_C2)) / 2
        : ((2 * t - 2) ** 2 * ((BACK_C2 + 1) * (2 * t - 2) + BACK_C2) + 2) / 2,
  },
  elastic: {
    in: (t) => {
      if (t === 0 || t === 1) return t;
      return -(2 ** (10 * t - 10)) * Math.sin((10 * t - 10.75) * ELASTIC_C4);
    },
    out: (t) => {
      if (t === 0 || t === 1) return t;
      return 2 ** (-10 * t) * Math.sin((10 * t - 0.75) * ELASTIC_C4) + 1;
    },
    inOut: (t) => {
      if (t === 0 || t === 1) return t;
      return t < 0.5
        ? -(2 ** (20 * t - 10) * Math.sin((20 * t - 11.125) * ELASTIC_C5)) / 2
        : (2 ** (-20 * t + 10) * Math.sin((20 * t - 11.125) * ELASTIC_C5)) / 2 + 1;
    },
  },
  bounce: {
    in: (t) => 1 - bounceOut(1 - t),
    out: bounceOut,
    inOut: (t) => (t < 0.5 ? (1 - bounceOut(1 - 2 * t)) / 2 : (1 + bounceOut(2 * t - 1)) / 2),
  },
};

/**
 * Ease in - starts slow, accelerates (quadratic)
 */
export const easeIn = families.quad.in;

/**
 * Ease out - starts fast, decelerates (quadratic)
 */
export const easeOut = families.quad.out;

/**
 * Ease in-out - slow at both ends (quadratic)
 */
export const easeInOut = families.quad.inOut;

// ============================================================================
// Parameterised curves
// ============================================================================

/**
 * Cubic bezier easing function.
 * Finds the curve parameter for x with Newton-Raphson, falling back to bisection
 * when the slope flattens out.
 */
export function cubicBezier(points: BezierControlPoints): EasingFunction {
  const { x1, y1, x2, y2 } = points;

  // Calculate coefficients for X(t)
  const cx = 3 * x1;
  const bx = 3 * (x2 - x1) - cx;
  const ax = 1 - cx - bx;

  // Calculate coefficients for Y(t)
  const cy = 3 * y1;
  const by = 3 * (y2 - y1) - cy;
  const ay = 1 - cy - by;

  const sampleX = (u: number) => ((ax * u + bx) * u + cx) * u;
  const sampleY = (u: number) => ((ay * u + by) * u + cy) * u;

  return (t) => {
    if (t <= 0) return 0;
    if (t >= 1) return 1;

    let u = t;
    for (let i = 0; i < 8; i++) {
      const dx = sampleX(u) - t;
      if (Math.abs(dx) < 1e-7) return sampleY(u);
      const slope = (3 * ax * u + 2 * bx) * u + cx;
      if (Math.abs(slope) < 1e-6) break;
      u -= dx / slope;
    }

    let lo = 0;
    let hi = 1;
    u = t;
    for (let i = 0; i < 40; i++) {
      const x = sampleX(u);
      if (Math.abs(x - t) < 1e-7) break;
      if (x < t) lo = u;
      else hi = u;
      u = (lo + hi) / 2;
    }
    return sampleY(u);
  };
}

/**
 * Spring physics easing function.
 * Simulates a damped spring settling on 1.
 */
export function springEasing(params: SpringParameters): EasingFunction {
  const { tension, friction, mass } = params;
  const omega0 = Math.sqrt(tension / mass);
  const zeta = friction / (2 * Math.sqrt(tension * mass));
  // Springs never fully settle; scale time to reach ~99% settlement
  const settleTime = 4 / (zeta * omega0);

  return (t) => {
    if (t <= 0) return 0;
    if (t >= 1) return 1;
    const scaledT = t * settleTime;

    if (zeta < 1) {
      // Underdamped - oscillates
      const omegaD = omega0 * Math.sqrt(1 - zeta * zeta);
      return (
        1 -
        Math.exp(-zeta * omega0 * scaledT) *
          (Math.cos(omegaD * scaledT) + ((zeta * omega0) / omegaD) * Math.sin(omegaD * scaledT))
      );
    }
    if (zeta === 1) {
      // Critically damped
      return 1 - Math.exp(-omega0 * scaledT) * (1 + omega0 * scaledT);
    }
    // Overdamped
    const root = Math.sqrt(zeta * zeta - 1);
    const s1 = -omega0 * (zeta - root);
    const s2 = -omega0 * (zeta + root);
    return 1 - (s2 * Math.exp(s1 * scaledT) - s1 * Math.exp(s2 * scaledT)) / (s2 - s1);
  };
}

// ============================================================================
// Lookup
// ============================================================================

const namedEasings = new Map<string, EasingFunction>([
  ['linear', linear],
  ['step', step],
  ['smoothstep', smoothstep],
  ['ease-in', easeIn],
  ['ease-out', easeOut],
  ['ease-in-out', easeInOut],
  ['cubic-bezier', cubicBezier(DEFAULT_BEZIER_POINTS)],
  ['spring', springEasing(DEFAULT_SPRING_PARAMS)],
]);

const FAMILY_PATTERN = /^ease-(in-out|in|out)-([a-z]+)$/;

function isEasingFamily(value: string): value is EasingFamily {
  return EASING_FAMILIES.some((family) => family === value);
}

function lookupEasing(name: string): EasingFunction | undefined {
  const named = namedEasings.get(name);
  if (named) return named;

  const match = FAMILY_PATTERN.exec(name);
  if (!match) return undefined;
  const [, direction, family] = match;
  if (!family || !isEasingFamily(family)) return undefined;

  const variants = families[family];
  switch (direction) {
    case 'in':
      return variants.in;
    case 'out':
      return variants.out;
    default:
      return variants.inOut;
  }
}

/**
 * Whether a string names a catalog easing
 */
export function isEasingName(name: string): name is EasingName {
  return lookupEasing(name) !== undefined;
}

/**
 * Resolve a name or pass a function through. Unknown names fall back to linear.
 */
export function getEasing(spec: EasingSpec): EasingFunction {
  if (typeof spec === 'function') return spec;
  return lookupEasing(spec) ?? linear;
}

/**
 * Apply easing to a progress value
 * @param t Progress value, clamped to 0-1
 */
export function applyEasing(t: number, spec: EasingSpec): number {
  const clampedT = Math.max(0, Math.min(1, t));
  return getEasing(spec)(clampedT);
}
