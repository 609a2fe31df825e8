/**
 * Interpolation Engine
 *
 * Stateless evaluation of a planned timeline at one instant. Before the first
 * keystate and after the last the keystate snapshot is returned as is; inside
 * a segment every attribute is interpolated on clamped local progress.
 *
 * Variant switch: when the two ends of a segment have different variants the
 * output takes the start variant below local progress 0.5 and the end variant
 * from 0.5 on, while shared scalar attributes keep interpolating across the
 * whole segment.
 */

import { interpolateMorph, prepareMorphCached } from '@/features/morphing/utils/contour-morph';
import type { MorphCache } from '@/features/morphing/utils/morph-cache';
import { findSegmentIndex, localProgress } from '@/features/timeline/utils/time-spacing';
import { isContourSet } from '@/lib/guards';
import { linear } from '@/features/easing/utils/easing';
import { resolveContours } from '@/lib/shapes/variant-registry';
import type { VariantRegistry } from '@/lib/shapes/variant-registry';
import type { AttributeMap, AttributeValue, Snapshot } from '@/types/snapshot';
import { CONTOURS_ATTRIBUTE } from '@/types/snapshot';
import type { SegmentPlan } from './segment-plan';
import { interpolateValue } from './value-interpolation';

/** Local progress at which a mismatched segment switches variant */
export const VARIANT_SWITCH_PROGRESS = 0.5;

export interface EngineContext {
  readonly plans: readonly SegmentPlan[];
  /** Keystate times, one more than there are plans */
  readonly times: readonly number[];
  readonly registry: VariantRegistry;
  readonly cache?: MorphCache;
}

function rotationOf(attributes: AttributeMap): number {
  const rotation = attributes.rotation;
  return typeof rotation === 'number' ? rotation : 0;
}

function morphContours(plan: SegmentPlan, progress: number, context: EngineContext): AttributeValue | undefined {
  const source = resolveContours(plan.from.snapshot, context.registry);
  const destination = resolveContours(plan.to.snapshot, context.registry);
  if (!source || !destination) return undefined;

  const pair = prepareMorphCached(
    source,
    destination,
    {
      rotation1: rotationOf(plan.from.snapshot.attributes),
      rotation2: rotationOf(plan.to.snapshot.attributes),
    },
    plan.strategies,
    context.cache
  );
  return interpolateMorph(pair, plan.contourEasing(progress));
}

/**
 * Snapshot at local progress `progress` (0-1) within one segment
 */
export function evaluateSegment(plan: SegmentPlan, progress: number, context: EngineContext): Snapshot {
  const start = plan.from.snapshot;
  const end = plan.to.snapshot;
  const base = progress < VARIANT_SWITCH_PROGRESS ? start : end;

  const attributes: Record<string, AttributeValue> = {};
  const names = new Set([...Object.keys(start.attributes), ...Object.keys(end.attributes)]);

  for (const name of names) {
    const a = start.attributes[name];
    const b = end.attributes[name];
    if (a === undefined || b === undefined) {
      const value = base.attributes[name];
      if (value !== undefined) attributes[name] = value;
      continue;
    }
    // Geometry steps with the base side; same-variant contours are morphed below
    if (isContourSet(a) || isContourSet(b)) {
      attributes[name] = base === start ? a : b;
      continue;
    }
    const eased = (plan.easing.get(name) ?? linear)(progress);
    attributes[name] = interpolateValue(a, b, eased, { angular: plan.angleAttributes.has(name) });
  }

  if (plan.sameVariant) {
    const morphed = morphContours(plan, progress, context);
    if (morphed !== undefined) attributes[CONTOURS_ATTRIBUTE] = morphed;
  }

  return { variant: base.variant, attributes };
}

/**
 * Snapshot at global time `t`
 */
export function evaluateTimeline(t: number, context: EngineContext): Snapshot {
  const { plans, times } = context;
  const first = plans[0]!.from;
  const last = plans[plans.length - 1]!.to;
  if (Number.isNaN(t) || t <= first.time) return first.snapshot;
  if (t >= last.time) return last.snapshot;

  const plan = plans[findSegmentIndex(times, t)]!;
  return evaluateSegment(plan, localProgress(plan.from.time, plan.to.time, t), context);
}
