/**
 * Segment planning
 *
 * Everything a segment needs that does not depend on the instant being
 * rendered: resolved easing per attribute, morphing strategies and the
 * variant's angular attributes. Built once when an animation is created.
 */

import { createSegmentEasing, resolveEasing } from '@/features/easing/utils/easing-resolver';
import { createAligner } from '@/features/morphing/aligners';
import { createHoleMatcher } from '@/features/morphing/hole-matchers';
import type { MorphStrategies } from '@/features/morphing/utils/contour-morph';
import type { MorphingConfig } from '@/lib/config';
import type { VariantRegistry } from '@/lib/shapes/variant-registry';
import type { EasingFunction, EasingMap } from '@/types/easing';
import type { KeyState, Timeline } from '@/types/keystate';
import type { HoleMatcher } from '@/types/morphing';
import { CONTOURS_ATTRIBUTE } from '@/types/snapshot';
import { attributeKind } from './value-interpolation';

export interface SegmentPlan {
  readonly from: KeyState;
  readonly to: KeyState;
  readonly sameVariant: boolean;
  readonly easing: ReadonlyMap<string, EasingFunction>;
  /** Easing for geometry, which may be generated rather than stored */
  readonly contourEasing: EasingFunction;
  readonly angleAttributes: ReadonlySet<string>;
  readonly strategies: MorphStrategies;
}

/** An attribute that cannot interpolate smoothly within a same-variant segment */
export interface AttributeIssue {
  segment: number;
  attribute: string;
  reason: string;
}

function segmentStrategies(to: KeyState, config: MorphingConfig, defaultMatcher: HoleMatcher): MorphStrategies {
  const override = to.morphing;
  const holeMatcher =
    override?.holeMatcher === undefined
      ? defaultMatcher
      : typeof override.holeMatcher === 'string'
        ? createHoleMatcher(override.holeMatcher, config)
        : override.holeMatcher;
  const aligner =
    override?.aligner === undefined
      ? undefined
      : typeof override.aligner === 'string'
        ? createAligner(override.aligner, config.alignment)
        : override.aligner;

  return { holeMatcher, alignment: config.alignment, aligner, resolution: config.resolution };
}

export function planSegments(
  timeline: Timeline,
  config: MorphingConfig,
  globalEasing: EasingMap,
  registry: VariantRegistry
): SegmentPlan[] {
  const defaultMatcher = createHoleMatcher(config.holeMatcher, config);
  const plans: SegmentPlan[] = [];

  for (let i = 0; i < timeline.keystates.length - 1; i++) {
    const from = timeline.keystates[i]!;
    const to = timeline.keystates[i + 1]!;
    plans.push({
      from,
      to,
      sameVariant: from.snapshot.variant === to.snapshot.variant,
      easing: createSegmentEasing(from, to, globalEasing, registry),
      contourEasing: resolveEasing(CONTOURS_ATTRIBUTE, from, to, globalEasing, registry),
      angleAttributes: new Set(registry.getAngleAttributes(from.snapshot.variant)),
      strategies: segmentStrategies(to, config, defaultMatcher),
    });
  }

  return plans;
}

/**
 * Attributes of same-variant segments that are present on one side only,
 * or whose values differ in kind between the two sides.
 */
export function findAttributeIssues(plans: readonly SegmentPlan[]): AttributeIssue[] {
  const issues: AttributeIssue[] = [];

  plans.forEach((plan, segment) => {
    if (!plan.sameVariant) return;
    const start = plan.from.snapshot.attributes;
    const end = plan.to.snapshot.attributes;
    const names = new Set([...Object.keys(start), ...Object.keys(end)]);

    for (const attribute of names) {
      const a = start[attribute];
      const b = end[attribute];
      if (a === undefined || b === undefined) {
        issues.push({ segment, attribute, reason: `present only in the ${a === undefined ? 'end' : 'start'} snapshot` });
      } else if (attributeKind(a) !== attributeKind(b)) {
        issues.push({ segment, attribute, reason: `${attributeKind(a)} cannot interpolate to ${attributeKind(b)}` });
      }
    }
  });

  return issues;
}
