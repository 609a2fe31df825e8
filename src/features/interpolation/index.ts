/**
 * Interpolation feature - public API
 *
 * Animated entities, per-instant evaluation and batch frame sampling.
 */

export { createAnimation } from './utils/animation';
export type { Animation, AnimationOptions } from './utils/animation';
export { evaluateSegment, evaluateTimeline, VARIANT_SWITCH_PROGRESS } from './utils/interpolation-engine';
export type { EngineContext } from './utils/interpolation-engine';
export { frameTimes, sampleFrames, splitFrameRanges } from './utils/frame-sampling';
export type { FrameRange } from './utils/frame-sampling';
export { findAttributeIssues, planSegments } from './utils/segment-plan';
export type { AttributeIssue, SegmentPlan } from './utils/segment-plan';
export {
  attributeKind,
  circularMidpoint,
  inbetween,
  interpolateAngle,
  interpolateValue,
  lerp,
  stepValue,
} from './utils/value-interpolation';
