/**
 * Replacement Transitions
 *
 * Two entities swap places: the outgoing one leaves while the incoming one
 * arrives. Each gets its own keystate list, to be animated side by side.
 * With `extendTimeline` the outgoing list starts at 0 and the incoming list
 * ends at 1.
 */

import type { Snapshot } from '@/types/snapshot';
import { slideOffsets } from './atomic-transitions';
import type { TimedKeyState } from './keystate-times';
import { numberAttribute, settleTimes, withAttributes } from './keystate-times';
import type {
  BounceReplaceOptions,
  RotateFlipOptions,
  ScaleOptions,
  SlideOptions,
  TransitionWindowOptions,
} from './transition-options';
import {
  bounceReplaceOptionsSchema,
  crossfadeOptionsSchema,
  parseTransitionOptions,
  rotateFlipOptionsSchema,
  scaleSwapOptionsSchema,
  slideReplaceOptionsSchema,
  transitionWindow,
} from './transition-options';

export interface ReplacementKeyStates {
  outgoing: TimedKeyState[];
  incoming: TimedKeyState[];
}

function finish(
  outgoing: TimedKeyState[],
  incoming: TimedKeyState[],
  extendTimeline: boolean
): ReplacementKeyStates {
  if (!extendTimeline) {
    return { outgoing: settleTimes(outgoing), incoming: settleTimes(incoming) };
  }
  const [, restOutgoing] = outgoing[0]!;
  const [, restIncoming] = incoming[incoming.length - 1]!;
  return {
    outgoing: settleTimes([[0, restOutgoing], ...outgoing]),
    incoming: settleTimes([...incoming, [1, restIncoming]]),
  };
}

// ============================================================================
// Overlapping
// ============================================================================

/**
 * Both visible across the window; one fades out as the other fades in
 */
export function crossfade(from: Snapshot, to: Snapshot, options: TransitionWindowOptions = {}): ReplacementKeyStates {
  const { atTime, duration, extendTimeline } = parseTransitionOptions(crossfadeOptionsSchema, options);
  const { start, end } = transitionWindow(atTime, duration);
  return finish(
    [
      [start, withAttributes(from, { opacity: 1 })],
      [end, withAttributes(from, { opacity: 0 })],
    ],
    [
      [start, withAttributes(to, { opacity: 0 })],
      [end, withAttributes(to, { opacity: 1 })],
    ],
    extendTimeline
  );
}

/**
 * One shrinks to `minScale` while the other grows from it
 */
export function scaleSwap(from: Snapshot, to: Snapshot, options: ScaleOptions = {}): ReplacementKeyStates {
  const { atTime, duration, extendTimeline, minScale } = parseTransitionOptions(scaleSwapOptionsSchema, options);
  const { start, end } = transitionWindow(atTime, duration);
  return finish(
    [
      [start, withAttributes(from, { scale: 1, opacity: 1 })],
      [end, withAttributes(from, { scale: minScale, opacity: 0 })],
    ],
    [
      [start, withAttributes(to, { scale: minScale, opacity: 0 })],
      [end, withAttributes(to, { scale: 1, opacity: 1 })],
    ],
    extendTimeline
  );
}

/**
 * The outgoing entity slides away while the incoming one slides in from the
 * opposite side
 */
export function slideReplace(from: Snapshot, to: Snapshot, options: SlideOptions = {}): ReplacementKeyStates {
  const { atTime, duration, extendTimeline, direction, distance } = parseTransitionOptions(
    slideReplaceOptionsSchema,
    options
  );
  const { start, end } = transitionWindow(atTime, duration);
  const { attribute, out, in: into } = slideOffsets(direction, distance);
  const fromPosition = numberAttribute(from, attribute);
  const toPosition = numberAttribute(to, attribute);
  return finish(
    [
      [start, withAttributes(from, { [attribute]: fromPosition, opacity: 1 })],
      [end, withAttributes(from, { [attribute]: fromPosition + out, opacity: 0 })],
    ],
    [
      [start, withAttributes(to, { [attribute]: toPosition + into, opacity: 0 })],
      [end, withAttributes(to, { [attribute]: toPosition, opacity: 1 })],
    ],
    extendTimeline
  );
}

// ============================================================================
// Handover at the midpoint
// ============================================================================

/**
 * Card flip: the outgoing entity turns half the angle and vanishes at the
 * midpoint, where the incoming one appears and turns the other half
 */
export function rotateFlip(from: Snapshot, to: Snapshot, options: RotateFlipOptions = {}): ReplacementKeyStates {
  const { atTime, duration, extendTimeline, angle } = parseTransitionOptions(rotateFlipOptionsSchema, options);
  const { start, end } = transitionWindow(atTime, duration);
  const fromRotation = numberAttribute(from, 'rotation');
  const toRotation = numberAttribute(to, 'rotation');
  return finish(
    [
      [start, withAttributes(from, { rotation: fromRotation, opacity: 1 })],
      [atTime, withAttributes(from, { rotation: fromRotation + angle / 2, opacity: 0 })],
    ],
    [
      [atTime, withAttributes(to, { rotation: toRotation - angle / 2, opacity: 0 })],
      [end, withAttributes(to, { rotation: toRotation, opacity: 1 })],
    ],
    extendTimeline
  );
}

/**
 * The outgoing entity bounces away by `bounceHeight` on y, half-size and
 * invisible at the midpoint; the incoming one drops in from the same offset.
 * Pairs well with a bounce easing on `y`.
 */
export function bounceReplace(from: Snapshot, to: Snapshot, options: BounceReplaceOptions = {}): ReplacementKeyStates {
  const { atTime, duration, extendTimeline, bounceHeight } = parseTransitionOptions(
    bounceReplaceOptionsSchema,
    options
  );
  const { start, end } = transitionWindow(atTime, duration);
  const fromY = numberAttribute(from, 'y');
  const toY = numberAttribute(to, 'y');
  return finish(
    [
      [start, withAttributes(from, { y: fromY, opacity: 1, scale: 1 })],
      [atTime, withAttributes(from, { y: fromY + bounceHeight, opacity: 0, scale: 0.5 })],
    ],
    [
      [atTime, withAttributes(to, { y: toY + bounceHeight, opacity: 0, scale: 0.5 })],
      [end, withAttributes(to, { y: toY, opacity: 1, scale: 1 })],
    ],
    extendTimeline
  );
}
