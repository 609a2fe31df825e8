/**
 * Atomic Transitions
 *
 * Keystate lists for one entity that changes from one snapshot to another:
 * the outgoing snapshot leaves (fades, shrinks, spins, slides away), the
 * attributes switch, and the incoming snapshot arrives.
 *
 * Every keystate a helper emits carries the attributes that helper animates,
 * so consecutive snapshots stay compatible.
 */

import type { Snapshot } from '@/types/snapshot';
import type { TimedKeyState } from './keystate-times';
import { numberAttribute, settleTimes, withAttributes } from './keystate-times';
import type {
  RotateOptions,
  ScaleOptions,
  SequentialOptions,
  SlideDirection,
  SlideOptions,
  StepOptions,
  TransitionWindowOptions,
} from './transition-options';
import {
  fadeOptionsSchema,
  parseTransitionOptions,
  popOptionsSchema,
  rotateOptionsSchema,
  scaleOptionsSchema,
  sequentialOptionsSchema,
  slideOptionsSchema,
  stepOptionsSchema,
  transitionWindow,
  trimOptionsSchema,
} from './transition-options';

/** Shape shared by every atomic helper, as taken by `sequentialTransition` */
export type AtomicTransition = (
  from: Snapshot,
  to: Snapshot,
  placement: { atTime: number; duration: number }
) => TimedKeyState[];

function finish(
  keystates: TimedKeyState[],
  restFrom: Snapshot,
  restTo: Snapshot,
  extendTimeline: boolean
): TimedKeyState[] {
  return settleTimes(extendTimeline ? [[0, restFrom], ...keystates, [1, restTo]] : keystates);
}

/**
 * Hold the first snapshot, then switch instantly
 */
export function stepTransition(from: Snapshot, to: Snapshot, options: StepOptions = {}): TimedKeyState[] {
  const { atTime, extendTimeline } = parseTransitionOptions(stepOptionsSchema, options);
  return finish(
    [
      [atTime, from],
      [atTime, to],
    ],
    from,
    to,
    extendTimeline
  );
}

/**
 * Fade out, switch while invisible, fade back in
 */
export function fadeTransition(from: Snapshot, to: Snapshot, options: TransitionWindowOptions = {}): TimedKeyState[] {
  const { atTime, duration, extendTimeline } = parseTransitionOptions(fadeOptionsSchema, options);
  const { start, end } = transitionWindow(atTime, duration);
  const shown = { opacity: 1 };
  const hidden = { opacity: 0 };

  return finish(
    [
      [start, withAttributes(from, shown)],
      [atTime, withAttributes(from, hidden)],
      [atTime, withAttributes(to, hidden)],
      [end, withAttributes(to, shown)],
    ],
    withAttributes(from, shown),
    withAttributes(to, shown),
    extendTimeline
  );
}

/**
 * Collapse to zero scale, switch, grow back.
 * Pairs well with a spring or back easing on `scale`.
 */
export function popTransition(from: Snapshot, to: Snapshot, options: TransitionWindowOptions = {}): TimedKeyState[] {
  const { atTime, duration, extendTimeline } = parseTransitionOptions(popOptionsSchema, options);
  const { start, end } = transitionWindow(atTime, duration);

  return finish(
    [
      [start, withAttributes(from, { scale: 1 })],
      [atTime, withAttributes(from, { scale: 0 })],
      [atTime, withAttributes(to, { scale: 0 })],
      [end, withAttributes(to, { scale: 1 })],
    ],
    withAttributes(from, { scale: 1 }),
    withAttributes(to, { scale: 1 }),
    extendTimeline
  );
}

/**
 * Spin out while fading, switch, spin back in from the opposite side
 */
export function rotateTransition(from: Snapshot, to: Snapshot, options: RotateOptions = {}): TimedKeyState[] {
  const { atTime, duration, extendTimeline, angle } = parseTransitionOptions(rotateOptionsSchema, options);
  const { start, end } = transitionWindow(atTime, duration);
  const fromRotation = numberAttribute(from, 'rotation');
  const toRotation = numberAttribute(to, 'rotation');
  const restFrom = withAttributes(from, { rotation: fromRotation, opacity: 1 });
  const restTo = withAttributes(to, { rotation: toRotation, opacity: 1 });

  return finish(
    [
      [start, restFrom],
      [atTime, withAttributes(from, { rotation: fromRotation + angle, opacity: 0 })],
      [atTime, withAttributes(to, { rotation: toRotation - angle, opacity: 0 })],
      [end, restTo],
    ],
    restFrom,
    restTo,
    extendTimeline
  );
}

/**
 * Shrink to `minScale` while fading, switch, grow back
 */
export function scaleTransition(from: Snapshot, to: Snapshot, options: ScaleOptions = {}): TimedKeyState[] {
  const { atTime, duration, extendTimeline, minScale } = parseTransitionOptions(scaleOptionsSchema, options);
  const { start, end } = transitionWindow(atTime, duration);
  const restFrom = withAttributes(from, { scale: 1, opacity: 1 });
  const restTo = withAttributes(to, { scale: 1, opacity: 1 });

  return finish(
    [
      [start, restFrom],
      [atTime, withAttributes(from, { scale: minScale, opacity: 0 })],
      [atTime, withAttributes(to, { scale: minScale, opacity: 0 })],
      [end, restTo],
    ],
    restFrom,
    restTo,
    extendTimeline
  );
}

/**
 * Attribute and signed offsets for leaving and arriving
 */
export function slideOffsets(
  direction: SlideDirection,
  distance: number
): { attribute: 'x' | 'y'; out: number; in: number } {
  switch (direction) {
    case 'left':
      return { attribute: 'x', out: -distance, in: distance };
    case 'right':
      return { attribute: 'x', out: distance, in: -distance };
    case 'up':
      return { attribute: 'y', out: -distance, in: distance };
    case 'down':
      return { attribute: 'y', out: distance, in: -distance };
  }
}

/**
 * Slide away while fading, switch, slide back in from the opposite side
 */
export function slideTransition(from: Snapshot, to: Snapshot, options: SlideOptions = {}): TimedKeyState[] {
  const { atTime, duration, extendTimeline, direction, distance } = parseTransitionOptions(
    slideOptionsSchema,
    options
  );
  const { start, end } = transitionWindow(atTime, duration);
  const offsets = slideOffsets(direction, distance);
  const fromPosition = numberAttribute(from, offsets.attribute);
  const toPosition = numberAttribute(to, offsets.attribute);
  const restFrom = withAttributes(from, { [offsets.attribute]: fromPosition, opacity: 1 });
  const restTo = withAttributes(to, { [offsets.attribute]: toPosition, opacity: 1 });

  return finish(
    [
      [start, restFrom],
      [atTime, withAttributes(from, { [offsets.attribute]: fromPosition + offsets.out, opacity: 0 })],
      [atTime, withAttributes(to, { [offsets.attribute]: toPosition + offsets.in, opacity: 0 })],
      [end, restTo],
    ],
    restFrom,
    restTo,
    extendTimeline
  );
}

/**
 * Interpolate directly between the two snapshots inside the window
 */
export function trimTransition(from: Snapshot, to: Snapshot, options: TransitionWindowOptions = {}): TimedKeyState[] {
  const { atTime, duration, extendTimeline } = parseTransitionOptions(trimOptionsSchema, options);
  const { start, end } = transitionWindow(atTime, duration);
  return finish(
    [
      [start, from],
      [end, to],
    ],
    from,
    to,
    extendTimeline
  );
}

/**
 * Chain one atomic transition across a list of snapshots.
 *
 * Transition i is centred on (2i + 1) / (2n), n being the number of
 * transitions, and spans `transitionFactor / n`. The first and last rest
 * snapshots are pinned to 0 and 1.
 *
 * Extra helper options go through a closure:
 *   sequentialTransition(states, (a, b, w) => slideTransition(a, b, { ...w, direction: 'up' }))
 */
export function sequentialTransition(
  states: readonly Snapshot[],
  transition: AtomicTransition,
  options: SequentialOptions = {}
): TimedKeyState[] {
  const { transitionFactor } = parseTransitionOptions(sequentialOptionsSchema, options);
  const first = states[0];
  if (first === undefined) return [];
  if (states.length === 1) {
    return [
      [0, first],
      [1, first],
    ];
  }

  const count = states.length - 1;
  const duration = transitionFactor / count;
  const keystates: TimedKeyState[] = [];
  for (let i = 0; i < count; i++) {
    keystates.push(...transition(states[i]!, states[i + 1]!, { atTime: (2 * i + 1) / (2 * count), duration }));
  }

  // Rest snapshots carry whatever the transition animates
  const restFirst = keystates[0]?.[1] ?? first;
  const restLast = keystates.at(-1)?.[1] ?? states[count]!;
  return settleTimes([[0, restFirst], ...keystates, [1, restLast]]);
}
