/**
 * Transitions feature - public API
 *
 * Keystate-generating helpers: atomic transitions for one entity and
 * replacement transitions for two entities animated side by side.
 */

export {
  fadeTransition,
  popTransition,
  rotateTransition,
  scaleTransition,
  sequentialTransition,
  slideOffsets,
  slideTransition,
  stepTransition,
  trimTransition,
} from './utils/atomic-transitions';
export type { AtomicTransition } from './utils/atomic-transitions';
export { bounceReplace, crossfade, rotateFlip, scaleSwap, slideReplace } from './utils/replacement-transitions';
export type { ReplacementKeyStates } from './utils/replacement-transitions';
export { SWITCH_GAP, settleTimes } from './utils/keystate-times';
export type { TimedKeyState } from './utils/keystate-times';
export { SLIDE_DIRECTIONS } from './utils/transition-options';
export type {
  BounceReplaceOptions,
  RotateFlipOptions,
  RotateOptions,
  ScaleOptions,
  SequentialOptions,
  SlideDirection,
  SlideOptions,
  StepOptions,
  TransitionWindowOptions,
} from './utils/transition-options';
