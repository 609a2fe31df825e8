/**
 * Easing feature - public API
 */

export {
  applyEasing,
  cubicBezier,
  easeIn,
  easeInOut,
  easeOut,
  getEasing,
  isEasingName,
  linear,
  smoothstep,
  springEasing,
  step,
} from './utils/easing';
export { createSegmentEasing, resolveEasing } from './utils/easing-resolver';
