/**
 * Public entry point.
 *
 * Usage:
 *   import { createAnimation, sampleFrames } from 'shape-keystate-engine';
 *   const animation = createAnimation({
 *     keystates: [
 *       { variant: 'circle', attributes: { x: 0, radius: 20 } },
 *       { variant: 'star', attributes: { x: 120, outerRadius: 40 } },
 *     ],
 *   });
 *   const frames = sampleFrames(animation, 60);
 */

export * from './features/interpolation';
export * from './features/timeline';
export * from './features/morphing';
export * from './features/easing';
export * from './features/transitions';
export * from './lib/color';
export * from './lib/geometry';
export * from './lib/shapes';
export {
  DEFAULT_MORPHING_CONFIG,
  loadMorphingConfigFromEnv,
  morphingConfigSchema,
  resolveMorphingConfig,
} from './lib/config';
export type { AlignmentOptions, ClusteringOptions, MorphingConfig, MorphingConfigInput } from './lib/config';
export { ConfigurationError, IncompatibleAttributeError, InvalidTimelineError } from './lib/errors';
export { createLogger, Logger, LogLevel, setLogLevel, setLogSink } from './lib/logger';
export type { LogRecord, LogSink } from './lib/logger';
export type * from './types/easing';
export { DEFAULT_BEZIER_POINTS, DEFAULT_SPRING_PARAMS, EASING_FAMILIES } from './types/easing';
export type * from './types/geometry';
export type * from './types/keystate';
export type * from './types/morphing';
export type { AttributeKind, AttributeMap, AttributeValue, Color, NoColor, RgbaColor, Snapshot } from './types/snapshot';
export { CONTOURS_ATTRIBUTE, DEFAULT_ANGLE_ATTRIBUTES } from './types/snapshot';
