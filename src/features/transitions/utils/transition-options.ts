/**
 * Transition option schemas.
 *
 * Every helper works inside a window centred on `atTime` and `duration` wide.
 * Defaults differ per helper, so each schema is built from the shared window.
 */

import { z } from 'zod';
import { formatValidationErrors } from '@/lib/config';
import { ConfigurationError } from '@/lib/errors';

export const SLIDE_DIRECTIONS = ['left', 'right', 'up', 'down'] as const;

/** Direction the outgoing state leaves in; the incoming state arrives from the opposite side */
export type SlideDirection = (typeof SLIDE_DIRECTIONS)[number];

const unitInterval = z.number().min(0).max(1);

export function transitionWindowSchema(defaultDuration: number) {
  return z.object({
    atTime: unitInterval.default(0.5),
    duration: unitInterval.default(defaultDuration),
    /** Add rest keystates at 0 and 1 so the entity exists for the whole timeline */
    extendTimeline: z.boolean().default(false),
  });
}

export const stepOptionsSchema = z.object({
  atTime: unitInterval.default(0.5),
  extendTimeline: z.boolean().default(false),
});

export const fadeOptionsSchema = transitionWindowSchema(0.2);
export const popOptionsSchema = transitionWindowSchema(0.2);
export const trimOptionsSchema = transitionWindowSchema(0.2);

export const rotateOptionsSchema = transitionWindowSchema(0.3).extend({
  angle: z.number().default(360),
});

export const scaleOptionsSchema = transitionWindowSchema(0.3).extend({
  minScale: z.number().min(0).default(0),
});

export const slideOptionsSchema = transitionWindowSchema(0.3).extend({
  direction: z.enum(SLIDE_DIRECTIONS).default('left'),
  distance: z.number().default(100),
});

export const crossfadeOptionsSchema = transitionWindowSchema(0.3);
export const scaleSwapOptionsSchema = scaleOptionsSchema;
export const slideReplaceOptionsSchema = slideOptionsSchema;

export const rotateFlipOptionsSchema = transitionWindowSchema(0.5).extend({
  angle: z.number().default(180),
});

export const bounceReplaceOptionsSchema = transitionWindowSchema(0.4).extend({
  /** Negative moves up */
  bounceHeight: z.number().default(-50),
});

export const sequentialOptionsSchema = z.object({
  /** Share of each state-to-state slot the transition occupies */
  transitionFactor: unitInterval.default(0.5),
});

export type StepOptions = z.input<typeof stepOptionsSchema>;
export type TransitionWindowOptions = z.input<typeof fadeOptionsSchema>;
export type RotateOptions = z.input<typeof rotateOptionsSchema>;
export type ScaleOptions = z.input<typeof scaleOptionsSchema>;
export type SlideOptions = z.input<typeof slideOptionsSchema>;
export type RotateFlipOptions = z.input<typeof rotateFlipOptionsSchema>;
export type BounceReplaceOptions = z.input<typeof bounceReplaceOptionsSchema>;
export type SequentialOptions = z.input<typeof sequentialOptionsSchema>;

/**
 * Validate helper options and fill in defaults
 * @throws ConfigurationError listing every failed field
 */
export function parseTransitionOptions<Output, Input>(
  schema: z.ZodType<Output, z.ZodTypeDef, Input>,
  options: Input
): Output {
  const result = schema.safeParse(options);
  if (!result.success) {
    throw new ConfigurationError('Invalid transition options', formatValidationErrors(result.error));
  }
  return result.data;
}

/**
 * Start and end of a window, unclamped
 */
export function transitionWindow(atTime: number, duration: number): { start: number; end: number } {
  const half = duration / 2;
  return { start: atTime - half, end: atTime + half };
}
