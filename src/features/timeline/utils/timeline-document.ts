/**
 * Timeline documents
 *
 * JSON form of an animated entity: keystates, global easing overrides,
 * attribute timelines and the morphing configuration. Validated with zod;
 * the keystate list still goes through the resolver afterwards.
 *
 * Example:
 * {
 *   "version": 1,
 *   "keystates": [
 *     { "variant": "circle", "attributes": { "x": 0, "radius": 20 } },
 *     [0.5, { "variant": "circle", "attributes": { "x": 100, "radius": 40 } }],
 *     { "time": 1, "snapshot": { "variant": "star", "attributes": { "x": 0 } }, "easing": { "x": "ease-out" } }
 *   ],
 *   "morphing": { "holeMatcher": "greedy" }
 * }
 */

import { z } from 'zod';
import { isEasingName } from '@/features/easing/utils/easing';
import { formatValidationErrors, holeMatcherIdSchema, morphingConfigSchema } from '@/lib/config';
import { ConfigurationError } from '@/lib/errors';
import { isRecord } from '@/lib/guards';
import type { EasingName } from '@/types/easing';
import { assertUnambiguousPair } from './keystate-parser';

const pointSchema = z.object({ x: z.number(), y: z.number() });

const loopSchema = z.object({
  points: z.array(pointSchema),
  closed: z.boolean().default(true),
});

const contourSetSchema = z.object({
  kind: z.literal('contours'),
  outer: loopSchema,
  holes: z.array(loopSchema).default([]),
});

const colorSchema = z.union([
  z.object({
    kind: z.literal('rgba'),
    r: z.number().min(0).max(255),
    g: z.number().min(0).max(255),
    b: z.number().min(0).max(255),
    a: z.number().min(0).max(1).default(1),
  }),
  z.object({ kind: z.literal('none') }),
]);

const attributeValueSchema = z.union([
  z.number(),
  z.string(),
  z.boolean(),
  z.null(),
  colorSchema,
  contourSetSchema,
]);

const snapshotSchema = z.object({
  variant: z.string().min(1),
  attributes: z.record(attributeValueSchema),
});

const easingNameSchema = z.custom<EasingName>((value) => typeof value === 'string' && isEasingName(value), {
  message: 'Unknown easing name',
});

const easingMapSchema = z.record(easingNameSchema);

const keystateSchema = z.union([
  snapshotSchema,
  z.tuple([z.number(), snapshotSchema]),
  z.object({
    snapshot: snapshotSchema,
    time: z.number().optional(),
    easing: easingMapSchema.optional(),
    morphing: z
      .object({
        holeMatcher: holeMatcherIdSchema.optional(),
        aligner: z.enum(['angular', 'euclidean', 'none']).optional(),
      })
      .optional(),
  }),
]);

const attributeKeyframeSchema = z.union([
  attributeValueSchema,
  z.tuple([z.number(), attributeValueSchema]),
  z.object({
    time: z.number().optional(),
    value: attributeValueSchema,
    easing: easingNameSchema.optional(),
  }),
]);

export const timelineDocumentSchema = z.object({
  version: z.literal(1),
  keystates: z.array(keystateSchema).min(2),
  easing: easingMapSchema.default({}),
  attributeTimelines: z.record(z.array(attributeKeyframeSchema).min(1)).default({}),
  morphing: morphingConfigSchema.default({}),
});

export type TimelineDocument = z.infer<typeof timelineDocumentSchema>;

/**
 * Validate a parsed JSON value as a timeline document
 * @throws InvalidTimelineError for an ambiguous `[time, number]` keystate
 * @throws ConfigurationError listing every other failed field
 */
export function parseTimelineDocument(input: unknown): TimelineDocument {
  if (isRecord(input) && Array.isArray(input.keystates)) {
    input.keystates.forEach((entry: unknown, index: number) => {
      if (Array.isArray(entry)) assertUnambiguousPair(entry, index);
    });
  }

  const result = timelineDocumentSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError('Invalid timeline document', formatValidationErrors(result.error));
  }
  return result.data;
}

/**
 * Parse and validate timeline document text
 */
export function parseTimelineJson(text: string): TimelineDocument {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError('Invalid timeline document', [`not valid JSON: ${reason}`]);
  }
  return parseTimelineDocument(value);
}
