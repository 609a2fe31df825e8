/**
 * Morphing configuration
 *
 * The engine never reads configuration on its own; callers resolve a
 * MorphingConfig (defaults filled, values validated) and pass it in.
 *
 * Usage:
 *   import { resolveMorphingConfig, loadMorphingConfigFromEnv } from '@/lib/config';
 *   const config = resolveMorphingConfig({ holeMatcher: 'discrete' });
 *   const fromEnv = loadMorphingConfigFromEnv(process.env);
 */

import { z } from 'zod';
import { ConfigurationError } from './errors';

export const holeMatcherIdSchema = z.enum(['clustering', 'greedy', 'discrete', 'simple', 'optimal-assignment']);

export const distanceNormSchema = z.enum(['l1', 'l2', 'linf']);

export const openAlignerSchema = z.enum(['euclidean', 'none']);

export const morphingConfigSchema = z.object({
  holeMatcher: holeMatcherIdSchema.default('clustering'),
  clustering: z
    .object({
      balanceClusters: z.boolean().default(true),
      maxIterations: z.number().int().positive().default(50),
      randomSeed: z.number().int().default(42),
    })
    .default({}),
  alignment: z
    .object({
      norm: distanceNormSchema.default('l1'),
      /** Strategy for open-to-open boundaries */
      openAligner: openAlignerSchema.default('euclidean'),
    })
    .default({}),
  /** Fixed point count for resampled loops; the larger input count when unset */
  resolution: z.number().int().min(2).optional(),
});

export type MorphingConfig = z.infer<typeof morphingConfigSchema>;
export type MorphingConfigInput = z.input<typeof morphingConfigSchema>;
export type ClusteringOptions = MorphingConfig['clustering'];
export type AlignmentOptions = MorphingConfig['alignment'];

/**
 * Format Zod errors into human-readable messages
 */
export function formatValidationErrors(errors: z.ZodError): string[] {
  return errors.issues.map((issue) => {
    const path = issue.path.join('.');
    return `${path ? `${path}: ` : ''}${issue.message}`;
  });
}

/**
 * Validate a partial configuration and fill in defaults.
 * @throws ConfigurationError when a value is out of range or unknown
 */
export function resolveMorphingConfig(input: MorphingConfigInput = {}): MorphingConfig {
  const result = morphingConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError('Invalid morphing configuration', formatValidationErrors(result.error));
  }
  return result.data;
}

export const DEFAULT_MORPHING_CONFIG: MorphingConfig = resolveMorphingConfig();

const booleanFlagSchema = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
  MORPH_HOLE_MATCHER: holeMatcherIdSchema.optional(),
  MORPH_CLUSTER_BALANCE: booleanFlagSchema.optional(),
  MORPH_CLUSTER_MAX_ITERATIONS: z.coerce.number().int().positive().optional(),
  MORPH_CLUSTER_SEED: z.coerce.number().int().optional(),
  MORPH_ALIGNMENT_NORM: distanceNormSchema.optional(),
  MORPH_OPEN_ALIGNER: openAlignerSchema.optional(),
  MORPH_RESOLUTION: z.coerce.number().int().min(2).optional(),
});

/**
 * Read the morphing configuration from MORPH_* environment variables.
 * Unset variables keep their defaults.
 */
export function loadMorphingConfigFromEnv(env: NodeJS.ProcessEnv = process.env): MorphingConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigurationError('Invalid morphing environment', formatValidationErrors(result.error));
  }
  const vars = result.data;
  return resolveMorphingConfig({
    holeMatcher: vars.MORPH_HOLE_MATCHER,
    clustering: {
      balanceClusters: vars.MORPH_CLUSTER_BALANCE,
      maxIterations: vars.MORPH_CLUSTER_MAX_ITERATIONS,
      randomSeed: vars.MORPH_CLUSTER_SEED,
    },
    alignment: {
      norm: vars.MORPH_ALIGNMENT_NORM,
      openAligner: vars.MORPH_OPEN_ALIGNER,
    },
    resolution: vars.MORPH_RESOLUTION,
  });
}
