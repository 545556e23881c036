/**
 * Build Options Schema
 *
 * Options of the build procedure, validated with zod. Every field has a
 * default, so an empty object is a complete build.
 */

import { z } from 'zod';
import {
  DEFAULT_DOCKERFILE,
  DEFAULT_ENTRY,
  DEFAULT_IMAGE_TAG,
  DEFAULT_OUTFILE,
  IMAGE_PLATFORMS,
} from '../config.js';
import { BuildError } from './types.js';

/**
 * Repository path with an optional tag, e.g. `example-scratch` or
 * `acme/fetch:1.0`. Registry hosts with ports are not accepted.
 */
export const IMAGE_TAG_PATTERN =
  /^[a-z0-9]+(?:[._-][a-z0-9]+)*(?:\/[a-z0-9]+(?:[._-][a-z0-9]+)*)*(?::\w[\w.-]{0,127})?$/;

export const BuildOptionsSchema = z.object({
  /** Program entry point */
  entry: z.string().min(1).default(DEFAULT_ENTRY),
  /** Bundle output path, relative to the build context */
  outfile: z.string().min(1).default(DEFAULT_OUTFILE),
  /** Image name */
  tag: z.string().regex(IMAGE_TAG_PATTERN, 'Invalid image tag').default(DEFAULT_IMAGE_TAG),
  /** Image definition file */
  dockerfile: z.string().min(1).default(DEFAULT_DOCKERFILE),
  /** Target OS/architecture, fixed regardless of the build host */
  platform: z.enum(IMAGE_PLATFORMS).default(IMAGE_PLATFORMS[0]),
  /** Include the trust bundle in the image */
  withCerts: z.boolean().default(true),
  /** Stop after the bundle step */
  skipImage: z.boolean().default(false),
});

export type BuildOptions = z.infer<typeof BuildOptionsSchema>;
export type BuildOptionsInput = z.input<typeof BuildOptionsSchema>;

/**
 * Validate raw options, failing with a BuildError that lists every problem.
 */
export function parseBuildOptions(input: unknown): BuildOptions {
  const result = BuildOptionsSchema.safeParse(input);
  if (!result.success) {
    const problems = result.error.issues.map((issue) => {
      const field = issue.path.join('.');
      return field ? `${field}: ${issue.message}` : issue.message;
    });
    throw new BuildError('options', `Invalid build options: ${problems.join('; ')}`, {
      cause: result.error,
    });
  }
  return result.data;
}
