/**
 * Build Options Tests
 */

import { describe, it, expect } from 'vitest';
import { IMAGE_TAG_PATTERN, parseBuildOptions } from '../options.js';
import { BuildError } from '../types.js';

describe('parseBuildOptions', () => {
  it('should fill every default from an empty object', () => {
    expect(parseBuildOptions({})).toEqual({
      entry: 'src/cli.ts',
      outfile: 'dist/main.mjs',
      tag: 'example-scratch',
      dockerfile: 'Dockerfile.scratch',
      platform: 'linux/amd64',
      withCerts: true,
      skipImage: false,
    });
  });

  it('should keep explicit values', () => {
    const options = parseBuildOptions({
      tag: 'acme/fetch:1.0',
      platform: 'linux/arm64',
      withCerts: false,
      skipImage: true,
    });

    expect(options.tag).toBe('acme/fetch:1.0');
    expect(options.platform).toBe('linux/arm64');
    expect(options.withCerts).toBe(false);
    expect(options.skipImage).toBe(true);
  });

  it('should reject a malformed image tag', () => {
    expect(() => parseBuildOptions({ tag: 'Example' })).toThrow(BuildError);
    expect(() => parseBuildOptions({ tag: 'Example' })).toThrow('Invalid build options: tag: Invalid image tag');
  });

  it('should reject an unsupported platform', () => {
    expect(() => parseBuildOptions({ platform: 'windows/amd64' })).toThrow(/^Invalid build options: platform: /);
  });

  it('should report every problem at once', () => {
    try {
      parseBuildOptions({ tag: '', entry: '' });
      expect.unreachable();
    } catch (err) {
      if (!(err instanceof BuildError)) throw err;
      expect(err.step).toBe('options');
      expect(err.message).toContain('entry: ');
      expect(err.message).toContain('tag: Invalid image tag');
    }
  });
});

describe('IMAGE_TAG_PATTERN', () => {
  it.each(['example-scratch', 'acme/fetch:1.0', 'a.b_c', 'fetch:latest'])('should accept %s', (tag) => {
    expect(IMAGE_TAG_PATTERN.test(tag)).toBe(true);
  });

  it.each(['Example', 'acme/', ':latest', 'app:-bad', 'app name'])('should reject %s', (tag) => {
    expect(IMAGE_TAG_PATTERN.test(tag)).toBe(false);
  });
});
