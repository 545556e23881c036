/**
 * Image Step
 *
 * Packages the bundle with `docker build`. Dockerfile.scratch has two final
 * stages built on an empty base: `image` carries the trust bundle, `bare`
 * leaves it out so the trust-failure path can be reproduced.
 */

import { spawn } from 'node:child_process';
import { errorCode } from '../fetch/errors.js';
import type { BuildOptions } from './options.js';
import { BuildError, type ImageResult, type ImageTarget } from './types.js';

export type ImageRequest = Pick<BuildOptions, 'tag' | 'dockerfile' | 'platform' | 'withCerts' | 'outfile'> & {
  /** Build context directory */
  context: string;
};

/** Runs a command to completion, resolving to its exit status */
export type CommandRunner = (command: string, args: string[]) => Promise<number>;

export type ImageBuilder = (request: ImageRequest) => Promise<ImageResult>;

export function imageTarget(withCerts: boolean): ImageTarget {
  return withCerts ? 'image' : 'bare';
}

export function dockerBuildArgs(request: ImageRequest): string[] {
  return [
    'build',
    '--platform', request.platform,
    '--target', imageTarget(request.withCerts),
    '--build-arg', `BUNDLE=${request.outfile}`,
    '-t', request.tag,
    '-f', request.dockerfile,
    request.context,
  ];
}

/**
 * Spawn with inherited stdio so docker's own progress shows through.
 */
export const spawnCommand: CommandRunner = (command, args) =>
  new Promise((resolve, reject) => {
    const child = spawn(command, args, { stdio: 'inherit' });
    child.on('error', reject);
    child.on('close', (code) => resolve(code ?? 1));
  });

export function createImageBuilder(run: CommandRunner = spawnCommand): ImageBuilder {
  return async (request) => {
    let status: number;
    try {
      status = await run('docker', dockerBuildArgs(request));
    } catch (err) {
      if (errorCode(err) === 'ENOENT') {
        throw new BuildError('image', 'docker not found on PATH', { cause: err });
      }
      const message = err instanceof Error ? err.message : String(err);
      throw new BuildError('image', `docker build failed to start: ${message}`, { cause: err });
    }

    if (status !== 0) {
      throw new BuildError('image', `docker build exited with status ${status}`);
    }

    return {
      tag: request.tag,
      platform: request.platform,
      target: imageTarget(request.withCerts),
    };
  };
}
