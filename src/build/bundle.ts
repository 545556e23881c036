/**
 * Bundle Step
 *
 * Folds the program and every dependency into one ES module with esbuild,
 * then checks the metafile: the output may import Node.js built-ins and
 * nothing else. A bundle that still reaches for node_modules at run time
 * would fail inside an image that has none.
 */

import { build, type Metafile } from 'esbuild';
import { isBuiltin } from 'node:module';
import { BUNDLE_TARGET } from '../config.js';
import type { BuildOptions } from './options.js';
import { BuildError, type BundleResult } from './types.js';

/**
 * CommonJS dependencies inside an ESM bundle call `require` for built-ins.
 */
export const BUNDLE_BANNER = [
  "import { createRequire as __createRequire } from 'node:module';",
  'const require = __createRequire(import.meta.url);',
].join('\n');

export type Bundler = (options: Pick<BuildOptions, 'entry' | 'outfile'>) => Promise<BundleResult>;

/**
 * Run-time imports of the bundle that are not Node.js built-ins.
 */
export function findUnbundledImports(metafile: Metafile): string[] {
  const unbundled = new Set<string>();
  for (const output of Object.values(metafile.outputs)) {
    for (const imported of output.imports) {
      if (imported.external && !isBuiltin(imported.path)) {
        unbundled.add(imported.path);
      }
    }
  }
  return [...unbundled].sort();
}

/**
 * Built-in modules the bundle imports, `node:` prefix stripped.
 */
export function listBuiltinImports(metafile: Metafile): string[] {
  const builtins = new Set<string>();
  for (const output of Object.values(metafile.outputs)) {
    for (const imported of output.imports) {
      if (imported.external && isBuiltin(imported.path)) {
        builtins.add(imported.path.replace(/^node:/, ''));
      }
    }
  }
  return [...builtins].sort();
}

/**
 * Summarize a verified metafile. Throws when the bundle is not self-contained.
 */
export function summarizeBundle(metafile: Metafile, outfile: string): BundleResult {
  const unbundled = findUnbundledImports(metafile);
  if (unbundled.length > 0) {
    throw new BuildError(
      'bundle',
      `Bundle is not self-contained; it still imports ${unbundled.join(', ')} at run time`,
    );
  }

  const bytes = Object.values(metafile.outputs).reduce((sum, output) => sum + output.bytes, 0);

  return {
    outfile,
    bytes,
    inputs: Object.keys(metafile.inputs).length,
    builtins: listBuiltinImports(metafile),
  };
}

export const bundleProgram: Bundler = async ({ entry, outfile }) => {
  let metafile: Metafile | undefined;
  try {
    const result = await build({
      entryPoints: [entry],
      outfile,
      bundle: true,
      platform: 'node',
      format: 'esm',
      target: BUNDLE_TARGET,
      minify: true,
      metafile: true,
      logLevel: 'silent',
      banner: { js: BUNDLE_BANNER },
    });
    metafile = result.metafile;
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new BuildError('bundle', `esbuild failed: ${message}`, { cause: err });
  }

  if (!metafile) {
    throw new BuildError('bundle', 'esbuild produced no metafile');
  }
  return summarizeBundle(metafile, outfile);
};
