/**
 * Bundle Verification Tests
 */

import { describe, it, expect } from 'vitest';
import type { ImportKind, Metafile } from 'esbuild';
import {
  BUNDLE_BANNER,
  findUnbundledImports,
  listBuiltinImports,
  summarizeBundle,
} from '../bundle.js';
import { BuildError } from '../types.js';

interface OutputImport {
  path: string;
  kind: ImportKind;
  external?: boolean;
}

function metafile(imports: OutputImport[]): Metafile {
  return {
    inputs: {
      'src/cli.ts': { bytes: 400, imports: [] },
      'node_modules/commander/index.js': { bytes: 1200, imports: [] },
    },
    outputs: {
      'dist/main.mjs': {
        bytes: 2048,
        inputs: {},
        imports,
        exports: [],
        entryPoint: 'src/cli.ts',
      },
    },
  };
}

describe('findUnbundledImports', () => {
  it('should accept a bundle that only imports built-ins', () => {
    const meta = metafile([
      { path: 'node:module', kind: 'import-statement', external: true },
      { path: 'fs', kind: 'require-call', external: true },
    ]);

    expect(findUnbundledImports(meta)).toEqual([]);
  });

  it('should list packages left outside the bundle, sorted and deduplicated', () => {
    const meta = metafile([
      { path: 'zod', kind: 'import-statement', external: true },
      { path: 'chalk', kind: 'require-call', external: true },
      { path: 'zod', kind: 'dynamic-import', external: true },
      { path: 'node:fs', kind: 'import-statement', external: true },
      { path: 'dist/chunk.mjs', kind: 'import-statement' },
    ]);

    expect(findUnbundledImports(meta)).toEqual(['chalk', 'zod']);
  });
});

describe('listBuiltinImports', () => {
  it('should strip the node: prefix and merge duplicates', () => {
    const meta = metafile([
      { path: 'node:module', kind: 'import-statement', external: true },
      { path: 'fs', kind: 'require-call', external: true },
      { path: 'node:fs', kind: 'import-statement', external: true },
    ]);

    expect(listBuiltinImports(meta)).toEqual(['fs', 'module']);
  });
});

describe('summarizeBundle', () => {
  it('should summarize a self-contained bundle', () => {
    const meta = metafile([{ path: 'node:module', kind: 'import-statement', external: true }]);

    expect(summarizeBundle(meta, 'dist/main.mjs')).toEqual({
      outfile: 'dist/main.mjs',
      bytes: 2048,
      inputs: 2,
      builtins: ['module'],
    });
  });

  it('should fail when the bundle still needs node_modules', () => {
    const meta = metafile([{ path: 'undici', kind: 'import-statement', external: true }]);

    expect(() => summarizeBundle(meta, 'dist/main.mjs')).toThrow(BuildError);
    expect(() => summarizeBundle(meta, 'dist/main.mjs')).toThrow(
      'Bundle is not self-contained; it still imports undici at run time',
    );
  });
});

describe('BUNDLE_BANNER', () => {
  it('should define require for bundled CommonJS code', () => {
    expect(BUNDLE_BANNER.split('\n')).toEqual([
      "import { createRequire as __createRequire } from 'node:module';",
      'const require = __createRequire(import.meta.url);',
    ]);
  });
});
